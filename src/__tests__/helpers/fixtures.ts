/**
 * Test Fixtures
 * Markup shared by detector, extractor and engine tests
 */

export const TEST_URL = 'https://quotes.test/page/1';

// Server-rendered page with real content
export const QUOTE_PAGE = `<!DOCTYPE html>
<html>
<head><title>Quotes</title></head>
<body>
  <h1>Quotes to Scrape</h1>
  <div class="quote">
    <span class="text">Simple is better than complex.</span>
    <small class="author">Ada</small>
  </div>
  <div class="quote">
    <span class="text">Readability counts.</span>
    <small class="author">Grace</small>
  </div>
</body>
</html>`;

// Client-rendered shell: framework bundle plus an empty mount node
export const REACT_SHELL = `<!DOCTYPE html>
<html>
<head>
  <title>App</title>
  <script src="/static/js/react-dom.production.min.js"></script>
</head>
<body><div id="root"></div></body>
</html>`;

// Scores exactly the default threshold: framework 30 + no structure 10 + loading 10
export const TIE_PAGE = `<!DOCTYPE html>
<html>
<head><script src="/static/js/react.js"></script></head>
<body>
  <div class="spinner"></div>
  <div class="spinner"></div>
  <div class="spinner"></div>
  <div class="spinner"></div>
  <div class="spinner"></div>
</body>
</html>`;

// What the browser sees once the shell has run
export const RENDERED_QUOTES = `<!DOCTYPE html>
<html>
<head><title>App</title></head>
<body>
  <div id="root">
    <div class="quote">
      <span class="text">Rendered quote one.</span>
      <small class="author">Linus</small>
    </div>
  </div>
</body>
</html>`;

export const QUOTE_SELECTORS = {
  container: '.quote',
  text: '.text',
  author: '.author',
};
