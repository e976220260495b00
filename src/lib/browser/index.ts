export * from './browser.types';
export { BrowserPool, launchChromium } from './browser.pool';
