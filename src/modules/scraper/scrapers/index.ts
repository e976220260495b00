/**
 * Scrapers barrel export
 * static: HTTP fetch, dynamic: Playwright render
 */

export { HttpBackend } from './http.scraper';
export type { HttpBackendOptions } from './http.scraper';
export { PlaywrightBackend } from './playwright.scraper';
export type { FetchBackend, FetchedPage, FetchOptions } from './types';
