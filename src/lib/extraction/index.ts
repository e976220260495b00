/**
 * Extraction System
 * Main export file for selector-driven extraction
 */

export * from './extraction.types';
export { SelectorExtractor, assertValidSelectors, findInvalidSelector } from './selector.extractor';
