/**
 * Selector Extractor
 * Applies a field-selector map to markup, or falls back to generic content
 * heuristics when no selectors are given. Never fails the job.
 */

import * as cheerio from 'cheerio';
import { ScrapeError } from '../scraping/errors';
import { logger } from '../logger';
import {
  CONTAINER_FIELD,
  ExtractedRecord,
  ExtractionResult,
  ExtractionWarning,
  FieldValue,
  SelectorMap,
} from './extraction.types';

const ARTICLE_SELECTORS = [
  'article',
  '.post',
  '.entry',
  '.content',
  '.article',
  '.story',
  "[role='main'] > div",
  'main > div',
];
const LIST_SELECTORS = ['li', '.item', '.entry', '.quote', '.post-summary'];
const MAIN_SELECTORS = 'main, #main, .main, #content, .content';

const MAX_LIST_ITEMS = 20;
const MIN_LIST_TEXT = 10;
const MAX_PARAGRAPHS = 10;
const MIN_PARAGRAPH_TEXT = 20;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function cleanText(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

/**
 * Returns the first field whose selector cheerio cannot parse
 */
export function findInvalidSelector(selectors: SelectorMap): string | undefined {
  const $ = cheerio.load('');
  for (const [field, selector] of Object.entries(selectors)) {
    if (selector.trim().length === 0) return field;
    try {
      $(selector);
    } catch {
      return field;
    }
  }
  return undefined;
}

export function assertValidSelectors(selectors: SelectorMap): void {
  const field = findInvalidSelector(selectors);
  if (field !== undefined) {
    throw new ScrapeError('InvalidInput', `Invalid CSS selector for field "${field}"`, {
      field,
      selector: selectors[field],
    });
  }
}

export class SelectorExtractor {
  extract(markup: string, url: string, selectors?: SelectorMap): ExtractionResult {
    const $ = cheerio.load(markup);

    if (selectors && Object.keys(selectors).length > 0) {
      const warnings: ExtractionWarning[] = [];
      const records = this.extractWithSelectors($, selectors, warnings);
      return { strategy: 'selectors', records, warnings };
    }

    return { strategy: 'generic', records: this.genericExtraction($, url), warnings: [] };
  }

  private extractWithSelectors(
    $: cheerio.CheerioAPI,
    selectors: SelectorMap,
    warnings: ExtractionWarning[]
  ): ExtractedRecord[] {
    const containerSelector = selectors[CONTAINER_FIELD];
    const fields = Object.entries(selectors).filter(([field]) => field !== CONTAINER_FIELD);

    if (containerSelector === undefined) {
      const record: ExtractedRecord = {};
      for (const [field, selector] of fields) {
        const texts = this.safely(() => $(selector).toArray().map((el) => cleanText($(el).text())));
        record[field] = this.fieldValue(texts, field, selector, warnings);
      }
      return [record];
    }

    const containers = this.safely(() => $(containerSelector).toArray());

    if (containers.length === 0) {
      warnings.push(this.warning(CONTAINER_FIELD, containerSelector, 'Container selector matched no elements'));
      return [];
    }

    return containers.map((container) => {
      const record: ExtractedRecord = {};
      for (const [field, selector] of fields) {
        const texts = this.safely(() =>
          $(container)
            .find(selector)
            .toArray()
            .map((el) => cleanText($(el).text()))
        );
        record[field] = this.fieldValue(texts, field, selector, warnings);
      }
      return record;
    });
  }

  private safely<T>(run: () => T[]): T[] {
    try {
      return run();
    } catch (error) {
      logger.warn('Selector evaluation failed:', { message: errorMessage(error) });
      return [];
    }
  }

  /**
   * One match gives a string, several give a list, none gives '' plus a warning
   */
  private fieldValue(texts: string[], field: string, selector: string, warnings: ExtractionWarning[]): FieldValue {
    if (texts.length === 0) {
      if (!warnings.some((w) => w.field === field)) {
        warnings.push(this.warning(field, selector, `Selector for "${field}" matched no elements`));
      }
      return '';
    }
    return texts.length === 1 ? texts[0] : texts;
  }

  private warning(field: string, selector: string, message: string): ExtractionWarning {
    return { code: 'ExtractionWarning', field, selector, message };
  }

  private genericExtraction($: cheerio.CheerioAPI, url: string): ExtractedRecord[] {
    const records: ExtractedRecord[] = [];

    for (const selector of ARTICLE_SELECTORS) {
      for (const el of $(selector).toArray()) {
        const article = $(el);
        const title = cleanText(article.find('h1, h2, h3, .title, .headline').first().text());
        const text = cleanText(article.find('p, .text, .content, .body').first().text());
        if (title || text) {
          records.push({ ...(title ? { title } : {}), ...(text ? { text } : {}), url });
        }
      }
      if (records.length > 0) return records;
    }

    for (const selector of LIST_SELECTORS) {
      const items = $(selector).toArray();
      if (items.length > 1) {
        for (const el of items.slice(0, MAX_LIST_ITEMS)) {
          const text = cleanText($(el).text());
          if (text.length > MIN_LIST_TEXT) records.push({ text, url });
        }
        break;
      }
    }
    if (records.length > 0) return records;

    const main = $(MAIN_SELECTORS).first();
    for (const el of main.find('p').toArray().slice(0, MAX_PARAGRAPHS)) {
      const text = cleanText($(el).text());
      if (text.length > MIN_PARAGRAPH_TEXT) records.push({ text, url });
    }
    if (records.length > 0) return records;

    const title = cleanText($('title').first().text());
    if (title) records.push({ title, url });

    return records;
  }
}
