/**
 * Extraction Types
 * Field-selector maps and the records they produce
 */

/**
 * Field name to CSS selector. The reserved `container` key marks a repeating
 * block; every other field is then resolved inside each container.
 */
export type SelectorMap = Record<string, string>;

export type FieldValue = string | string[];

export type ExtractedRecord = Record<string, FieldValue>;

export type ExtractionStrategy = 'selectors' | 'generic';

/**
 * Non-fatal: a selector matched nothing, so the field was left empty
 */
export interface ExtractionWarning {
  code: 'ExtractionWarning';
  field: string;
  selector: string;
  message: string;
}

export interface ExtractionResult {
  strategy: ExtractionStrategy;
  records: ExtractedRecord[];
  warnings: ExtractionWarning[];
}

export const CONTAINER_FIELD = 'container';
