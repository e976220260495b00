/**
 * Need-render detection types
 */

import type { BackendKind } from '../scraping/retry';

export type RenderDecision = BackendKind;

export type ResponseHeaders = Record<string, string>;

export interface DetectionSignal {
  name: 'framework' | 'empty-mount' | 'script-ratio' | 'no-structure' | 'loading-indicators' | 'empty-document';
  points: number;
  reason: string;
}

export interface DetectionResult {
  decision: RenderDecision;
  score: number;
  threshold: number;
  signals: DetectionSignal[];
  reasons: string[];
}

export interface RenderDetectorOptions {
  /** Scores strictly above this are rendered */
  threshold?: number;
}
