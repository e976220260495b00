/**
 * Need-Render Detector
 * Scores fetched markup to decide whether a page must be rendered in a browser
 */

import * as cheerio from 'cheerio';
import {
  DetectionResult,
  DetectionSignal,
  RenderDecision,
  RenderDetectorOptions,
  ResponseHeaders,
} from './detection.types';

export const DEFAULT_RENDER_THRESHOLD = 50;

const FRAMEWORK_POINTS = 30;
const EMPTY_MOUNT_POINTS = 30;
const SCRIPT_RATIO_POINTS = 20;
const NO_STRUCTURE_POINTS = 10;
const LOADING_POINTS = 10;

const SCRIPT_RATIO_FLOOR = 0.3;
const LOADING_SATURATION = 5;
const EMPTY_DOCUMENT_SCORE = 100;

const FRAMEWORK_SCRIPT_SRC = /(react(-dom)?|vue|angular|svelte|ember)[\w.-]*\.js|\/_next\/|\/_nuxt\//i;
const FRAMEWORK_ATTRIBUTES = ['[data-reactroot]', '[ng-app]', '[ng-version]', '[data-v-app]', '[data-server-rendered]'];
const HYDRATION_GLOBALS = ['__NEXT_DATA__', 'window.__NUXT__', '__INITIAL_STATE__', '__APOLLO_STATE__'];
const FRAMEWORK_HEADER = /next\.js|nuxt/i;

const MOUNT_SELECTORS = ['#root', '#app', '#__next', '#__nuxt', '[data-reactroot]', '[ng-app]'];
const MOUNT_MIN_TEXT = 50;
const MOUNT_MIN_CHILDREN = 3;

const STRUCTURAL_TAGS = 'p, article, main, section, h1, h2, h3, h4, h5, h6, table, ul, ol';
const LOADING_SELECTOR =
  '[class*="loading"], [class*="spinner"], [class*="skeleton"], [class*="placeholder"], [data-loading]';

function headerValue(headers: ResponseHeaders, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) return value;
  }
  return undefined;
}

export class RenderDetector {
  readonly threshold: number;

  constructor(options: RenderDetectorOptions = {}) {
    this.threshold = options.threshold ?? DEFAULT_RENDER_THRESHOLD;
  }

  decide(markup: string, headers: ResponseHeaders = {}): RenderDecision {
    return this.analyze(markup, headers).decision;
  }

  /**
   * Same decision as decide(), plus the score and the signals behind it
   */
  analyze(markup: string, headers: ResponseHeaders = {}): DetectionResult {
    if (markup.trim().length === 0) {
      const signal: DetectionSignal = {
        name: 'empty-document',
        points: EMPTY_DOCUMENT_SCORE,
        reason: 'Document is empty',
      };
      return this.result([signal]);
    }

    const $ = cheerio.load(markup);
    const signals: DetectionSignal[] = [];

    const framework = this.frameworkMarkers($, headers);
    if (framework.length > 0) {
      signals.push({
        name: 'framework',
        points: FRAMEWORK_POINTS,
        reason: `Front-end framework markers: ${framework.join(', ')}`,
      });
    }

    const mount = this.emptyMountPoint($);
    if (mount) {
      signals.push({ name: 'empty-mount', points: EMPTY_MOUNT_POINTS, reason: `Empty mount container ${mount}` });
    }

    // Measured before scripts are stripped for the text count
    const scriptBytes = $('script')
      .toArray()
      .filter((el) => !$(el).attr('src'))
      .reduce((sum, el) => sum + Buffer.byteLength($(el).text(), 'utf8'), 0);

    const structural = $(STRUCTURAL_TAGS).length;
    const loading = $(LOADING_SELECTOR).length;

    $('script, style, noscript, template').remove();
    const textBytes = Buffer.byteLength($('body').text().replace(/\s+/g, ' ').trim(), 'utf8');

    const ratio = textBytes === 0 ? (scriptBytes > 0 ? 1 : 0) : scriptBytes / (scriptBytes + textBytes);
    if (ratio > SCRIPT_RATIO_FLOOR) {
      signals.push({
        name: 'script-ratio',
        points: Math.round(SCRIPT_RATIO_POINTS * ratio),
        reason: `Inline script to visible text ratio ${ratio.toFixed(2)}`,
      });
    }

    if (structural === 0) {
      signals.push({ name: 'no-structure', points: NO_STRUCTURE_POINTS, reason: 'No structural content tags' });
    }

    if (loading > 0) {
      signals.push({
        name: 'loading-indicators',
        points: Math.round(LOADING_POINTS * Math.min(loading / LOADING_SATURATION, 1)),
        reason: `${loading} loading or skeleton placeholder(s)`,
      });
    }

    return this.result(signals);
  }

  private result(signals: DetectionSignal[]): DetectionResult {
    const score = signals.reduce((sum, signal) => sum + signal.points, 0);
    return {
      decision: score > this.threshold ? 'dynamic' : 'static',
      score,
      threshold: this.threshold,
      signals,
      reasons: signals.map((signal) => signal.reason),
    };
  }

  private frameworkMarkers($: cheerio.CheerioAPI, headers: ResponseHeaders): string[] {
    const markers: string[] = [];

    for (const el of $('script[src]').toArray()) {
      const src = $(el).attr('src') ?? '';
      if (FRAMEWORK_SCRIPT_SRC.test(src)) {
        markers.push(`script ${src}`);
      }
    }

    for (const selector of FRAMEWORK_ATTRIBUTES) {
      if ($(selector).length > 0) markers.push(selector);
    }

    if ($('script#__NEXT_DATA__').length > 0) {
      markers.push('__NEXT_DATA__');
    } else {
      const inline = $('script:not([src])')
        .toArray()
        .map((el) => $(el).text())
        .join('\n');
      for (const global of HYDRATION_GLOBALS) {
        if (inline.includes(global)) markers.push(global);
      }
    }

    const poweredBy = headerValue(headers, 'x-powered-by');
    if (poweredBy && FRAMEWORK_HEADER.test(poweredBy)) {
      markers.push(`x-powered-by: ${poweredBy}`);
    }

    return markers;
  }

  private emptyMountPoint($: cheerio.CheerioAPI): string | undefined {
    for (const selector of MOUNT_SELECTORS) {
      for (const el of $(selector).toArray()) {
        const node = $(el);
        const text = node.text().trim();
        if (text.length < MOUNT_MIN_TEXT && node.find('*').length < MOUNT_MIN_CHILDREN) {
          return selector;
        }
      }
    }
    return undefined;
  }
}
