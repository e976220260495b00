/**
 * Console logger with a level gate so tests and the CLI can quiet it down
 */

import { env } from '../config/env';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

export class Logger {
  private level: LogLevel;
  // Keeps stdout free for program output (the CLI prints its result there)
  private stderrOnly: boolean = false;

  constructor(level: string) {
    this.level = isLogLevel(level) ? level : 'info';
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  useStderr(enabled: boolean = true): void {
    this.stderrOnly = enabled;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    if (this.enabled('debug')) (this.stderrOnly ? console.error : console.debug)(message, meta ?? '');
  }

  info(message: string, meta?: Record<string, unknown>): void {
    if (this.enabled('info')) (this.stderrOnly ? console.error : console.log)(message, meta ?? '');
  }

  warn(message: string, meta?: unknown): void {
    if (this.enabled('warn')) console.warn(message, meta ?? '');
  }

  error(message: string, meta?: unknown): void {
    if (this.enabled('error')) console.error(message, meta ?? '');
  }

  private enabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }
}

export const logger = new Logger(env.LOG_LEVEL);
