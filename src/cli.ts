#!/usr/bin/env node
/**
 * CLI Entry Point
 * scrape-engine scrape --url <url> [--selectors <json>] [--mode auto|static|dynamic] [--output-dir <dir>]
 */

import { env } from './config/env';
import { logger } from './lib/logger';
import { JOB_STATUS_EVENT, JobManager } from './modules/scraper/job.manager';
import { EngineOverrides, createScrapeEngine, engineConfigFromEnv } from './modules/scraper/scraper.engine';
import { IJobStatusEvent, IScrapeResult, ScrapeStatus, TERMINAL_STATUSES } from './modules/scraper/scraper.types';

export interface CliOptions {
  command: 'scrape' | 'help';
  url: string;
  selectors?: string;
  mode?: string;
  outputDir: string;
  verbose: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export interface CliIO {
  out: (text: string) => void;
  err: (text: string) => void;
}

const defaultIO: CliIO = {
  out: (text) => process.stdout.write(`${text}\n`),
  err: (text) => process.stderr.write(`${text}\n`),
};

export const USAGE = `
Usage: scrape-engine scrape --url <url> [options]

Options:
  --url <url>            Page to scrape (http or https)
  --selectors <json>     JSON object of field name -> CSS selector
  --mode <mode>          auto (default), static or dynamic
  --output-dir <dir>     Where result files are written (default: ${env.OUTPUT_DIR})
  --verbose              Log engine progress to stderr
  --help                 Show this help
`;

function takeValue(argv: string[], index: number, flag: string): string {
  const value = argv[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new CliUsageError(`${flag} requires a value`);
  }
  return value;
}

export function parseCliArgs(argv: string[]): CliOptions {
  const opts: CliOptions = {
    command: 'scrape',
    url: '',
    outputDir: env.OUTPUT_DIR,
    verbose: false,
  };

  if (argv.length === 0) {
    return { ...opts, command: 'help' };
  }

  const [command, ...rest] = argv;
  if (command === '--help' || command === '-h') {
    return { ...opts, command: 'help' };
  }
  if (command !== 'scrape') {
    throw new CliUsageError(`Unknown command: ${command}`);
  }

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    switch (arg) {
      case '--url':
        opts.url = takeValue(rest, i++, arg);
        break;
      case '--selectors':
        opts.selectors = takeValue(rest, i++, arg);
        break;
      case '--mode':
        opts.mode = takeValue(rest, i++, arg);
        break;
      case '--output-dir':
        opts.outputDir = takeValue(rest, i++, arg);
        break;
      case '--verbose':
        opts.verbose = true;
        break;
      case '--help':
      case '-h':
        return { ...opts, command: 'help' };
      default:
        throw new CliUsageError(`Unknown argument: ${arg}`);
    }
  }

  if (!opts.url) {
    throw new CliUsageError('--url is required');
  }

  return opts;
}

function parseSelectors(raw: string | undefined): unknown {
  if (raw === undefined) return undefined;
  try {
    return JSON.parse(raw);
  } catch {
    throw new CliUsageError('--selectors must be a JSON object');
  }
}

function waitForTerminal(manager: JobManager, jobId: string): Promise<void> {
  return new Promise<void>((resolve) => {
    const onStatus = (event: IJobStatusEvent): void => {
      if (event.jobId === jobId && TERMINAL_STATUSES.has(event.state)) {
        manager.off(JOB_STATUS_EVENT, onStatus);
        resolve();
      }
    };
    manager.on(JOB_STATUS_EVENT, onStatus);

    // Already finished before we started listening
    const current = manager.get(jobId);
    if (current && TERMINAL_STATUSES.has(current.status)) {
      manager.off(JOB_STATUS_EVENT, onStatus);
      resolve();
    }
  });
}

/**
 * Run one job through an in-process engine. Resolves to the exit code.
 */
export async function runCli(argv: string[], io: CliIO = defaultIO, overrides: EngineOverrides = {}): Promise<number> {
  let opts: CliOptions;
  let selectors: unknown;
  try {
    opts = parseCliArgs(argv);
    selectors = parseSelectors(opts.selectors);
  } catch (error) {
    if (error instanceof CliUsageError) {
      io.err(`Error: ${error.message}`);
      io.err(USAGE);
      return 1;
    }
    throw error;
  }

  if (opts.command === 'help') {
    io.out(USAGE);
    return 0;
  }

  // stdout carries the result JSON only
  logger.useStderr();
  if (!opts.verbose && logger.getLevel() !== 'silent') {
    logger.setLevel('warn');
  }

  const config = engineConfigFromEnv();
  const engine = createScrapeEngine(
    {
      ...config,
      workerCount: 1,
      store: { kind: 'file', outputDir: opts.outputDir },
    },
    overrides
  );

  const cancel = (): void => {
    for (const job of engine.manager.list()) {
      if (!TERMINAL_STATUSES.has(job.state)) {
        engine.manager.cancel(job.jobId).catch((error: unknown) => logger.error('Cancel failed:', error));
      }
    }
  };
  process.once('SIGINT', cancel);

  let result: IScrapeResult | undefined;
  try {
    engine.start();
    const jobId = engine.manager.submit({ url: opts.url, selectors, mode: opts.mode });
    await waitForTerminal(engine.manager, jobId);
    result = await engine.manager.result(jobId);
    io.out(JSON.stringify(result, null, 2));
  } catch (error) {
    io.err(`Error: ${error instanceof Error ? error.message : String(error)}`);
  } finally {
    process.removeListener('SIGINT', cancel);
    await engine.shutdown();
  }

  return result?.status === ScrapeStatus.COMPLETED ? 0 : 1;
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.error('Fatal error:', error);
      process.exitCode = 1;
    });
}
