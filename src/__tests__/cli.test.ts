/**
 * CLI Tests
 * Argument parsing plus full runs against a scripted backend
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { CliUsageError, parseCliArgs, runCli, USAGE } from '../cli';
import { logger } from '../lib/logger';
import { FetchError } from '../lib/scraping';
import { ScriptedBackend } from './helpers/fakes';
import { QUOTE_PAGE, TEST_URL } from './helpers/fixtures';

describe('parseCliArgs', () => {
  it('should treat no arguments as a help request', () => {
    expect(parseCliArgs([]).command).toBe('help');
    expect(parseCliArgs(['--help']).command).toBe('help');
  });

  it('should read every scrape flag', () => {
    const opts = parseCliArgs([
      'scrape',
      '--url',
      TEST_URL,
      '--selectors',
      '{"title":"h1"}',
      '--mode',
      'static',
      '--output-dir',
      '/tmp/out',
      '--verbose',
    ]);

    expect(opts).toEqual({
      command: 'scrape',
      url: TEST_URL,
      selectors: '{"title":"h1"}',
      mode: 'static',
      outputDir: '/tmp/out',
      verbose: true,
    });
  });

  it('should require --url', () => {
    expect(() => parseCliArgs(['scrape'])).toThrow(new CliUsageError('--url is required'));
  });

  it('should reject a flag with no value', () => {
    expect(() => parseCliArgs(['scrape', '--url', '--verbose'])).toThrow('--url requires a value');
  });

  it('should reject unknown commands and flags', () => {
    expect(() => parseCliArgs(['crawl'])).toThrow('Unknown command: crawl');
    expect(() => parseCliArgs(['scrape', '--url', TEST_URL, '--depth', '2'])).toThrow('Unknown argument: --depth');
  });
});

describe('runCli', () => {
  let outputDir: string;
  let out: string[];
  let err: string[];
  const io = {
    out: (text: string) => out.push(text),
    err: (text: string) => err.push(text),
  };

  beforeEach(async () => {
    outputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'scrape-cli-'));
    out = [];
    err = [];
  });

  afterEach(async () => {
    await fs.rm(outputDir, { recursive: true, force: true });
  });

  it('should print usage for --help', async () => {
    const code = await runCli(['--help'], io);

    expect(code).toBe(0);
    expect(out).toEqual([USAGE]);
  });

  it('should exit 1 with usage on bad arguments', async () => {
    const code = await runCli(['scrape'], io);

    expect(code).toBe(1);
    expect(err).toEqual(['Error: --url is required', USAGE]);
  });

  it('should exit 1 when selectors are not JSON', async () => {
    const code = await runCli(['scrape', '--url', TEST_URL, '--selectors', '{nope'], io);

    expect(code).toBe(1);
    expect(err[0]).toBe('Error: --selectors must be a JSON object');
  });

  it('should scrape a page, print the result and write it to the output directory', async () => {
    const backend = new ScriptedBackend('static', [{ markup: QUOTE_PAGE }]);

    const code = await runCli(
      ['scrape', '--url', TEST_URL, '--selectors', '{"heading":"h1"}', '--output-dir', outputDir],
      io,
      { backends: { static: backend } }
    );

    expect(code).toBe(0);
    expect(out).toHaveLength(1);
    const printed = JSON.parse(out[0]);
    expect(printed).toMatchObject({
      source_url: TEST_URL,
      status: 'completed',
      extraction_method: 'static',
      data: [{ heading: 'Quotes to Scrape' }],
    });

    const stored = JSON.parse(await fs.readFile(path.join(outputDir, `${printed.job_id}.json`), 'utf8'));
    expect(stored).toEqual(printed);
  });

  it('should keep log lines out of the printed result when verbose', async () => {
    const stdoutLog = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const stdoutDebug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    const stderrLog = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    logger.setLevel('debug');

    try {
      const code = await runCli(['scrape', '--url', TEST_URL, '--verbose', '--output-dir', outputDir], io, {
        backends: { static: new ScriptedBackend('static', [{ markup: QUOTE_PAGE }]) },
      });

      expect(code).toBe(0);
      expect(JSON.parse(out.join('\n')).status).toBe('completed');
      expect(stdoutLog).not.toHaveBeenCalled();
      expect(stdoutDebug).not.toHaveBeenCalled();
      expect(stderrLog).toHaveBeenCalledWith('Worker pool started with 1 worker(s)', '');
    } finally {
      logger.setLevel('silent');
      jest.restoreAllMocks();
    }
  });

  it('should exit 1 and still print the failed result', async () => {
    const backend = new ScriptedBackend('static', [new FetchError('HTTPStatus', 'HTTP 404', { statusCode: 404 })]);

    const code = await runCli(['scrape', '--url', TEST_URL, '--mode', 'static', '--output-dir', outputDir], io, {
      backends: { static: backend },
    });

    expect(code).toBe(1);
    const printed = JSON.parse(out[0]);
    expect(printed).toMatchObject({ status: 'failed', error_code: 'HTTPStatus', data: [] });
    expect(backend.calls).toHaveLength(1);
  });

  it('should exit 1 when the job is rejected', async () => {
    const code = await runCli(['scrape', '--url', TEST_URL, '--mode', 'fast', '--output-dir', outputDir], io);

    expect(code).toBe(1);
    expect(out).toEqual([]);
    expect(err).toHaveLength(1);
    expect(err[0].startsWith('Error: ')).toBe(true);
  });
});
