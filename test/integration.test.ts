import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { runReindex } from '../src/lib/app.js';
import { ConfigurationError } from '../src/lib/errors.js';
import type { TokenProvider } from '../src/lib/SecondarySubmitter.js';
import { memoryLogger, mockJsonResponse, mockTextResponse } from './helpers.js';

const WEBMASTER = 'https://webmaster.test/v4';
const INDEXING = 'https://indexing.test/v3';

let dir: string;
let env: NodeJS.ProcessEnv;

const tokens: TokenProvider = { getAccessToken: async () => 'test-access-token' };
const noDelay = { wait: async () => undefined };

/**
 * Routes fetch calls to canned API responses. Primary recrawl requests for
 * URLs listed in `failingPrimary` answer 500.
 */
function stubApis(failingPrimary: string[] = []): void {
  vi.spyOn(global, 'fetch').mockImplementation(async (input, init) => {
    const url = String(input);
    const payload = typeof init?.body === 'string' ? JSON.parse(init.body) : {};

    if (url === `${WEBMASTER}/user`) {
      return mockJsonResponse({ user_id: 42 });
    }
    if (url === `${WEBMASTER}/user/42/hosts/https:example.com:443/recrawl/queue`) {
      return failingPrimary.includes(payload.url)
        ? mockTextResponse('Internal Server Error', 500)
        : mockJsonResponse({ task_id: `task-${payload.url}` }, 202);
    }
    if (url === `${INDEXING}/urlNotifications:publish`) {
      return mockJsonResponse({
        urlNotificationMetadata: {
          url: payload.url,
          latestUpdate: { url: payload.url, type: payload.type },
        },
      });
    }
    return mockTextResponse('Not Found', 404);
  });
}

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'reindex-run-'));
  const keyFile = path.join(dir, 'service-account.json');
  fs.writeFileSync(keyFile, '{}', 'utf8');
  env = {
    YANDEX_API_TOKEN: 'test-token',
    SITE_URL: 'https://example.com',
    SERVICE_ACCOUNT_FILE: keyFile,
    YANDEX_API_BASE: WEBMASTER,
    GOOGLE_INDEXING_API_BASE: INDEXING,
  };
});

afterEach(() => {
  vi.restoreAllMocks();
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('runReindex', () => {
  it('should submit every URL to both APIs and write the results', async () => {
    stubApis(['https://example.com/broken']);
    const inputPath = path.join(dir, 'urls.csv');
    const outputPath = path.join(dir, 'results.csv');
    fs.writeFileSync(
      inputPath,
      '\uFEFFURL,Comment\r\nhttps://example.com/a,first\r\n"",blank\r\nhttps://example.com/broken,second\r\n',
      'utf8'
    );

    const summary = await runReindex({
      inputPath,
      outputPath,
      env,
      tokens,
      rateLimiter: noDelay,
      logger: memoryLogger().logger,
    });

    expect(summary).toMatchObject({ state: 'Done', total: 3, processed: 2, skipped: 1 });
    expect(fs.readFileSync(outputPath, 'utf8')).toBe(
      'URL,Primary_Status,Primary_Error,Secondary_Status,Secondary_Error\r\n' +
        'https://example.com/a,Success,,Success,\r\n' +
        'https://example.com/broken,Failure,Request Failed. Status Code: 500,Success,\r\n'
    );
  });

  it('should write the log file when no logger is given', async () => {
    stubApis();
    const inputPath = path.join(dir, 'urls.csv');
    const logFile = path.join(dir, 'reindex.log');
    fs.writeFileSync(inputPath, 'URL\nhttps://example.com/a\n', 'utf8');
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    await runReindex({
      inputPath,
      outputPath: path.join(dir, 'results.csv'),
      env: { ...env, LOG_FILE: logFile },
      tokens,
      rateLimiter: noDelay,
    });

    const log = fs.readFileSync(logFile, 'utf8');
    expect(log).toContain(' - INFO - Starting URL reindex\n');
    expect(log).toContain(' - INFO - Processing URL [1/1]: https://example.com/a\n');
    expect(log).toContain(' - INFO - Reindex finished\n');
  });

  it('should fail before any request when the configuration is incomplete', async () => {
    const fetchSpy = vi.spyOn(global, 'fetch');

    await expect(
      runReindex({
        inputPath: path.join(dir, 'urls.csv'),
        outputPath: path.join(dir, 'results.csv'),
        env: { SITE_URL: 'https://example.com' },
      })
    ).rejects.toBeInstanceOf(ConfigurationError);
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it('should fail with a configuration error when the log file cannot be opened', async () => {
    const fetchSpy = vi.spyOn(global, 'fetch');
    const logFile = path.join(dir, 'missing-dir', 'reindex.log');
    const outputPath = path.join(dir, 'results.csv');

    await expect(
      runReindex({
        inputPath: path.join(dir, 'urls.csv'),
        outputPath,
        env: { ...env, LOG_FILE: logFile },
        tokens,
        rateLimiter: noDelay,
      })
    ).rejects.toThrow(`Cannot open log file ${logFile}: `);
    expect(fetchSpy).not.toHaveBeenCalled();
    expect(fs.existsSync(outputPath)).toBe(false);
  });
});
