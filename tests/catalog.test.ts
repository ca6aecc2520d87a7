/**
 * Catalog Client Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readFileSync, rmSync, statSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { MockAgent } from 'undici';
import { CacheDirectory } from '../src/core/cache-dir.js';
import {
  CatalogClient,
  assertNotRateLimited,
  formatDuration,
  parseRelease,
  retryDelayFromHeaders,
} from '../src/core/catalog.js';
import { CatalogError, RateLimitError } from '../src/core/errors.js';
import type { RemoteAsset } from '../src/core/types.js';
import { captureLogger, tempDir } from './helpers.js';

const API = 'https://api.example.test';
const RELEASE_PATH = '/repos/acme/catalog/releases/latest';

const RELEASE_BODY = JSON.stringify({
  name: 'build-42',
  assets: [
    {
      id: 7,
      name: 'acme_app_ccchub1_._ccchub2_ubuntu@22.04-amd64.tar.gz',
      size: 7,
      browser_download_url: 'https://api.example.test/download/app.tar.gz',
    },
  ],
});

describe('formatDuration', () => {
  it('should format as H:MM:SS', () => {
    expect(formatDuration(0)).toBe('0:00:00');
    expect(formatDuration(3725)).toBe('1:02:05');
    expect(formatDuration(-5)).toBe('0:00:00');
  });
});

describe('retryDelayFromHeaders', () => {
  const now = new Date('2026-01-01T00:00:00Z');

  it('should use the quota reset when the quota is exhausted', () => {
    const delay = retryDelayFromHeaders(
      { 'x-ratelimit-remaining': '0', 'x-ratelimit-reset': '1767226200' },
      now
    );
    expect(delay.seconds).toBe(600);
    expect(delay.retryAt.toISOString()).toBe('2026-01-01T00:10:00.000Z');
  });

  it('should fall back to retry-after', () => {
    const delay = retryDelayFromHeaders({ 'retry-after': '120' }, now);
    expect(delay.seconds).toBe(120);
    expect(delay.retryAt.toISOString()).toBe('2026-01-01T00:02:00.000Z');
  });

  it('should default to one minute', () => {
    expect(retryDelayFromHeaders({}, now).seconds).toBe(60);
  });
});

describe('assertNotRateLimited', () => {
  const now = new Date('2026-01-01T00:00:00Z');
  const headers = { 'x-ratelimit-remaining': '0', 'x-ratelimit-reset': '1767226200' };

  it('should ignore other statuses', () => {
    expect(() => assertNotRateLimited(500, headers, { token: undefined, now })).not.toThrow();
  });

  it('should explain when to retry and suggest a token', () => {
    let caught: unknown;
    try {
      assertNotRateLimited(403, headers, { token: undefined, now });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(RateLimitError);
    if (!(caught instanceof RateLimitError)) return;
    expect(caught.retryAfterSeconds).toBe(600);
    expect(caught.message).toBe(
      'Catalog API rate limit exceeded (HTTP 403). Retry in 0:10:00 at 2026-01-01T00:10:00.000Z. ' +
        'Seeing this often? Please add a comment to this issue: https://github.com/canonical/charmcraftcache/issues/1' +
        '\nIf running in CI, pass `GH_TOKEN` environment variable'
    );
  });

  it('should not suggest a token when one is set', () => {
    expect(() => assertNotRateLimited(429, headers, { token: 'test-secret', now })).toThrow(
      /issues\/1$/
    );
  });
});

describe('parseRelease', () => {
  it('should map assets', () => {
    const release = parseRelease(RELEASE_BODY);
    expect(release.name).toBe('build-42');
    expect(release.assets).toEqual([
      {
        name: 'acme_app_ccchub1_._ccchub2_ubuntu@22.04-amd64.tar.gz',
        size: 7,
        downloadUrl: 'https://api.example.test/download/app.tar.gz',
        releaseName: 'build-42',
      },
    ]);
  });

  it('should reject malformed listings', () => {
    expect(() => parseRelease('not json')).toThrow(CatalogError);
    expect(() => parseRelease('{"name":"","assets":[]}')).toThrow('Unexpected catalog release listing (name: Release name cannot be empty)');
  });
});

describe('CatalogClient', () => {
  let root: string;
  let agent: MockAgent;
  let cache: CacheDirectory;

  function client(token?: string): CatalogClient {
    return new CatalogClient({
      api: API,
      repository: 'acme/catalog',
      token,
      cache,
      logger: captureLogger().logger,
      dispatcher: agent,
      now: () => new Date('2026-01-01T00:00:00Z'),
    });
  }

  beforeEach(() => {
    root = tempDir();
    cache = new CacheDirectory(join(root, 'cache'), captureLogger().logger);
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
    rmSync(root, { recursive: true, force: true });
  });

  it('should store the listing and entity tag on 200', async () => {
    agent.get(API).intercept({ path: RELEASE_PATH, method: 'GET' }).reply(200, RELEASE_BODY, {
      headers: { etag: 'W/"abc"' },
    });

    const release = await client().getLatestRelease();

    expect(release.name).toBe('build-42');
    expect(readFileSync(cache.releaseFile, 'utf-8')).toBe(RELEASE_BODY);
    expect(readFileSync(cache.etagFile, 'utf-8')).toBe('W/"abc"');
  });

  it('should reuse the stored listing byte-for-byte on 304 without writing', async () => {
    agent.get(API).intercept({ path: RELEASE_PATH, method: 'GET' }).reply(200, RELEASE_BODY, {
      headers: { etag: 'W/"abc"' },
    });
    const first = await client().getLatestRelease();
    const releaseStat = statSync(cache.releaseFile);
    const etagStat = statSync(cache.etagFile);

    let sentTag: string | undefined;
    agent
      .get(API)
      .intercept({
        path: RELEASE_PATH,
        method: 'GET',
        headers: (headers) => {
          sentTag = headers['if-none-match'] ?? headers['If-None-Match'];
          return true;
        },
      })
      .reply(304, '');
    const second = await client().getLatestRelease();

    expect(sentTag).toBe('W/"abc"');
    expect(second).toEqual(first);
    expect(readFileSync(cache.releaseFile, 'utf-8')).toBe(RELEASE_BODY);
    expect(statSync(cache.releaseFile).mtimeMs).toBe(releaseStat.mtimeMs);
    expect(statSync(cache.etagFile).mtimeMs).toBe(etagStat.mtimeMs);
  });

  it('should fail on 304 when the stored listing is gone', async () => {
    cache.ensureRoot();
    writeFileSync(cache.etagFile, 'W/"abc"');
    agent.get(API).intercept({ path: RELEASE_PATH, method: 'GET' }).reply(304, '');

    await expect(client().getLatestRelease()).rejects.toBeInstanceOf(CatalogError);
  });

  it('should raise a rate limit error on 403', async () => {
    agent.get(API).intercept({ path: RELEASE_PATH, method: 'GET' }).reply(403, 'rate limited', {
      headers: { 'x-ratelimit-remaining': '0', 'x-ratelimit-reset': '1767226200' },
    });

    await expect(client().getLatestRelease()).rejects.toBeInstanceOf(RateLimitError);
    expect(existsSync(cache.releaseFile)).toBe(false);
  });

  it('should raise a catalog error with the status otherwise', async () => {
    agent.get(API).intercept({ path: RELEASE_PATH, method: 'GET' }).reply(500, 'boom');

    await expect(client().getLatestRelease()).rejects.toMatchObject({
      name: 'CatalogError',
      status: 500,
      message: 'Failed to fetch latest release: 500 - boom',
    });
  });

  describe('downloadAsset', () => {
    const asset: RemoteAsset = {
      name: 'app.tar.gz',
      size: 7,
      downloadUrl: `${API}/download/app.tar.gz`,
      releaseName: 'build-42',
    };

    it('should follow redirects and move the file into place', async () => {
      agent.get(API).intercept({ path: '/download/app.tar.gz', method: 'GET' }).reply(302, '', {
        headers: { location: 'https://objects.example.test/blob/1' },
      });
      agent.get('https://objects.example.test').intercept({ path: '/blob/1', method: 'GET' }).reply(200, 'payload');

      const destination = join(cache.archivesDir, asset.name);
      let transferred = 0;
      await client().downloadAsset(asset, destination, (bytes) => {
        transferred += bytes;
      });

      expect(readFileSync(destination, 'utf-8')).toBe('payload');
      expect(transferred).toBe(7);
      expect(existsSync(cache.partialDownloadFile)).toBe(false);
    });

    it('should leave no file at the destination when interrupted', async () => {
      const pool = agent.get(API);
      pool.intercept({ path: '/download/app.tar.gz', method: 'GET' }).reply(200, 'payload');
      pool.intercept({ path: '/download/app.tar.gz', method: 'GET' }).reply(200, 'payload');
      const destination = join(cache.archivesDir, asset.name);

      await expect(
        client().downloadAsset(asset, destination, () => {
          throw new Error('interrupted');
        })
      ).rejects.toThrow('interrupted');
      expect(existsSync(destination)).toBe(false);

      await client().downloadAsset(asset, destination);
      expect(readFileSync(destination, 'utf-8')).toBe('payload');
    });

    it('should not start the transfer when the temporary file cannot be opened', async () => {
      agent.get(API).intercept({ path: '/download/app.tar.gz', method: 'GET' }).reply(200, 'payload');
      mkdirSync(cache.partialDownloadFile, { recursive: true });

      await expect(client().downloadAsset(asset, join(cache.archivesDir, asset.name))).rejects.toMatchObject({
        code: 'EISDIR',
      });
      expect(agent.pendingInterceptors()).toHaveLength(1);
    });

    it('should report rate limiting on downloads', async () => {
      agent.get(API).intercept({ path: '/download/app.tar.gz', method: 'GET' }).reply(429, '', {
        headers: { 'retry-after': '30' },
      });

      await expect(
        client('test-secret').downloadAsset(asset, join(cache.archivesDir, asset.name))
      ).rejects.toMatchObject({ name: 'RateLimitError', retryAfterSeconds: 30 });
    });
  });
});
