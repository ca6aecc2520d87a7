/**
 * Remote catalog client
 *
 * The catalog is a GitHub repository whose latest release carries the
 * pre-built artifacts as release assets. The release listing is fetched
 * with a conditional request and cached on disk next to its entity tag.
 */

import { readFileSync, writeFileSync, renameSync, mkdirSync, rmSync } from 'node:fs';
import { open } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { IncomingHttpHeaders } from 'node:http';
import { request, type Dispatcher } from 'undici';
import { z } from 'zod';
import { RATE_LIMIT_ISSUE_URL } from './config.js';
import type { CacheDirectory } from './cache-dir.js';
import { CatalogError, RateLimitError, isErrnoException } from './errors.js';
import type { Logger } from './logger.js';
import type { CatalogRelease, RemoteAsset } from './types.js';

const DEFAULT_RETRY_SECONDS = 60;
const MAX_REDIRECTS = 5;

const ReleaseSchema = z.object({
  name: z.string().min(1, 'Release name cannot be empty'),
  assets: z.array(
    z.object({
      name: z.string().min(1),
      size: z.number().int().nonnegative(),
      browser_download_url: z.string().url(),
    })
  ),
});

export interface CatalogClientOptions {
  /** API base URL, e.g. `https://api.github.com` */
  api: string;
  /** `owner/name` of the catalog repository */
  repository: string;
  token: string | undefined;
  cache: CacheDirectory;
  logger: Logger;
  /** Custom undici dispatcher (tests pass a MockAgent) */
  dispatcher?: Dispatcher;
  now?: () => Date;
}

function headerValue(headers: IncomingHttpHeaders, name: string): string | undefined {
  const value = headers[name];
  if (Array.isArray(value)) return value[0];
  return value;
}

/**
 * Duration as `H:MM:SS`
 */
export function formatDuration(totalSeconds: number): string {
  const seconds = Math.max(0, totalSeconds);
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  const s = seconds % 60;
  return `${h}:${m.toString().padStart(2, '0')}:${s.toString().padStart(2, '0')}`;
}

/**
 * Delay until the catalog accepts requests again, rounded to the second.
 *
 * An exhausted quota with a reset timestamp wins; otherwise `retry-after`,
 * otherwise a fixed default.
 */
export function retryDelayFromHeaders(
  headers: IncomingHttpHeaders,
  now: Date = new Date()
): { seconds: number; retryAt: Date } {
  const remaining = headerValue(headers, 'x-ratelimit-remaining');
  const reset = headerValue(headers, 'x-ratelimit-reset');

  let delayMs: number;
  let retryAt: Date;

  if (remaining !== undefined && Number(remaining) === 0 && reset) {
    retryAt = new Date(Number(reset) * 1000);
    delayMs = retryAt.getTime() - now.getTime();
  } else {
    const after = headerValue(headers, 'retry-after');
    const afterSeconds = after === undefined ? Number.NaN : Number(after);
    delayMs = (Number.isFinite(afterSeconds) ? afterSeconds : DEFAULT_RETRY_SECONDS) * 1000;
    retryAt = new Date(now.getTime() + delayMs);
  }

  return { seconds: Math.round(delayMs / 1000), retryAt };
}

/**
 * Throw a RateLimitError with retry guidance for 403/429 responses
 */
export function assertNotRateLimited(
  statusCode: number,
  headers: IncomingHttpHeaders,
  options: { token: string | undefined; now?: Date }
): void {
  if (statusCode !== 403 && statusCode !== 429) return;

  const { seconds, retryAt } = retryDelayFromHeaders(headers, options.now);
  let message =
    `Catalog API rate limit exceeded (HTTP ${statusCode}). ` +
    `Retry in ${formatDuration(seconds)} at ${retryAt.toISOString()}. ` +
    `Seeing this often? Please add a comment to this issue: ${RATE_LIMIT_ISSUE_URL}`;
  if (!options.token) {
    message += '\nIf running in CI, pass `GH_TOKEN` environment variable';
  }
  throw new RateLimitError(message, seconds, retryAt);
}

export function parseRelease(raw: string): CatalogRelease {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new CatalogError('Catalog release listing is not valid JSON', { cause: error });
  }

  const result = ReleaseSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown';
    throw new CatalogError(`Unexpected catalog release listing (${where})`);
  }

  const release = result.data;
  return {
    name: release.name,
    assets: release.assets.map((asset): RemoteAsset => ({
      name: asset.name,
      size: asset.size,
      downloadUrl: asset.browser_download_url,
      releaseName: release.name,
    })),
  };
}

function readOptional(path: string): string | null {
  try {
    return readFileSync(path, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') return null;
    throw error;
  }
}

export class CatalogClient {
  private readonly options: CatalogClientOptions;

  constructor(options: CatalogClientOptions) {
    this.options = options;
  }

  get latestReleaseUrl(): string {
    return `${this.options.api}/repos/${this.options.repository}/releases/latest`;
  }

  private now(): Date {
    return this.options.now ? this.options.now() : new Date();
  }

  private async send(
    url: string,
    headers: Record<string, string>
  ): Promise<Dispatcher.ResponseData> {
    try {
      return await request(url, {
        method: 'GET',
        headers,
        ...(this.options.dispatcher && { dispatcher: this.options.dispatcher }),
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new CatalogError(`Unable to reach ${url}: ${reason}`, { cause: error });
    }
  }

  /**
   * Fetch the latest catalog release.
   *
   * 304 reuses the stored listing without writing anything; 200 replaces the
   * stored listing and entity tag.
   */
  async getLatestRelease(): Promise<CatalogRelease> {
    const { cache, logger, token } = this.options;
    const url = this.latestReleaseUrl;

    const headers: Record<string, string> = {
      'Accept': 'application/vnd.github+json',
      'X-GitHub-Api-Version': '2022-11-28',
      'User-Agent': 'charmwarm',
    };
    const etag = readOptional(cache.etagFile);
    if (etag) headers['If-None-Match'] = etag;
    if (token) headers['Authorization'] = `Bearer ${token}`;

    logger.debug('Getting latest catalog release');
    const { statusCode, headers: responseHeaders, body } = await this.send(url, headers);

    if (statusCode === 304) {
      await body.text();
      logger.debug('HTTP cache hit for latest release');
      const stored = readOptional(cache.releaseFile);
      if (stored === null) {
        throw new CatalogError(
          `Catalog answered 304 Not Modified but ${cache.releaseFile} is missing`,
          { status: statusCode }
        );
      }
      return parseRelease(stored);
    }

    if (statusCode !== 200) {
      const text = await body.text();
      assertNotRateLimited(statusCode, responseHeaders, { token, now: this.now() });
      throw new CatalogError(`Failed to fetch latest release: ${statusCode} - ${text}`, {
        status: statusCode,
      });
    }

    logger.debug('HTTP cache miss for latest release');
    const raw = await body.text();
    const release = parseRelease(raw);

    cache.ensureRoot();
    writeFileSync(cache.releaseFile, raw);
    const newEtag = headerValue(responseHeaders, 'etag');
    if (newEtag) {
      writeFileSync(cache.etagFile, newEtag);
    } else {
      rmSync(cache.etagFile, { force: true });
    }

    return release;
  }

  /**
   * Open a download, following redirects manually
   */
  private async openDownload(url: string, redirectCount = 0): Promise<Dispatcher.ResponseData['body']> {
    if (redirectCount > MAX_REDIRECTS) {
      throw new CatalogError(`Too many redirects downloading ${url}`);
    }

    const { statusCode, headers, body } = await this.send(url, { 'User-Agent': 'charmwarm' });

    if (statusCode >= 300 && statusCode < 400) {
      await body.text();
      const location = headerValue(headers, 'location');
      if (!location) {
        throw new CatalogError(`Redirect without location: ${statusCode}`, { status: statusCode });
      }
      return this.openDownload(new URL(location, url).toString(), redirectCount + 1);
    }

    if (statusCode !== 200) {
      await body.text();
      assertNotRateLimited(statusCode, headers, { token: this.options.token, now: this.now() });
      throw new CatalogError(`Failed to download ${url}: ${statusCode}`, { status: statusCode });
    }

    return body;
  }

  /**
   * Stream an asset to the shared temporary path, then move it to
   * `destination`. The destination only ever holds a complete file.
   */
  async downloadAsset(
    asset: RemoteAsset,
    destination: string,
    onChunk: (bytes: number) => void = () => {}
  ): Promise<void> {
    const { cache } = this.options;
    const temporary = cache.partialDownloadFile;

    cache.ensureRoot();
    const handle = await open(temporary, 'w');
    try {
      const body = await this.openDownload(asset.downloadUrl);
      for await (const chunk of body) {
        const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
        await handle.write(buffer);
        onChunk(buffer.length);
      }
    } finally {
      await handle.close();
    }

    mkdirSync(dirname(destination), { recursive: true });
    renameSync(temporary, destination);
  }
}
