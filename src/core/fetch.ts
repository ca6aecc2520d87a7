/**
 * Fetch & unpack engine
 *
 * Per artifact: needed → downloading → downloaded → (unpacked) → placed.
 * Everything runs sequentially; a later run repairs what an interrupted run
 * left behind.
 */

import { existsSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, isAbsolute, join, relative, resolve, sep } from 'node:path';
import * as tar from 'tar';
import { BUILD_BASE_DIRECTORY, type CacheDirectory } from './cache-dir.js';
import { ArchiveIntegrityError } from './errors.js';
import type { Logger } from './logger.js';
import type { DownloadPlan, PlanEntry, PlatformIdentity, ProgressReporter, RemoteAsset } from './types.js';

/** Written once every archive of a charm directory has been unpacked */
export const UNPACKED_SENTINEL = 'all_archives_fully_unpacked';

export interface AssetDownloader {
  downloadAsset(asset: RemoteAsset, destination: string, onChunk: (bytes: number) => void): Promise<void>;
}

export interface FetchEngineOptions {
  downloader: AssetDownloader;
  cache: CacheDirectory;
  logger: Logger;
  createProgress: (total: number) => ProgressReporter;
}

function isInside(root: string, target: string): boolean {
  const rel = relative(root, target);
  return rel === '' || (!rel.startsWith(`..${sep}`) && rel !== '..' && !isAbsolute(rel));
}

function looksAbsolute(path: string): boolean {
  return isAbsolute(path) || path.startsWith('/') || /^[a-zA-Z]:[\\/]/.test(path);
}

/**
 * Throw if an archive entry (or the target of a link entry) would land
 * outside `root`
 */
export function assertEntryContained(
  archive: string,
  root: string,
  entry: { path: string; type?: string; linkpath?: string | undefined }
): void {
  if (looksAbsolute(entry.path)) {
    throw new ArchiveIntegrityError(archive, entry.path, 'has an absolute path');
  }
  const destination = resolve(root, entry.path);
  if (!isInside(root, destination)) {
    throw new ArchiveIntegrityError(archive, entry.path, 'escapes the target directory');
  }

  if (!entry.linkpath) return;
  if (entry.type === 'SymbolicLink') {
    if (looksAbsolute(entry.linkpath)) {
      throw new ArchiveIntegrityError(archive, entry.path, `links to absolute path '${entry.linkpath}'`);
    }
    if (!isInside(root, resolve(dirname(destination), entry.linkpath))) {
      throw new ArchiveIntegrityError(archive, entry.path, `links outside the target directory ('${entry.linkpath}')`);
    }
  } else if (entry.type === 'Link') {
    // Hard link targets are relative to the archive root
    if (looksAbsolute(entry.linkpath) || !isInside(root, resolve(root, entry.linkpath))) {
      throw new ArchiveIntegrityError(archive, entry.path, `hard links outside the target directory ('${entry.linkpath}')`);
    }
  }
}

/**
 * List `archive` and validate every entry against `root` before anything
 * is written
 */
export async function assertArchiveContained(archive: string, root: string): Promise<number> {
  const entries: Array<{ path: string; type?: string; linkpath?: string | undefined }> = [];
  await tar.t({
    file: archive,
    filter: (path, entry) => {
      if ('linkpath' in entry) {
        entries.push({ path, type: entry.type, linkpath: entry.linkpath });
      } else {
        entries.push({ path });
      }
      return true;
    },
  });
  for (const entry of entries) {
    assertEntryContained(archive, root, entry);
  }
  return entries.length;
}

/**
 * Directory a charm's archives are unpacked into
 */
export function charmCacheDir(cache: CacheDirectory, repository: string, charmPath: string): string {
  return join(cache.charmsDir, `${repository.replace(/\//g, '_')}:${charmPath.replace(/\//g, '_')}`);
}

export class FetchEngine {
  private readonly options: FetchEngineOptions;

  constructor(options: FetchEngineOptions) {
    this.options = options;
  }

  /**
   * Download every queued entry of `plan` to its placement path.
   *
   * Progress is measured against the queued entries only.
   */
  async downloadPlan<T extends DownloadPlan>(plan: T): Promise<void> {
    const { downloader, logger } = this.options;
    const total = plan.entries.reduce((sum, entry) => sum + entry.asset.size, 0);
    const progress = this.options.createProgress(total);

    for (const entry of plan.entries) {
      if (existsSync(entry.path)) {
        logger.debug(`${entry.asset.name} already present`);
        continue;
      }
      await downloader.downloadAsset(entry.asset, entry.path, (bytes) => progress.advance(bytes));
      logger.debug(`Downloaded ${entry.asset.name}`);
    }

    progress.complete();
  }

  /**
   * Unpack each platform's archive into `charmDir/<platform>`.
   *
   * A charm directory without the sentinel is the leftover of an
   * interrupted run and is deleted whole before unpacking again.
   */
  async unpackArchives(charmDir: string, entries: PlanEntry<PlatformIdentity>[]): Promise<void> {
    const { logger } = this.options;
    const sentinel = join(charmDir, UNPACKED_SENTINEL);

    if (!existsSync(sentinel) && existsSync(charmDir)) {
      logger.debug('Partially unpacked archive detected. Deleting & re-unpacking');
      rmSync(charmDir, { recursive: true, force: true });
    }
    rmSync(sentinel, { force: true });

    for (const entry of entries) {
      const platform = entry.identity.platform.shorthand;
      const platformDir = join(charmDir, platform);
      if (existsSync(platformDir)) {
        logger.debug(`Cache already unpacked for platform: '${platform}'`);
        continue;
      }

      const target = join(platformDir, BUILD_BASE_DIRECTORY);
      const count = await assertArchiveContained(entry.path, target);
      mkdirSync(target, { recursive: true });
      await tar.x({ file: entry.path, cwd: target, strict: true });
      logger.debug(`Unpacked cache for platform: '${platform}' (${count} entries)`);
    }

    mkdirSync(charmDir, { recursive: true });
    writeFileSync(sentinel, '');
  }
}
