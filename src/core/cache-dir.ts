/**
 * Cache root management
 *
 * Layout:
 *   <root>/charmwarm_version.txt        tool fingerprint
 *   <root>/release_name.txt             catalog release fingerprint
 *   <root>/latest_release_etag.txt      conditional request cache
 *   <root>/latest_release.json
 *   <root>/download.part                in-flight download
 *   <root>/archives/<asset>             raw downloaded archives
 *   <root>/charms/<repo>:<path>/<platform>/...   unpacked archives
 *   <root>/charmcraft/...               charmcraft shared cache (wheels)
 *
 * Either fingerprint changing wipes the whole root.
 */

import {
  mkdirSync,
  readFileSync,
  rmSync,
  writeFileSync,
} from 'node:fs';
import { join } from 'node:path';
import { isErrnoException } from './errors.js';
import type { Logger } from './logger.js';
import type { FingerprintKind } from './types.js';

const FINGERPRINT_FILES: Record<FingerprintKind, string> = {
  tool: 'charmwarm_version.txt',
  release: 'release_name.txt',
};

const FINGERPRINT_KINDS: readonly FingerprintKind[] = ['tool', 'release'];

const FINGERPRINT_LABELS: Record<FingerprintKind, string> = {
  tool: 'charmwarm',
  release: 'Catalog release',
};

/** Directory name charmcraft uses for its build-base shared cache */
export const BUILD_BASE_DIRECTORY = 'charmcraft-buildd-base-v7';
/** Name charmcraft 2.7 looks under; kept as a symlink to the v7 directory */
export const COMPAT_BUILD_BASE_DIRECTORY = 'charmcraft-buildd-base-v8.0';

export class CacheDirectory {
  readonly root: string;
  private readonly logger: Logger;

  constructor(root: string, logger: Logger) {
    this.root = root;
    this.logger = logger;
  }

  get etagFile(): string {
    return join(this.root, 'latest_release_etag.txt');
  }

  get releaseFile(): string {
    return join(this.root, 'latest_release.json');
  }

  /** Single shared temporary download path; downloads run one at a time */
  get partialDownloadFile(): string {
    return join(this.root, 'download.part');
  }

  get archivesDir(): string {
    return join(this.root, 'archives');
  }

  get charmsDir(): string {
    return join(this.root, 'charms');
  }

  /** Shared cache handed to charmcraft in the wheel scheme */
  get sharedCacheDir(): string {
    return join(this.root, 'charmcraft');
  }

  get dependencyReportFile(): string {
    return join(this.root, 'report.json');
  }

  fingerprintFile(kind: FingerprintKind): string {
    return join(this.root, FINGERPRINT_FILES[kind]);
  }

  /**
   * Create the cache root if it does not exist
   */
  ensureRoot(): void {
    mkdirSync(this.root, { recursive: true });
  }

  /**
   * Remove the cache root and recreate it empty
   */
  clear(): void {
    rmSync(this.root, { recursive: true, force: true });
    mkdirSync(this.root, { recursive: true });
  }

  readFingerprint(kind: FingerprintKind): string | null {
    try {
      return readFileSync(this.fingerprintFile(kind), 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') return null;
      throw error;
    }
  }

  /**
   * Wipe the whole root if the recorded fingerprint differs from `current`.
   *
   * The fingerprint is written on every exit path, including a wipe that
   * failed partway. Fingerprints of the other kinds are restored after a
   * wipe, so the root stays tied to every version that produced it.
   *
   * @returns whether the root was wiped
   */
  reconcileVersion(kind: FingerprintKind, current: string): boolean {
    let wiped = false;
    const retained = new Map<FingerprintKind, string>();
    try {
      const recorded = this.readFingerprint(kind);
      if (recorded !== null && recorded !== current) {
        this.logger.info(
          `${FINGERPRINT_LABELS[kind]} update from ${recorded} to ${current} detected. Cleaning cache`
        );
        for (const other of FINGERPRINT_KINDS) {
          if (other === kind) continue;
          const value = this.readFingerprint(other);
          if (value !== null) retained.set(other, value);
        }
        this.clear();
        wiped = true;
      }
    } finally {
      mkdirSync(this.root, { recursive: true });
      for (const [other, value] of retained) {
        writeFileSync(this.fingerprintFile(other), value);
      }
      writeFileSync(this.fingerprintFile(kind), current);
    }
    return wiped;
  }
}
