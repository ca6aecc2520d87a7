/**
 * Run configuration
 *
 * Resolved once per command from CLI options and the environment, then
 * passed explicitly to every component.
 */

import { join } from 'node:path';
import { homedir, platform } from 'node:os';
import { ValidationError } from './errors.js';
import type { EncodingScheme } from './types.js';

export const VERSION = '0.4.0';
export const PACKAGE_NAME = 'charmwarm';

const IS_WINDOWS = platform() === 'win32';
const IS_MACOS = platform() === 'darwin';

export const DEFAULT_CATALOG_API = 'https://api.github.com';
export const DEFAULT_CATALOG_REPOSITORY = 'canonical/charmcraftcache-hub';
export const DEFAULT_SCHEME: EncodingScheme = 'archive';

/** Issue collecting reports of hitting the catalog rate limit */
export const RATE_LIMIT_ISSUE_URL = 'https://github.com/canonical/charmcraftcache/issues/1';

/** Oldest charmcraft each scheme's cache layout works with */
export const MINIMUM_BUILD_TOOL_VERSION: Record<EncodingScheme, string> = {
  wheel: '2.5.4',
  archive: '3.3.0',
};

export interface RunConfig {
  verbose: boolean;
  cacheRoot: string;
  catalogApi: string;
  catalogRepository: string;
  scheme: EncodingScheme;
  /** Bearer token for the catalog API */
  token: string | undefined;
  toolVersion: string;
  minimumBuildToolVersion: string;
  updateCheck: boolean;
  ci: boolean;
  /** Directory holding charmcraft.yaml */
  workingDirectory: string;
}

export interface ConfigOptions {
  verbose?: boolean;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * User-scoped cache location per platform
 */
export function defaultCacheRoot(env: NodeJS.ProcessEnv = process.env): string {
  if (IS_WINDOWS) {
    return join(env['LOCALAPPDATA'] || join(homedir(), 'AppData', 'Local'), PACKAGE_NAME);
  }
  if (IS_MACOS) {
    return join(homedir(), 'Library', 'Caches', PACKAGE_NAME);
  }
  return join(env['XDG_CACHE_HOME'] || join(homedir(), '.cache'), PACKAGE_NAME);
}

export function parseScheme(value: string): EncodingScheme {
  if (value === 'wheel' || value === 'archive') return value;
  throw new ValidationError(`Unknown encoding scheme '${value}'. Expected 'archive' or 'wheel'`);
}

export function resolveConfig(options: ConfigOptions = {}): RunConfig {
  const env = options.env ?? process.env;
  const scheme = parseScheme(env['CHARMWARM_SCHEME'] || DEFAULT_SCHEME);

  return {
    verbose: options.verbose ?? false,
    cacheRoot: env['CHARMWARM_CACHE_DIR'] || defaultCacheRoot(env),
    catalogApi: (env['CHARMWARM_CATALOG_API'] || DEFAULT_CATALOG_API).replace(/\/+$/, ''),
    catalogRepository: env['CHARMWARM_CATALOG_REPOSITORY'] || DEFAULT_CATALOG_REPOSITORY,
    scheme,
    token: env['GH_TOKEN'] || undefined,
    toolVersion: VERSION,
    minimumBuildToolVersion: MINIMUM_BUILD_TOOL_VERSION[scheme],
    updateCheck: !env['CHARMWARM_NO_UPDATE_CHECK'],
    ci: env['CI'] === 'true',
    workingDirectory: options.cwd ?? process.cwd(),
  };
}
