/**
 * charmwarm - artifact resolution and local cache engine for fast
 * first-time charmcraft builds
 *
 * @example
 * ```ts
 * import { Orchestrator, createLogger, resolveConfig } from 'charmwarm';
 *
 * const config = resolveConfig({ verbose: true });
 * const orchestrator = new Orchestrator({ config, logger: createLogger({ verbose: true }) });
 *
 * process.exitCode = await orchestrator.pack({ platforms: ['ubuntu@22.04:amd64'] });
 * ```
 *
 * @packageDocumentation
 */

// Orchestration
export {
  Orchestrator,
  addIssueUrl,
  pipDependencyReport,
  REQUIREMENTS_FILE,
} from './core/orchestrator.js';
export type {
  OrchestratorOptions,
  PackOptions,
  ReleaseCatalog,
  DependencyReportGenerator,
} from './core/orchestrator.js';

// Configuration & logging
export {
  resolveConfig,
  defaultCacheRoot,
  parseScheme,
  VERSION,
  MINIMUM_BUILD_TOOL_VERSION,
} from './core/config.js';
export type { RunConfig, ConfigOptions } from './core/config.js';
export { createLogger, formatTimestamp } from './core/logger.js';
export type { Logger, LoggerOptions, LogLevel } from './core/logger.js';

// Cache & catalog
export { CacheDirectory, BUILD_BASE_DIRECTORY, COMPAT_BUILD_BASE_DIRECTORY } from './core/cache-dir.js';
export {
  CatalogClient,
  parseRelease,
  retryDelayFromHeaders,
  assertNotRateLimited,
  formatDuration,
} from './core/catalog.js';
export type { CatalogClientOptions } from './core/catalog.js';

// Identities & matching
export { readBuildManifest, readDependencyReport } from './core/manifest.js';
export {
  detectArchitecture,
  normalizeName,
  parsePlatform,
  declaredPlatforms,
  resolveWheelIdentities,
  resolvePlatforms,
} from './core/identity.js';
export { wheelScheme, archiveScheme, platformReleaseName } from './core/schemes.js';
export type { AssetNameScheme, ArchiveScheme } from './core/schemes.js';
export { planWheels, planArchives, selectRepository, platformIdentities } from './core/matcher.js';

// Fetch & build
export { FetchEngine, assertEntryContained, UNPACKED_SENTINEL } from './core/fetch.js';
export type { AssetDownloader, FetchEngineOptions } from './core/fetch.js';
export { Charmcraft, ensureBuildToolVersion, SHARED_CACHE_ENV } from './core/build-tool.js';
export type { BuildTool } from './core/build-tool.js';
export { Git, parseGithubRepository, candidateRepositories } from './core/git.js';
export type { GitInspector, Upstream } from './core/git.js';
export { checkForUpdate } from './core/update-check.js';
export { ProgressLine, formatBytes } from './core/progress.js';

// Errors
export {
  ErrorCode,
  CharmwarmError,
  PreconditionError,
  ValidationError,
  RateLimitError,
  CatalogError,
  NoCacheFoundError,
  ArchiveIntegrityError,
} from './core/errors.js';

// Types
export type {
  EncodingScheme,
  Architecture,
  Platform,
  WheelIdentity,
  PlatformIdentity,
  TargetIdentity,
  RemoteAsset,
  CatalogRelease,
  PlanEntry,
  DownloadPlan,
  BuildManifest,
  DependencyReportEntry,
  ProgressReporter,
} from './core/types.js';
