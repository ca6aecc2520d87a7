/**
 * charmwarm type definitions
 */

/**
 * Asset-name encoding scheme in force for a run. A catalog release is
 * produced wholly by one scheme; names are never sniffed per asset.
 */
export type EncodingScheme = 'wheel' | 'archive';

/** Debian-style architecture names, as used by charmcraft */
export type Architecture = 'amd64' | 'arm64' | 'ppc64el' | 's390x';

/** Fingerprint kinds that invalidate the whole cache root when they change */
export type FingerprintKind = 'tool' | 'release';

/**
 * ST124 shorthand platform, e.g. `ubuntu@22.04:amd64`
 */
export interface Platform {
  /** Shorthand as written in charmcraft.yaml */
  shorthand: string;
  distribution: string;
  series: string;
  architecture: string;
}

export interface WheelIdentity {
  kind: 'wheel';
  /** PEP 503 normalized distribution name */
  name: string;
  version: string;
  /** Ubuntu codename, e.g. `focal` */
  series: string;
  architecture: Architecture;
}

export interface PlatformIdentity {
  kind: 'platform';
  platform: Platform;
  /** `owner/name` of the upstream repository */
  repository: string;
  /** Path from the repository root to the directory with charmcraft.yaml (`.` at the root) */
  charmPath: string;
}

export type TargetIdentity = WheelIdentity | PlatformIdentity;

export interface RemoteAsset {
  name: string;
  size: number;
  downloadUrl: string;
  releaseName: string;
}

export interface CatalogRelease {
  name: string;
  assets: RemoteAsset[];
}

export interface PlanEntry<T extends TargetIdentity = TargetIdentity> {
  identity: T;
  asset: RemoteAsset;
  /** Where the downloaded file is moved once complete */
  path: string;
}

export interface DownloadPlan<T extends TargetIdentity = TargetIdentity> {
  /** Matched and not yet present locally */
  entries: PlanEntry<T>[];
  /** Matched and already present at their placement path */
  placed: PlanEntry<T>[];
  /** No asset in the release matches */
  unmatched: T[];
}

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

/** Dimensions recovered from a `wheel` scheme asset name */
export interface WheelAssetFields {
  wheelFileName: string;
  name: string;
  version: string;
  series: string;
  architecture: string;
  /** Sub-path below the build-base alias directory */
  parentPath: string[];
}

/** Dimensions recovered from an `archive` scheme asset name */
export interface ArchiveAssetFields {
  repositoryKey: string;
  charmPathKey: string;
  platformKey: string;
}

export interface DependencyReportEntry {
  name: string;
  version: string;
}

/**
 * One `bases` entry of charmcraft.yaml, either `{ channel, architectures }`
 * or `{ build-on: [...] }`
 */
export interface ManifestBase {
  channel?: string;
  architectures?: string[];
  buildOn?: Array<{ channel?: string; architectures?: string[] }>;
}

export interface BuildManifest {
  /** Directory holding charmcraft.yaml */
  directory: string;
  bases: ManifestBase[];
  /** `platforms` mapping as written; shorthand keys map to null */
  platforms: Record<string, unknown> | null;
  /** `parts.charm.charm-binary-python-packages` */
  binaryPackages: string[];
  /** Declared source links, from metadata.yaml `source` or charmcraft.yaml `links.source` */
  sourceUrls: string[];
  /** File the source links were read from */
  sourceFile: 'metadata.yaml' | 'charmcraft.yaml';
}

export interface ProgressReporter {
  advance(bytes: number): void;
  complete(): void;
}
