/**
 * Artifact matching: target identities against a catalog release
 */

import { existsSync } from 'node:fs';
import { join } from 'node:path';
import type { Logger } from './logger.js';
import { archiveScheme, wheelScheme, type AssetNameScheme } from './schemes.js';
import type {
  ArchiveAssetFields,
  CatalogRelease,
  DownloadPlan,
  Platform,
  PlatformIdentity,
  RemoteAsset,
  WheelAssetFields,
  WheelIdentity,
} from './types.js';

interface ParsedAsset<F> {
  asset: RemoteAsset;
  fields: F;
}

export interface MatchOptions {
  logger: Logger;
  /** Placement existence check; defaults to the filesystem */
  exists?: (path: string) => boolean;
}

/**
 * Parse every asset name with `scheme`, dropping names it does not accept
 */
export function parseAssets<F>(
  scheme: AssetNameScheme<F>,
  release: CatalogRelease,
  logger: Logger
): ParsedAsset<F>[] {
  const parsed: ParsedAsset<F>[] = [];
  let rejected = 0;
  for (const asset of release.assets) {
    const result = scheme.parse(asset.name);
    if (result.ok) {
      parsed.push({ asset, fields: result.value });
    } else {
      rejected++;
    }
  }
  if (rejected > 0) {
    logger.debug(`Ignored ${rejected} asset(s) of release ${release.name} not in '${scheme.scheme}' format`);
  }
  return parsed;
}

/**
 * First asset satisfying `matches`; later duplicates are only reported
 */
function firstMatch<F>(
  parsed: ParsedAsset<F>[],
  matches: (fields: F) => boolean,
  describe: string,
  logger: Logger
): ParsedAsset<F> | null {
  const candidates = parsed.filter((p) => matches(p.fields));
  const [first] = candidates;
  if (!first) return null;
  if (candidates.length > 1) {
    logger.debug(`${candidates.length} assets match ${describe}; using ${first.asset.name}`);
  }
  return first;
}

function describeWheel(identity: WheelIdentity): string {
  return `${identity.name} ${identity.version} ${identity.series} ${identity.architecture}`;
}

/**
 * Placement of a wheel inside charmcraft's build-base shared cache
 */
export function wheelPlacement(buildBaseDir: string, fields: WheelAssetFields): string {
  return join(
    buildBaseDir,
    `BuilddBaseAlias.${fields.series.toUpperCase()}`,
    ...fields.parentPath,
    fields.wheelFileName
  );
}

/**
 * Match every wheel identity on name, version, series and architecture
 */
export function planWheels(
  identities: WheelIdentity[],
  release: CatalogRelease,
  buildBaseDir: string,
  options: MatchOptions
): DownloadPlan<WheelIdentity> {
  const { logger } = options;
  const exists = options.exists ?? existsSync;
  const parsed = parseAssets(wheelScheme, release, logger);
  const plan: DownloadPlan<WheelIdentity> = { entries: [], placed: [], unmatched: [] };

  for (const identity of identities) {
    const match = firstMatch(
      parsed,
      (fields) =>
        fields.name === identity.name &&
        fields.version === identity.version &&
        fields.series === identity.series &&
        fields.architecture === identity.architecture,
      describeWheel(identity),
      logger
    );

    if (!match) {
      plan.unmatched.push(identity);
      logger.debug(`No pre-built wheel found for ${describeWheel(identity)}`);
      continue;
    }

    const entry = { identity, asset: match.asset, path: wheelPlacement(buildBaseDir, match.fields) };
    if (exists(entry.path)) {
      logger.debug(`${match.fields.wheelFileName} already downloaded for ${identity.series}`);
      plan.placed.push(entry);
    } else {
      plan.entries.push(entry);
    }
  }

  return plan;
}

function sameArchiveFields(a: ArchiveAssetFields, b: ArchiveAssetFields): boolean {
  return (
    a.repositoryKey === b.repositoryKey &&
    a.charmPathKey === b.charmPathKey &&
    a.platformKey === b.platformKey
  );
}

export function platformIdentities(
  repository: string,
  charmPath: string,
  platforms: Platform[]
): PlatformIdentity[] {
  return platforms.map((platform): PlatformIdentity => ({ kind: 'platform', platform, repository, charmPath }));
}

/**
 * First candidate repository with at least one asset for any platform.
 *
 * The chosen repository is then used exclusively; assets are never mixed
 * across candidates.
 */
export function selectRepository(
  candidates: Iterable<string>,
  platforms: Platform[],
  charmPath: string,
  release: CatalogRelease,
  logger: Logger
): string | null {
  const parsed = parseAssets(archiveScheme, release, logger);

  for (const repository of candidates) {
    const found = platformIdentities(repository, charmPath, platforms).some((identity) => {
      const expected = archiveScheme.fieldsFor(identity);
      return parsed.some((p) => sameArchiveFields(p.fields, expected));
    });
    if (found) {
      logger.debug(`Detected repository ${repository}`);
      return repository;
    }
    logger.debug(`No pre-built cache for repository ${repository}`);
  }

  return null;
}

/**
 * Match each platform of the chosen repository to its archive
 */
export function planArchives(
  identities: PlatformIdentity[],
  release: CatalogRelease,
  archivesDir: string,
  options: MatchOptions
): DownloadPlan<PlatformIdentity> {
  const { logger } = options;
  const exists = options.exists ?? existsSync;
  const parsed = parseAssets(archiveScheme, release, logger);
  const plan: DownloadPlan<PlatformIdentity> = { entries: [], placed: [], unmatched: [] };

  for (const identity of identities) {
    const expected = archiveScheme.fieldsFor(identity);
    const match = firstMatch(
      parsed,
      (fields) => sameArchiveFields(fields, expected),
      `${identity.repository} ${identity.charmPath} ${identity.platform.shorthand}`,
      logger
    );

    if (!match) {
      plan.unmatched.push(identity);
      logger.debug(
        `No pre-built cache for repository '${identity.repository}' and platform '${identity.platform.shorthand}'`
      );
      continue;
    }

    const entry = { identity, asset: match.asset, path: join(archivesDir, match.asset.name) };
    if (exists(entry.path)) {
      logger.debug(`Cache already downloaded for platform: '${identity.platform.shorthand}'`);
      plan.placed.push(entry);
    } else {
      plan.entries.push(entry);
    }
  }

  return plan;
}
