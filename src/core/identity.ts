/**
 * Target identity resolution
 *
 * Everything here works from local state only: the dependency report, the
 * build manifest and the machine's architecture.
 */

import { PreconditionError, ValidationError } from './errors.js';
import type {
  Architecture,
  BuildManifest,
  DependencyReportEntry,
  ManifestBase,
  Platform,
  WheelIdentity,
} from './types.js';

const NODE_ARCHITECTURES: Record<string, Architecture> = {
  x64: 'amd64',
  arm64: 'arm64',
  ppc64: 'ppc64el',
  s390x: 's390x',
};

/** Ubuntu release → codename, as used in build-base directory names */
export const SERIES: Record<string, string> = {
  '20.04': 'focal',
  '22.04': 'jammy',
  '24.04': 'noble',
};

const SHORTHAND_PATTERN = /^([a-z][a-z0-9-]*)@([0-9]+(?:\.[0-9]+)*):([a-z0-9]+)$/;

/**
 * Map Node's `process.arch` to charmcraft's architecture name
 */
export function detectArchitecture(nodeArch: string = process.arch): Architecture {
  const architecture = NODE_ARCHITECTURES[nodeArch];
  if (!architecture) {
    throw new PreconditionError(`Unsupported machine architecture: ${nodeArch}`);
  }
  return architecture;
}

/**
 * PEP 503 normalized project name
 */
export function normalizeName(name: string): string {
  return name.trim().toLowerCase().replace(/[-_.]+/g, '-');
}

export function parsePlatform(shorthand: string): Platform {
  const match = SHORTHAND_PATTERN.exec(shorthand);
  if (!match) {
    throw new ValidationError(`'${shorthand}' is not a valid ST124 shorthand notation platform (e.g. 'ubuntu@22.04:amd64')`);
  }
  const [, distribution = '', series = '', architecture = ''] = match;
  return { shorthand, distribution, series, architecture };
}

/**
 * Platforms declared in charmcraft.yaml `platforms`. Only shorthand keys
 * with empty values are supported.
 */
export function declaredPlatforms(manifest: BuildManifest): Platform[] {
  if (!manifest.platforms) return [];
  return Object.entries(manifest.platforms).map(([key, value]) => {
    if (value !== null && value !== undefined) {
      throw new ValidationError(
        `charmcraft.yaml platform '${key}' uses 'build-on'/'build-for'. ` +
          'Shorthand notation (e.g. `ubuntu@22.04:amd64:`) is required'
      );
    }
    return parsePlatform(key);
  });
}

/**
 * Base channels (e.g. `22.04`) built on `architecture`
 */
export function basesForArchitecture(bases: ManifestBase[], architecture: Architecture): string[] {
  const channels: string[] = [];

  for (const entry of bases) {
    let base: { channel?: string; architectures?: string[] } = entry;
    if (entry.buildOn) {
      if (entry.buildOn.length !== 1 || !entry.buildOn[0]) {
        throw new ValidationError(
          `Multiple 'build-on' bases (${entry.buildOn.length}) in one charmcraft.yaml base not supported`
        );
      }
      base = entry.buildOn[0];
    }

    const architectures = base.architectures ?? ['amd64'];
    if (architectures.length !== 1) {
      throw new ValidationError(
        `Multiple architectures (${architectures.join(', ')}) in one charmcraft.yaml base not supported. ` +
          'Use one base per architecture'
      );
    }
    if (!base.channel) {
      throw new ValidationError("charmcraft.yaml base is missing 'channel'");
    }
    if (architectures[0] === architecture) {
      channels.push(base.channel);
    }
  }

  return channels;
}

export function seriesForChannel(channel: string): string {
  const series = SERIES[channel];
  if (!series) {
    throw new ValidationError(
      `Unsupported base channel '${channel}'. Supported: ${Object.keys(SERIES).join(', ')}`
    );
  }
  return series;
}

/**
 * One identity per non-excluded dependency per base of this architecture
 */
export function resolveWheelIdentities(
  dependencies: DependencyReportEntry[],
  manifest: BuildManifest,
  architecture: Architecture
): { identities: WheelIdentity[]; skipped: string[] } {
  const seriesList = basesForArchitecture(manifest.bases, architecture).map(seriesForChannel);
  const excluded = new Set(manifest.binaryPackages.map(normalizeName));
  const identities: WheelIdentity[] = [];
  const skipped: string[] = [];

  for (const dependency of dependencies) {
    const name = normalizeName(dependency.name);
    if (excluded.has(name)) {
      skipped.push(dependency.name);
      continue;
    }
    for (const series of seriesList) {
      identities.push({
        kind: 'wheel',
        name,
        version: dependency.version,
        series,
        architecture,
      });
    }
  }

  return { identities, skipped };
}

/**
 * Platforms to build.
 *
 * Without a selection: every declared platform of this architecture. A
 * selection is validated against the manifest and the architecture.
 */
export function resolvePlatforms(
  selected: string[] | undefined,
  declared: Platform[],
  architecture: Architecture
): Platform[] {
  if (!selected || selected.length === 0) {
    return declared.filter((p) => p.architecture === architecture);
  }

  const seen = new Set<string>();
  for (const shorthand of selected) {
    if (seen.has(shorthand)) {
      throw new ValidationError(`--platform '${shorthand}' passed more than once. Is this a typo?`);
    }
    seen.add(shorthand);
  }

  const declaredNames = declared.map((p) => p.shorthand);
  return selected.map((shorthand) => {
    const platform = parsePlatform(shorthand);
    if (!declaredNames.includes(shorthand)) {
      throw new ValidationError(
        `--platform '${shorthand}' not found in charmcraft.yaml 'platforms': ` +
          `[${declaredNames.map((n) => `'${n}'`).join(', ')}]`
      );
    }
    if (platform.architecture !== architecture) {
      throw new ValidationError(
        `Architecture of --platform '${shorthand}' does not match architecture of this machine ('${architecture}')`
      );
    }
    return platform;
  });
}
