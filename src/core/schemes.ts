/**
 * Catalog asset-name encoding schemes
 *
 * Asset names pack several identity dimensions into one string using
 * delimiter tokens. Names do not say which scheme produced them, so the
 * scheme is chosen by configuration and each parser rejects names that do
 * not follow its own layout.
 *
 * wheel:
 *   <wheel file>.ccchub1.<series>.ccchub2.<arch>.ccchub3.<parent dirs, "_"-joined>.charmcraftcachehub
 * archive:
 *   <owner_repo>_ccchub1_<charm path>_ccchub2_<platform>.tar.gz   ("/" flattened to "_")
 */

import { normalizeName } from './identity.js';
import type {
  ArchiveAssetFields,
  EncodingScheme,
  ParseResult,
  Platform,
  PlatformIdentity,
  WheelAssetFields,
} from './types.js';

export interface AssetNameScheme<F> {
  readonly scheme: EncodingScheme;
  parse(name: string): ParseResult<F>;
}

function fail<T>(error: string): ParseResult<T> {
  return { ok: false, error };
}

/**
 * Split on `token`, requiring exactly one occurrence
 */
function splitOnce(value: string, token: string): [string, string] | null {
  const parts = value.split(token);
  if (parts.length !== 2) return null;
  const [head = '', tail = ''] = parts;
  if (!head || !tail) return null;
  return [head, tail];
}

/**
 * Name and version from a wheel file name
 * (`{distribution}-{version}(-{build})?-{python}-{abi}-{platform}.whl`)
 */
export function parseWheelFileName(fileName: string): ParseResult<{ name: string; version: string }> {
  if (!fileName.endsWith('.whl')) {
    return fail(`'${fileName}' is not a wheel file name`);
  }
  const parts = fileName.slice(0, -'.whl'.length).split('-');
  if (parts.length !== 5 && parts.length !== 6) {
    return fail(`'${fileName}' has ${parts.length} dash-separated fields, expected 5 or 6`);
  }
  const [distribution = '', version = ''] = parts;
  if (!distribution || !version) {
    return fail(`'${fileName}' is missing its name or version`);
  }
  return { ok: true, value: { name: normalizeName(distribution), version } };
}

const WHEEL_SUFFIX = '.charmcraftcachehub';

export const wheelScheme: AssetNameScheme<WheelAssetFields> = {
  scheme: 'wheel',

  parse(name: string): ParseResult<WheelAssetFields> {
    const first = splitOnce(name, '.ccchub1.');
    if (!first) return fail(`'${name}' has no single '.ccchub1.' marker`);
    const [wheelFileName, afterWheel] = first;

    const second = splitOnce(afterWheel, '.ccchub2.');
    if (!second) return fail(`'${name}' has no single '.ccchub2.' marker`);
    const [series, afterSeries] = second;

    const third = splitOnce(afterSeries, '.ccchub3.');
    if (!third) return fail(`'${name}' has no single '.ccchub3.' marker`);
    const [architecture, afterArchitecture] = third;

    if (!afterArchitecture.endsWith(WHEEL_SUFFIX)) {
      return fail(`'${name}' does not end with '${WHEEL_SUFFIX}'`);
    }
    const parent = afterArchitecture.slice(0, -WHEEL_SUFFIX.length);
    if (!parent) return fail(`'${name}' has an empty parent path`);

    const wheel = parseWheelFileName(wheelFileName);
    if (!wheel.ok) return wheel;

    return {
      ok: true,
      value: {
        wheelFileName,
        name: wheel.value.name,
        version: wheel.value.version,
        series,
        architecture,
        parentPath: parent.split('_'),
      },
    };
  },
};

const ARCHIVE_SUFFIX = '.tar.gz';

/**
 * Platform as it appears in archive asset names, e.g. `ubuntu@22.04-amd64`
 */
export function platformReleaseName(platform: Platform): string {
  return `${platform.distribution}@${platform.series}-${platform.architecture}`;
}

function flatten(value: string): string {
  return value.replace(/\//g, '_');
}

export interface ArchiveScheme extends AssetNameScheme<ArchiveAssetFields> {
  fieldsFor(identity: PlatformIdentity): ArchiveAssetFields;
  encode(identity: PlatformIdentity): string;
}

export const archiveScheme: ArchiveScheme = {
  scheme: 'archive',

  parse(name: string): ParseResult<ArchiveAssetFields> {
    if (!name.endsWith(ARCHIVE_SUFFIX)) {
      return fail(`'${name}' does not end with '${ARCHIVE_SUFFIX}'`);
    }
    const stem = name.slice(0, -ARCHIVE_SUFFIX.length);

    const first = splitOnce(stem, '_ccchub1_');
    if (!first) return fail(`'${name}' has no single '_ccchub1_' marker`);
    const [repositoryKey, rest] = first;

    const second = splitOnce(rest, '_ccchub2_');
    if (!second) return fail(`'${name}' has no single '_ccchub2_' marker`);
    const [charmPathKey, platformKey] = second;

    return { ok: true, value: { repositoryKey, charmPathKey, platformKey } };
  },

  fieldsFor(identity: PlatformIdentity): ArchiveAssetFields {
    return {
      repositoryKey: flatten(identity.repository),
      charmPathKey: flatten(identity.charmPath),
      platformKey: flatten(platformReleaseName(identity.platform)),
    };
  },

  encode(identity: PlatformIdentity): string {
    const fields = this.fieldsFor(identity);
    return `${fields.repositoryKey}_ccchub1_${fields.charmPathKey}_ccchub2_${fields.platformKey}${ARCHIVE_SUFFIX}`;
  },
};
