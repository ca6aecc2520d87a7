/**
 * Local build inputs: charmcraft.yaml, metadata.yaml and the pip
 * dependency-resolution report
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { PreconditionError, ValidationError, isErrnoException } from './errors.js';
import type { BuildManifest, DependencyReportEntry, ManifestBase } from './types.js';

export const MANIFEST_FILE = 'charmcraft.yaml';
export const METADATA_FILE = 'metadata.yaml';

// Unquoted `22.04` loads as a number
const Channel = z.union([z.string(), z.number().transform((n) => n.toFixed(2))]);

const SimpleBase = z
  .object({
    channel: Channel.optional(),
    architectures: z.array(z.string()).optional(),
  })
  .passthrough();

const BaseEntry = SimpleBase.extend({
  'build-on': z.array(SimpleBase).optional(),
});

const SourceLinks = z.union([z.string(), z.array(z.string())]);

const ManifestSchema = z
  .object({
    bases: z.array(BaseEntry).optional(),
    platforms: z.record(z.string(), z.unknown()).nullable().optional(),
    parts: z
      .object({
        charm: z
          .object({
            'charm-binary-python-packages': z.array(z.string()).optional(),
          })
          .passthrough()
          .nullable()
          .optional(),
      })
      .passthrough()
      .nullable()
      .optional(),
    links: z
      .object({ source: SourceLinks.optional() })
      .passthrough()
      .nullable()
      .optional(),
  })
  .passthrough();

const MetadataSchema = z
  .object({ source: SourceLinks.optional() })
  .passthrough();

const ReportSchema = z.object({
  install: z.array(
    z.object({
      metadata: z
        .object({
          name: z.string().min(1),
          version: z.string().min(1),
        })
        .passthrough(),
    }).passthrough()
  ),
}).passthrough();

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'invalid content';
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}

function readText(path: string, hint: string): string {
  try {
    return readFileSync(path, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new PreconditionError(`${path} not found. ${hint}`.trim(), { cause: error });
    }
    throw error;
  }
}

function loadYaml(path: string, text: string): unknown {
  try {
    // An empty document loads as undefined
    return yaml.load(text) ?? {};
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Unable to parse ${path}: ${reason}`);
  }
}

function toList(value: string | string[] | undefined): string[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

function toManifestBase(entry: z.infer<typeof BaseEntry>): ManifestBase {
  const base: ManifestBase = {};
  if (entry.channel !== undefined) base.channel = entry.channel;
  if (entry.architectures !== undefined) base.architectures = entry.architectures;
  const buildOn = entry['build-on'];
  if (buildOn !== undefined) {
    base.buildOn = buildOn.map((b) => ({
      ...(b.channel !== undefined && { channel: b.channel }),
      ...(b.architectures !== undefined && { architectures: b.architectures }),
    }));
  }
  return base;
}

/**
 * Read charmcraft.yaml (and metadata.yaml beside it) from `directory`
 */
export function readBuildManifest(directory: string): BuildManifest {
  const manifestPath = join(directory, MANIFEST_FILE);
  const text = readText(manifestPath, '`cd` into the directory with charmcraft.yaml');

  const parsed = ManifestSchema.safeParse(loadYaml(manifestPath, text));
  if (!parsed.success) {
    throw new ValidationError(`Unexpected content in ${manifestPath} (${describeIssue(parsed.error)})`);
  }
  const manifest = parsed.data;

  let sourceUrls: string[] = [];
  let sourceFile: BuildManifest['sourceFile'] = METADATA_FILE;
  const metadataPath = join(directory, METADATA_FILE);
  if (existsSync(metadataPath)) {
    const metadata = MetadataSchema.safeParse(loadYaml(metadataPath, readText(metadataPath, '')));
    if (!metadata.success) {
      throw new ValidationError(`Unexpected content in ${metadataPath} (${describeIssue(metadata.error)})`);
    }
    sourceUrls = toList(metadata.data.source);
  }
  if (sourceUrls.length === 0) {
    sourceFile = MANIFEST_FILE;
    sourceUrls = toList(manifest.links?.source);
  }

  return {
    directory,
    bases: (manifest.bases ?? []).map(toManifestBase),
    platforms: manifest.platforms ?? null,
    binaryPackages: manifest.parts?.charm?.['charm-binary-python-packages'] ?? [],
    sourceUrls,
    sourceFile,
  };
}

/**
 * Read a `pip install --report` file
 */
export function readDependencyReport(path: string): DependencyReportEntry[] {
  const text = readText(path, 'Dependency report was not generated');

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new PreconditionError(`Dependency report ${path} is not valid JSON`, { cause: error });
  }

  const parsed = ReportSchema.safeParse(data);
  if (!parsed.success) {
    throw new PreconditionError(
      `Dependency report ${path} is malformed (${describeIssue(parsed.error)})`
    );
  }

  return parsed.data.install.map((entry) => ({
    name: entry.metadata.name,
    version: entry.metadata.version,
  }));
}
