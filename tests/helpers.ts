/**
 * Shared test fixtures
 */

import { mkdirSync, mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import type { BuildTool } from '../src/core/build-tool.js';
import type { RunConfig } from '../src/core/config.js';
import type { GitInspector, Upstream } from '../src/core/git.js';
import { createLogger, type Logger, type LogLevel } from '../src/core/logger.js';
import type { ReleaseCatalog } from '../src/core/orchestrator.js';
import type { BuildManifest, CatalogRelease, RemoteAsset } from '../src/core/types.js';

export function tempDir(prefix = 'charmwarm-test-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export interface CapturedLogger {
  logger: Logger;
  lines: Array<{ level: LogLevel; line: string }>;
  /** Formatted lines of one level */
  at(level: LogLevel): string[];
}

export function captureLogger(verbose = false): CapturedLogger {
  const lines: CapturedLogger['lines'] = [];
  const logger = createLogger({
    verbose,
    colors: false,
    sink: (line, level) => lines.push({ level, line }),
    now: () => new Date(2026, 0, 2, 3, 4, 5),
  });
  return {
    logger,
    lines,
    at: (level) => lines.filter((l) => l.level === level).map((l) => l.line),
  };
}

export function testConfig(cacheRoot: string, overrides: Partial<RunConfig> = {}): RunConfig {
  return {
    verbose: false,
    cacheRoot,
    catalogApi: 'https://api.example.test',
    catalogRepository: 'acme/catalog',
    scheme: 'archive',
    token: undefined,
    toolVersion: '0.4.0',
    minimumBuildToolVersion: '3.3.0',
    updateCheck: false,
    ci: true,
    workingDirectory: cacheRoot,
    ...overrides,
  };
}

export function manifest(overrides: Partial<BuildManifest> = {}): BuildManifest {
  return {
    directory: '/charm',
    bases: [],
    platforms: null,
    binaryPackages: [],
    sourceUrls: [],
    sourceFile: 'metadata.yaml',
    ...overrides,
  };
}

export class FakeGit implements GitInspector {
  constructor(
    private readonly remoteUrls: Record<string, string>,
    private readonly options: { charmPath?: string; upstream?: Upstream | null } = {}
  ) {}

  async charmPath(): Promise<string> {
    return this.options.charmPath ?? '.';
  }

  async remoteUrl(remote: string): Promise<string | null> {
    return this.remoteUrls[remote] ?? null;
  }

  async remotes(): Promise<string[]> {
    return Object.keys(this.remoteUrls);
  }

  async upstream(): Promise<Upstream | null> {
    return this.options.upstream ?? null;
  }
}

export interface BuildRun {
  args: string[];
  env: Record<string, string>;
}

export class FakeBuildTool implements BuildTool {
  readonly name = 'charmcraft';
  readonly runs: BuildRun[] = [];

  constructor(
    private readonly installed: string | null = '3.4.0',
    private readonly exitCodes: number[] = []
  ) {}

  async version(): Promise<string | null> {
    return this.installed;
  }

  async run(args: string[], env: Record<string, string>): Promise<number> {
    this.runs.push({ args, env });
    return this.exitCodes[this.runs.length - 1] ?? 0;
  }
}

/**
 * In-memory catalog; asset downloads copy the file named in `files`
 */
export class FakeCatalog implements ReleaseCatalog {
  readonly downloads: string[] = [];

  constructor(
    private readonly release: CatalogRelease,
    private readonly files: Record<string, string> = {}
  ) {}

  async getLatestRelease(): Promise<CatalogRelease> {
    return this.release;
  }

  async downloadAsset(asset: RemoteAsset, destination: string, onChunk: (bytes: number) => void): Promise<void> {
    this.downloads.push(asset.name);
    const source = this.files[asset.name];
    const data = source === undefined ? Buffer.from(asset.name) : readFileSync(source);
    mkdirSync(dirname(destination), { recursive: true });
    writeFileSync(destination, data);
    onChunk(data.length);
  }
}
