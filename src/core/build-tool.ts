/**
 * The wrapped build tool (charmcraft)
 */

import { mkdirSync } from 'node:fs';
import * as semver from 'semver';
import { PreconditionError, isErrnoException } from './errors.js';
import type { Logger } from './logger.js';
import { runProcess } from './process.js';

/** Environment variable charmcraft reads its shared cache location from */
export const SHARED_CACHE_ENV = 'CRAFT_SHARED_CACHE';

export interface BuildTool {
  readonly name: string;
  /** Installed version, or null when the tool is not installed */
  version(): Promise<string | null>;
  /** Run with the given arguments and extra environment; resolves to the exit code */
  run(args: string[], env: Record<string, string>): Promise<number>;
}

export class Charmcraft implements BuildTool {
  readonly name = 'charmcraft';
  private readonly cwd: string;

  constructor(cwd: string) {
    this.cwd = cwd;
  }

  async version(): Promise<string | null> {
    let stdout: string;
    try {
      const result = await runProcess(this.name, ['version', '--format', 'json'], {
        cwd: this.cwd,
        capture: true,
      });
      if (result.code !== 0) {
        throw new PreconditionError(`\`${this.name} version\` failed: ${result.stderr.trim()}`);
      }
      stdout = result.stdout;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') return null;
      throw error;
    }

    let data: unknown;
    try {
      data = JSON.parse(stdout);
    } catch (error) {
      throw new PreconditionError(`Unexpected \`${this.name} version\` output: ${stdout.trim()}`, { cause: error });
    }
    if (typeof data === 'object' && data !== null && 'version' in data && typeof data.version === 'string') {
      return data.version;
    }
    throw new PreconditionError(`Unexpected \`${this.name} version\` output: ${stdout.trim()}`);
  }

  async run(args: string[], env: Record<string, string>): Promise<number> {
    const result = await runProcess(this.name, args, {
      cwd: this.cwd,
      env: { ...process.env, ...env },
    });
    return result.code;
  }
}

/**
 * Fail unless the tool is installed at `minimum` or newer
 */
export async function ensureBuildToolVersion(tool: BuildTool, minimum: string): Promise<string> {
  const installed = await tool.version();
  if (installed === null) {
    throw new PreconditionError(`${tool.name} not installed. ${tool.name} >=${minimum} required`);
  }
  const parsed = semver.coerce(installed);
  if (!parsed || semver.lt(parsed, minimum)) {
    throw new PreconditionError(`${tool.name} ${installed} installed. ${tool.name} >=${minimum} required`);
  }
  return installed;
}

export interface BuildRunOptions {
  /** Shared cache directory to inject; omitted for an uncached build */
  sharedCache?: string;
  logger: Logger;
}

/**
 * Run the build tool, logging (not re-interpreting) a failure
 */
export async function runBuildTool(tool: BuildTool, args: string[], options: BuildRunOptions): Promise<number> {
  const { logger } = options;
  const env: Record<string, string> = {};
  if (options.sharedCache) {
    mkdirSync(options.sharedCache, { recursive: true });
    env[SHARED_CACHE_ENV] = options.sharedCache;
  }
  const fullArgs = logger.verbose ? [...args, '-v'] : args;

  logger.debug(`Running ${tool.name} ${fullArgs.join(' ')} with ${SHARED_CACHE_ENV}=${options.sharedCache ?? '(unset)'}`);
  const code = await tool.run(fullArgs, env);
  if (code !== 0) {
    logger.error(`${tool.name} command failed with exit code ${code}`);
  }
  return code;
}
