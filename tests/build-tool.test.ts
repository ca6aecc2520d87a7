/**
 * Build Tool Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { SHARED_CACHE_ENV, ensureBuildToolVersion, runBuildTool } from '../src/core/build-tool.js';
import { PreconditionError } from '../src/core/errors.js';
import { FakeBuildTool, captureLogger, tempDir } from './helpers.js';

describe('ensureBuildToolVersion', () => {
  it('should accept the minimum and newer', async () => {
    await expect(ensureBuildToolVersion(new FakeBuildTool('3.3.0'), '3.3.0')).resolves.toBe('3.3.0');
    await expect(ensureBuildToolVersion(new FakeBuildTool('3.4.1.post2'), '3.3.0')).resolves.toBe('3.4.1.post2');
  });

  it('should reject older versions', async () => {
    await expect(ensureBuildToolVersion(new FakeBuildTool('2.5.3'), '2.5.4')).rejects.toThrow(
      'charmcraft 2.5.3 installed. charmcraft >=2.5.4 required'
    );
  });

  it('should reject a missing tool', async () => {
    await expect(ensureBuildToolVersion(new FakeBuildTool(null), '3.3.0')).rejects.toBeInstanceOf(PreconditionError);
  });
});

describe('runBuildTool', () => {
  let dir: string;

  beforeEach(() => {
    dir = tempDir();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should inject the shared cache and create it', async () => {
    const tool = new FakeBuildTool();
    const sharedCache = join(dir, 'shared');

    const code = await runBuildTool(tool, ['pack'], { sharedCache, logger: captureLogger().logger });

    expect(code).toBe(0);
    expect(existsSync(sharedCache)).toBe(true);
    expect(tool.runs).toEqual([{ args: ['pack'], env: { [SHARED_CACHE_ENV]: sharedCache } }]);
  });

  it('should build without a shared cache', async () => {
    const tool = new FakeBuildTool();

    await runBuildTool(tool, ['pack', '--platform', 'ubuntu@22.04:amd64'], { logger: captureLogger().logger });

    expect(tool.runs[0]?.env).toEqual({});
  });

  it('should report a failure and return its exit code', async () => {
    const { logger, at } = captureLogger();

    const code = await runBuildTool(new FakeBuildTool('3.4.0', [130]), ['clean'], { logger });

    expect(code).toBe(130);
    expect(at('error')).toEqual(['[charmwarm] ERROR charmcraft command failed with exit code 130']);
  });
});
