/**
 * Configuration & CLI Argument Tests
 */

import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { parseArgs } from '../src/cli/args.js';
import { DEFAULT_CATALOG_API, VERSION, defaultCacheRoot, parseScheme, resolveConfig } from '../src/core/config.js';
import { ValidationError } from '../src/core/errors.js';

describe('resolveConfig', () => {
  it('should apply defaults', () => {
    const config = resolveConfig({ cwd: '/charm', env: { XDG_CACHE_HOME: '/xdg' } });

    expect(config).toMatchObject({
      verbose: false,
      catalogApi: DEFAULT_CATALOG_API,
      catalogRepository: 'canonical/charmcraftcache-hub',
      scheme: 'archive',
      token: undefined,
      toolVersion: VERSION,
      minimumBuildToolVersion: '3.3.0',
      updateCheck: true,
      ci: false,
      workingDirectory: '/charm',
    });
    expect(config.cacheRoot).toBe(defaultCacheRoot({ XDG_CACHE_HOME: '/xdg' }));
  });

  it('should read overrides from the environment', () => {
    const config = resolveConfig({
      verbose: true,
      env: {
        CHARMWARM_CACHE_DIR: '/tmp/cw',
        CHARMWARM_CATALOG_API: 'https://ghe.example.test/api/v3/',
        CHARMWARM_CATALOG_REPOSITORY: 'acme/catalog',
        CHARMWARM_SCHEME: 'wheel',
        CHARMWARM_NO_UPDATE_CHECK: '1',
        GH_TOKEN: 'test-secret',
        CI: 'true',
      },
    });

    expect(config).toMatchObject({
      verbose: true,
      cacheRoot: '/tmp/cw',
      catalogApi: 'https://ghe.example.test/api/v3',
      catalogRepository: 'acme/catalog',
      scheme: 'wheel',
      token: 'test-secret',
      minimumBuildToolVersion: '2.5.4',
      updateCheck: false,
      ci: true,
    });
  });

  it('should reject unknown schemes', () => {
    expect(() => parseScheme('zip')).toThrow(ValidationError);
    expect(() => resolveConfig({ env: { CHARMWARM_SCHEME: 'zip' } })).toThrow(
      "Unknown encoding scheme 'zip'. Expected 'archive' or 'wheel'"
    );
  });

  it.runIf(process.platform === 'linux')('should follow XDG on Linux', () => {
    expect(defaultCacheRoot({ XDG_CACHE_HOME: '/xdg' })).toBe(join('/xdg', 'charmwarm'));
  });
});

describe('parseArgs', () => {
  it('should show help without a command', () => {
    expect(parseArgs([])).toEqual({
      command: null,
      options: { verbose: false, help: false, version: false, platforms: [] },
      extraArgs: [],
    });
    expect(parseArgs(['--version']).options.version).toBe(true);
  });

  it('should accept verbose before or after the command', () => {
    expect(parseArgs(['-v', 'clean']).options.verbose).toBe(true);
    expect(parseArgs(['add', '--verbose']).options.verbose).toBe(true);
  });

  it('should collect platforms and pass everything else through', () => {
    const args = parseArgs([
      'pack',
      '--platform',
      'ubuntu@22.04:amd64',
      '--bases-index',
      '0',
      '--platform=ubuntu@24.04:amd64',
      '--',
      '--platform',
      '-v',
    ]);

    expect(args.command).toBe('pack');
    expect(args.options.platforms).toEqual(['ubuntu@22.04:amd64', 'ubuntu@24.04:amd64']);
    expect(args.options.verbose).toBe(false);
    expect(args.extraArgs).toEqual(['--bases-index', '0', '--platform', '-v']);
  });

  it('should keep duplicate platforms for validation', () => {
    expect(parseArgs(['pack', '--platform', 'a', '--platform', 'a']).options.platforms).toEqual(['a', 'a']);
  });

  it('should reject bad input', () => {
    expect(() => parseArgs(['build'])).toThrow('Unknown command: build');
    expect(() => parseArgs(['--frobnicate'])).toThrow('Unknown option: --frobnicate');
    expect(() => parseArgs(['pack', '--platform'])).toThrow(ValidationError);
    expect(() => parseArgs(['clean', '--force'])).toThrow("Unexpected argument for 'clean': --force");
  });
});
