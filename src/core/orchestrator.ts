/**
 * Command orchestration: pack, clean, add
 *
 * Each command reconciles the tool fingerprint first, then drives the
 * resolver, catalog, matcher and fetch engine in order before handing over
 * to the build tool. Collaborators are injectable; defaults talk to the
 * real catalog, git and charmcraft.
 */

import { existsSync, lstatSync, symlinkSync } from 'node:fs';
import { join } from 'node:path';
import { Charmcraft, ensureBuildToolVersion, runBuildTool, type BuildTool } from './build-tool.js';
import { BUILD_BASE_DIRECTORY, CacheDirectory, COMPAT_BUILD_BASE_DIRECTORY } from './cache-dir.js';
import { CatalogClient } from './catalog.js';
import type { RunConfig } from './config.js';
import { NoCacheFoundError, PreconditionError, ValidationError, isErrnoException } from './errors.js';
import { FetchEngine, charmCacheDir, type AssetDownloader } from './fetch.js';
import { Git, candidateRepositories, parseGithubRepository, type GitInspector } from './git.js';
import {
  declaredPlatforms,
  detectArchitecture,
  resolvePlatforms,
  resolveWheelIdentities,
} from './identity.js';
import type { Logger } from './logger.js';
import { MANIFEST_FILE, readBuildManifest, readDependencyReport } from './manifest.js';
import { planArchives, planWheels, platformIdentities, selectRepository } from './matcher.js';
import { runProcess } from './process.js';
import { ProgressLine } from './progress.js';
import type { Architecture, CatalogRelease, ProgressReporter } from './types.js';
import { checkForUpdate } from './update-check.js';

export const REQUIREMENTS_FILE = 'requirements.txt';

export interface ReleaseCatalog extends AssetDownloader {
  getLatestRelease(): Promise<CatalogRelease>;
}

/** Writes the dependency-resolution report for `directory` to `reportFile` */
export type DependencyReportGenerator = (directory: string, reportFile: string, verbose: boolean) => Promise<void>;

export interface OrchestratorOptions {
  config: RunConfig;
  logger: Logger;
  catalog?: ReleaseCatalog;
  buildTool?: BuildTool;
  git?: GitInspector;
  generateDependencyReport?: DependencyReportGenerator;
  createProgress?: (label: string, total: number) => ProgressReporter;
  architecture?: Architecture;
}

export interface PackOptions {
  /** `--platform` selections, in the order given */
  platforms?: string[];
  /** Arguments passed through to `charmcraft pack` */
  extraArgs?: string[];
}

/**
 * Resolve dependencies with pip without installing anything
 */
export const pipDependencyReport: DependencyReportGenerator = async (directory, reportFile, verbose) => {
  const args = [
    '-m', 'pip', 'install',
    '--dry-run',
    '-r', REQUIREMENTS_FILE,
    '--ignore-installed',
    '--report', reportFile,
  ];
  let code: number;
  try {
    ({ code } = await runProcess('python3', args, { cwd: directory, capture: !verbose }));
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new PreconditionError('python3 not installed. pip is required to resolve dependencies', { cause: error });
    }
    throw error;
  }
  if (code !== 0) {
    throw new PreconditionError(`Dependency resolution with pip failed (exit code ${code})`);
  }
};

/**
 * Issue form that registers a charm branch with the catalog
 */
export function addIssueUrl(
  catalogRepository: string,
  details: { repository?: string; ref?: string; charmDirectory?: string } = {}
): string {
  const params = new URLSearchParams({
    template: 'add_charm_branch.yaml',
    labels: 'add-charm',
    title: 'Add charm branch',
  });
  if (details.repository && details.ref) {
    params.set('repo', details.repository);
    params.set('ref', details.ref);
  }
  if (details.charmDirectory) {
    params.set('charm-directory', details.charmDirectory);
  }
  return `https://github.com/${catalogRepository}/issues/new?${params.toString()}`;
}

export class Orchestrator {
  private readonly config: RunConfig;
  private readonly logger: Logger;
  private readonly cache: CacheDirectory;
  private readonly catalog: ReleaseCatalog;
  private readonly buildTool: BuildTool;
  private readonly git: GitInspector;
  private readonly generateDependencyReport: DependencyReportGenerator;
  private readonly createProgress: (label: string, total: number) => ProgressReporter;
  private readonly architecture: Architecture | undefined;

  constructor(options: OrchestratorOptions) {
    const { config, logger } = options;
    this.config = config;
    this.logger = logger;
    this.cache = new CacheDirectory(config.cacheRoot, logger);
    this.catalog =
      options.catalog ??
      new CatalogClient({
        api: config.catalogApi,
        repository: config.catalogRepository,
        token: config.token,
        cache: this.cache,
        logger,
      });
    this.buildTool = options.buildTool ?? new Charmcraft(config.workingDirectory);
    this.git = options.git ?? new Git(config.workingDirectory);
    this.generateDependencyReport = options.generateDependencyReport ?? pipDependencyReport;
    this.createProgress =
      options.createProgress ??
      ((label, total) =>
        new ProgressLine({ label, total, interactive: !config.ci && process.stdout.isTTY === true }));
    this.architecture = options.architecture;
  }

  get cacheDirectory(): CacheDirectory {
    return this.cache;
  }

  private async prepare(): Promise<void> {
    this.cache.reconcileVersion('tool', this.config.toolVersion);
    if (this.config.updateCheck) {
      await checkForUpdate({ logger: this.logger, current: this.config.toolVersion });
    }
  }

  private fetchEngine(label: string): FetchEngine {
    return new FetchEngine({
      downloader: this.catalog,
      cache: this.cache,
      logger: this.logger,
      createProgress: (total) => this.createProgress(label, total),
    });
  }

  private async latestRelease(): Promise<CatalogRelease> {
    const release = await this.catalog.getLatestRelease();
    this.logger.debug(`Latest catalog release: ${release.name} (${release.assets.length} assets)`);
    this.cache.reconcileVersion('release', release.name);
    return release;
  }

  /**
   * Download cached artifacts and run `charmcraft pack`.
   *
   * @returns the build tool's exit code, or 1 when no cache exists for this charm
   */
  async pack(options: PackOptions = {}): Promise<number> {
    const extraArgs = options.extraArgs ?? [];
    await this.prepare();
    if (extraArgs.length > 0) {
      this.logger.info(`Passing unrecognized arguments to \`charmcraft pack\`: ${extraArgs.join(' ')}`);
    }

    try {
      if (this.config.scheme === 'wheel') {
        if (options.platforms && options.platforms.length > 0) {
          throw new ValidationError('--platform is not supported with the wheel encoding scheme');
        }
        return await this.packWheels(extraArgs);
      }
      return await this.packArchives(options.platforms ?? [], extraArgs);
    } catch (error) {
      if (error instanceof NoCacheFoundError) {
        this.logger.error(error.message);
        await this.printAddGuidance();
        return 1;
      }
      throw error;
    }
  }

  private async packWheels(extraArgs: string[]): Promise<number> {
    const { logger } = this;
    const directory = this.config.workingDirectory;

    const manifest = readBuildManifest(directory);
    if (!existsSync(join(directory, REQUIREMENTS_FILE))) {
      throw new PreconditionError(
        `${REQUIREMENTS_FILE} not found. Are you using a pack wrapper (e.g. \`tox run -e build-dev\`)? ` +
          'If so, call charmwarm via the wrapper'
      );
    }

    logger.info('Resolving dependencies');
    this.cache.ensureRoot();
    await this.generateDependencyReport(directory, this.cache.dependencyReportFile, logger.verbose);
    const dependencies = readDependencyReport(this.cache.dependencyReportFile);

    const architecture = this.architecture ?? detectArchitecture();
    const { identities, skipped } = resolveWheelIdentities(dependencies, manifest, architecture);
    for (const name of skipped) {
      logger.debug(`Skipping ${name}: listed in charm-binary-python-packages`);
    }

    const release = await this.latestRelease();
    const buildBaseDir = join(this.cache.sharedCacheDir, BUILD_BASE_DIRECTORY);
    const plan = planWheels(identities, release, buildBaseDir, { logger });

    if (identities.length > 0 && plan.unmatched.length === identities.length) {
      throw new NoCacheFoundError('Unable to find any pre-built wheels for this charm');
    }
    if (plan.unmatched.length > 0) {
      const count = plan.unmatched.length;
      logger.warn(`${count} wheel${count > 1 ? 's' : ''} not pre-built. Run \`charmwarm add\` for faster builds`);
    }

    await this.fetchEngine('Downloading wheels').downloadPlan(plan);
    this.linkCompatBuildBase();

    await ensureBuildToolVersion(this.buildTool, this.config.minimumBuildToolVersion);
    logger.info('Packing charm');
    return runBuildTool(this.buildTool, ['pack', ...extraArgs], {
      sharedCache: this.cache.sharedCacheDir,
      logger,
    });
  }

  /**
   * charmcraft 2.7 looks for wheels under a newer build-base directory name
   */
  private linkCompatBuildBase(): void {
    const link = join(this.cache.sharedCacheDir, COMPAT_BUILD_BASE_DIRECTORY);
    try {
      lstatSync(link);
      return;
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'ENOENT') throw error;
    }
    if (!existsSync(join(this.cache.sharedCacheDir, BUILD_BASE_DIRECTORY))) return;
    symlinkSync(BUILD_BASE_DIRECTORY, link, 'dir');
  }

  private async packArchives(selected: string[], extraArgs: string[]): Promise<number> {
    const { logger } = this;

    const manifest = readBuildManifest(this.config.workingDirectory);
    const architecture = this.architecture ?? detectArchitecture();
    const declared = declaredPlatforms(manifest);
    if (declared.length === 0) {
      throw new ValidationError("charmcraft.yaml 'platforms' is required");
    }
    const platforms = resolvePlatforms(selected, declared, architecture);
    if (platforms.length === 0) {
      throw new ValidationError(
        `No platforms in charmcraft.yaml match architecture of this machine ('${architecture}')`
      );
    }
    logger.debug(`Platforms to build: ${platforms.map((p) => p.shorthand).join(', ')}`);

    const release = await this.latestRelease();

    logger.info("Searching for this charm's cache");
    const charmPath = await this.git.charmPath();
    const candidates = await candidateRepositories(this.git, manifest, logger);
    const repository = selectRepository(candidates, platforms, charmPath, release, logger);
    if (repository === null) {
      throw new NoCacheFoundError('Unable to find pre-built cache for this charm');
    }

    const plan = planArchives(
      platformIdentities(repository, charmPath, platforms),
      release,
      this.cache.archivesDir,
      { logger }
    );
    for (const identity of plan.unmatched) {
      logger.warn(
        `Unable to find pre-built cache for repository '${repository}' and platform ` +
          `'${identity.platform.shorthand}'. Packing it without cache`
      );
    }

    const engine = this.fetchEngine('Downloading cache');
    await engine.downloadPlan(plan);

    logger.info('Unpacking download');
    const charmDir = charmCacheDir(this.cache, repository, charmPath);
    const matched = [...plan.placed, ...plan.entries];
    await engine.unpackArchives(charmDir, matched);

    await ensureBuildToolVersion(this.buildTool, this.config.minimumBuildToolVersion);
    const cached = new Set(matched.map((entry) => entry.identity.platform.shorthand));
    for (const platform of platforms) {
      logger.info(`Packing platform: '${platform.shorthand}'`);
      const code = await runBuildTool(this.buildTool, ['pack', '--platform', platform.shorthand, ...extraArgs], {
        ...(cached.has(platform.shorthand) && { sharedCache: join(charmDir, platform.shorthand) }),
        logger,
      });
      if (code !== 0) return code;
    }
    return 0;
  }

  /**
   * Delete the whole cache root, then `charmcraft clean`
   */
  async clean(): Promise<number> {
    await this.prepare();
    this.logger.info('Deleting cache');
    this.cache.clear();
    this.cache.reconcileVersion('tool', this.config.toolVersion);
    this.logger.info('Running `charmcraft clean`');
    return runBuildTool(this.buildTool, ['clean'], { logger: this.logger });
  }

  /**
   * Print the catalog registration link for this charm
   */
  async add(): Promise<number> {
    await this.prepare();
    await this.printAddGuidance();
    return 0;
  }

  private async registrationDetails(): Promise<{ repository?: string; ref?: string; charmDirectory?: string }> {
    const details: { repository?: string; ref?: string; charmDirectory?: string } = {};

    try {
      const upstream = await this.git.upstream();
      const url = upstream ? await this.git.remoteUrl(upstream.remote) : null;
      const repository = url === null ? null : parseGithubRepository(url);
      if (upstream && repository) {
        details.repository = repository;
        details.ref = upstream.branch;
      }
    } catch (error) {
      if (!(error instanceof PreconditionError)) throw error;
      this.logger.debug(`Unable to detect upstream branch: ${error.message}`);
    }

    if (existsSync(join(this.config.workingDirectory, MANIFEST_FILE))) {
      try {
        details.charmDirectory = await this.git.charmPath();
      } catch (error) {
        if (!(error instanceof PreconditionError)) throw error;
        this.logger.debug(error.message);
      }
    }

    return details;
  }

  private async printAddGuidance(): Promise<void> {
    const url = addIssueUrl(this.config.catalogRepository, await this.registrationDetails());
    this.logger.info(`To add your charm to the pre-built cache, open an issue here:\n\n${url}\n`);
    this.logger.info(
      'After the issue is opened, it will be automatically processed. Then, it will take a few ' +
        'minutes to build the cache. After the cache has been built, `charmwarm pack` will be available ' +
        'for this charm'
    );
  }
}
