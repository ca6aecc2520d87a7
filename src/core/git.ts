/**
 * Git repository inspection
 */

import { PreconditionError, isErrnoException } from './errors.js';
import type { Logger } from './logger.js';
import { runProcess, type ProcessResult } from './process.js';
import type { BuildManifest } from './types.js';

export interface Upstream {
  remote: string;
  branch: string;
}

export interface GitInspector {
  /** Path from the repository root to the working directory (`.` at the root) */
  charmPath(): Promise<string>;
  /** URL of `remote`, or null if there is no such remote */
  remoteUrl(remote: string): Promise<string | null>;
  remotes(): Promise<string[]>;
  /** Upstream of the current branch, if any */
  upstream(): Promise<Upstream | null>;
}

const GITHUB_PREFIXES = ['git@github.com:', 'https://github.com/', 'ssh://git@github.com/'];

/**
 * `owner/name` from a GitHub remote or web URL, or null for other hosts
 */
export function parseGithubRepository(url: string): string | null {
  let value = url.trim().replace(/\/+$/, '');
  if (value.endsWith('.git')) value = value.slice(0, -'.git'.length);
  for (const prefix of GITHUB_PREFIXES) {
    if (value.startsWith(prefix)) {
      const repository = value.slice(prefix.length);
      return /^[^/\s]+\/[^/\s]+$/.test(repository) ? repository : null;
    }
  }
  return null;
}

export class Git implements GitInspector {
  private readonly cwd: string;

  constructor(cwd: string) {
    this.cwd = cwd;
  }

  private async git(args: string[]): Promise<ProcessResult> {
    try {
      return await runProcess('git', args, { cwd: this.cwd, capture: true });
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new PreconditionError('Git not installed', { cause: error });
      }
      throw error;
    }
  }

  async charmPath(): Promise<string> {
    const result = await this.git(['rev-parse', '--show-prefix']);
    if (result.code !== 0) {
      if (result.stderr.includes('not a git repository')) {
        throw new PreconditionError(
          'Not in a git repository. Unable to detect relative path to charmcraft.yaml from git repository root'
        );
      }
      throw new PreconditionError(`git rev-parse failed: ${result.stderr.trim()}`);
    }
    const prefix = result.stdout.trim().replace(/\/+$/, '');
    return prefix === '' ? '.' : prefix;
  }

  async remoteUrl(remote: string): Promise<string | null> {
    const result = await this.git(['remote', 'get-url', remote]);
    if (result.code !== 0) {
      if (result.stderr.includes('No such remote')) return null;
      throw new PreconditionError(`git remote get-url ${remote} failed: ${result.stderr.trim()}`);
    }
    return result.stdout.trim();
  }

  async remotes(): Promise<string[]> {
    const result = await this.git(['remote']);
    if (result.code !== 0) {
      throw new PreconditionError(`git remote failed: ${result.stderr.trim()}`);
    }
    return result.stdout.split('\n').map((line) => line.trim()).filter(Boolean);
  }

  async upstream(): Promise<Upstream | null> {
    const head = await this.git(['symbolic-ref', '--quiet', 'HEAD']);
    const localBranch = head.stdout.trim();
    if (head.code !== 0 || !localBranch) return null;

    const ref = await this.git(['for-each-ref', '--format', '%(upstream:short)', localBranch]);
    const upstream = ref.stdout.trim();
    if (ref.code !== 0 || !upstream) return null;

    const [remote = '', ...branch] = upstream.split('/');
    if (!remote || branch.length === 0) return null;
    return { remote, branch: branch.join('/') };
  }
}

/**
 * Candidate catalog namespaces for this charm, in priority order: the
 * `origin` remote, declared source links, then every other remote
 */
export async function candidateRepositories(
  git: GitInspector,
  manifest: BuildManifest,
  logger: Logger
): Promise<string[]> {
  const candidates: string[] = [];
  const add = (repository: string, origin: string): void => {
    if (candidates.includes(repository)) return;
    logger.debug(`Candidate repository ${repository} from ${origin}`);
    candidates.push(repository);
  };

  const originUrl = await git.remoteUrl('origin');
  if (originUrl !== null) {
    const repository = parseGithubRepository(originUrl);
    if (repository) {
      add(repository, "'origin' remote");
    } else {
      logger.warn("Unable to parse GitHub repository from 'origin' remote");
    }
  }

  for (const url of manifest.sourceUrls) {
    const repository = parseGithubRepository(url);
    if (repository) add(repository, `${manifest.sourceFile} source ${url}`);
  }

  for (const remote of await git.remotes()) {
    if (remote === 'origin') continue;
    const url = await git.remoteUrl(remote);
    const repository = url === null ? null : parseGithubRepository(url);
    if (repository) {
      add(repository, `'${remote}' remote`);
    } else {
      logger.debug(`Unable to parse GitHub repository for remote '${remote}'`);
    }
  }

  return candidates;
}
