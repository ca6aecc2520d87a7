/**
 * Newer-release notice from the npm registry
 */

import { request, type Dispatcher } from 'undici';
import * as semver from 'semver';
import { z } from 'zod';
import { PACKAGE_NAME, VERSION } from './config.js';
import type { Logger } from './logger.js';

export const DEFAULT_REGISTRY = 'https://registry.npmjs.org';

const LatestSchema = z.object({ version: z.string() });

export interface UpdateCheckOptions {
  logger: Logger;
  current?: string;
  registry?: string;
  dispatcher?: Dispatcher;
  timeoutMs?: number;
}

/**
 * Log an upgrade hint when the registry has a newer version.
 *
 * Never throws; failures only show up in verbose output.
 *
 * @returns the latest published version, or null if it could not be determined
 */
export async function checkForUpdate(options: UpdateCheckOptions): Promise<string | null> {
  const { logger } = options;
  const current = options.current ?? VERSION;
  const registry = (options.registry ?? DEFAULT_REGISTRY).replace(/\/+$/, '');
  const timeout = options.timeoutMs ?? 3000;

  try {
    const { statusCode, body } = await request(`${registry}/${PACKAGE_NAME}/latest`, {
      method: 'GET',
      headers: { 'Accept': 'application/json', 'User-Agent': PACKAGE_NAME },
      headersTimeout: timeout,
      bodyTimeout: timeout,
      ...(options.dispatcher && { dispatcher: options.dispatcher }),
    });
    if (statusCode !== 200) {
      await body.text();
      logger.debug(`Update check failed: HTTP ${statusCode}`);
      return null;
    }

    const { version: latest } = LatestSchema.parse(await body.json());
    if (semver.valid(latest) && semver.valid(current) && semver.gt(latest, current)) {
      logger.info(`Update available. Run \`npm install -g ${PACKAGE_NAME}\` (${current} -> ${latest})`);
    }
    return latest;
  } catch (error) {
    logger.debug(`Update check failed: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
}
