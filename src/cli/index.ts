#!/usr/bin/env node
/**
 * charmwarm CLI
 *
 * Fast first-time `charmcraft pack` from pre-built caches.
 *
 * Usage:
 *   charmwarm [-v] pack [-v] [--platform NAME]... [charmcraft pack args] [-- args]
 *   charmwarm [-v] clean [-v]
 *   charmwarm [-v] add [-v]
 *   charmwarm --help
 */

import pc from 'picocolors';
import { resolveConfig, VERSION } from '../core/config.js';
import { createLogger } from '../core/logger.js';
import { Orchestrator } from '../core/orchestrator.js';
import { parseArgs } from './args.js';

function printHelp() {
  console.log(`
${pc.bold('charmwarm')} - Fast first-time charmcraft builds from a pre-built cache

${pc.bold('USAGE')}
  charmwarm [options] <command> [options]

${pc.bold('COMMANDS')}
  pack         Download pre-built cache & \`charmcraft pack\`
               Unrecognized arguments are passed to \`charmcraft pack\`
  clean        Delete cache & \`charmcraft clean\`
  add          Add your charm to the pre-built cache

${pc.bold('OPTIONS')}
  --platform <name>         Platform in charmcraft.yaml 'platforms' (e.g. ubuntu@22.04:amd64)
                            Default: all platforms for this machine's architecture
  -v, --verbose             Verbose output
  -h, --help                Show this help
  -V, --version             Show version

${pc.bold('ENVIRONMENT')}
  CHARMWARM_CACHE_DIR       Cache directory
  CHARMWARM_SCHEME          Catalog encoding scheme: archive (default) or wheel
  GH_TOKEN                  GitHub token for the catalog API

${pc.bold('EXAMPLES')}
  ${pc.dim('# Pack every platform for this machine')}
  charmwarm pack

  ${pc.dim('# Pack one platform, passing an argument to charmcraft')}
  charmwarm pack --platform ubuntu@22.04:amd64 --bases-index 0
`);
}

function printVersion() {
  console.log(`charmwarm v${VERSION}`);
}

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));

  if (args.options.version) {
    printVersion();
    return 0;
  }

  if (args.options.help || !args.command) {
    printHelp();
    return 0;
  }

  const config = resolveConfig({ verbose: args.options.verbose });
  const logger = createLogger({ verbose: config.verbose });
  const orchestrator = new Orchestrator({ config, logger });

  switch (args.command) {
    case 'pack':
      return orchestrator.pack({ platforms: args.options.platforms, extraArgs: args.extraArgs });

    case 'clean':
      return orchestrator.clean();

    case 'add':
      return orchestrator.add();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(pc.red('Error:'), error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
