/**
 * Command-line argument parsing
 */

import { ValidationError } from '../core/errors.js';

export type CommandName = 'pack' | 'clean' | 'add';

const COMMANDS: readonly CommandName[] = ['pack', 'clean', 'add'];

export interface ParsedArgs {
  command: CommandName | null;
  options: {
    verbose: boolean;
    help: boolean;
    version: boolean;
    /** `--platform` values, in order, duplicates kept */
    platforms: string[];
  };
  /** Arguments forwarded to `charmcraft pack` */
  extraArgs: string[];
}

function isCommand(value: string): value is CommandName {
  return COMMANDS.some((command) => command === value);
}

export function parseArgs(args: string[]): ParsedArgs {
  const result: ParsedArgs = {
    command: null,
    options: { verbose: false, help: false, version: false, platforms: [] },
    extraArgs: [],
  };

  let i = 0;

  // Global flags come before the command
  for (; i < args.length; i++) {
    const arg = args[i] ?? '';
    if (arg === '-v' || arg === '--verbose') result.options.verbose = true;
    else if (arg === '-h' || arg === '--help') result.options.help = true;
    else if (arg === '-V' || arg === '--version') result.options.version = true;
    else if (arg.startsWith('-')) throw new ValidationError(`Unknown option: ${arg}`);
    else break;
  }

  const command = args[i];
  if (command === undefined) return result;
  if (!isCommand(command)) {
    throw new ValidationError(`Unknown command: ${command}`);
  }
  result.command = command;
  i++;

  for (; i < args.length; i++) {
    const arg = args[i] ?? '';

    if (arg === '-v' || arg === '--verbose') {
      result.options.verbose = true;
    } else if (arg === '-h' || arg === '--help') {
      result.options.help = true;
    } else if (command !== 'pack') {
      throw new ValidationError(`Unexpected argument for '${command}': ${arg}`);
    } else if (arg === '--') {
      result.extraArgs.push(...args.slice(i + 1));
      break;
    } else if (arg === '--platform') {
      const value = args[++i];
      if (value === undefined || value.startsWith('-')) {
        throw new ValidationError('--platform requires a value (e.g. ubuntu@22.04:amd64)');
      }
      result.options.platforms.push(value);
    } else if (arg.startsWith('--platform=')) {
      result.options.platforms.push(arg.slice('--platform='.length));
    } else {
      result.extraArgs.push(arg);
    }
  }

  return result;
}
