/**
 * Child process helpers
 */

import { spawn } from 'node:child_process';

export interface ProcessResult {
  code: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Capture output instead of inheriting the terminal */
  capture?: boolean;
}

/**
 * Run a command with an argv array (no shell).
 *
 * Rejects with the spawn error (e.g. `ENOENT` when the command is not
 * installed); a non-zero exit is reported through `code`.
 */
export function runProcess(command: string, args: string[], options: RunOptions = {}): Promise<ProcessResult> {
  const capture = options.capture ?? false;

  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, {
      ...(options.cwd !== undefined && { cwd: options.cwd }),
      ...(options.env !== undefined && { env: options.env }),
      stdio: capture ? ['ignore', 'pipe', 'pipe'] : 'inherit',
    });

    let stdout = '';
    let stderr = '';
    proc.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString();
    });
    proc.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on('error', (err) => reject(err));
    proc.on('close', (code) => {
      // null when killed by a signal
      resolve({ code: code ?? 1, stdout, stderr });
    });
  });
}
