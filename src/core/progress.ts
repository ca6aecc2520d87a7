/**
 * In-place download progress line
 */

import pc from 'picocolors';
import type { ProgressReporter } from './types.js';

export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB'];
  const i = Math.min(sizes.length - 1, Math.floor(Math.log(bytes) / Math.log(k)));
  return parseFloat((bytes / Math.pow(k, i)).toFixed(2)) + ' ' + sizes[i];
}

export interface ProgressOptions {
  label: string;
  /** Sum of sizes of the artifacts actually queued */
  total: number;
  /** `false` in CI or non-interactive output: only the final line is printed */
  interactive: boolean;
  write?: (text: string) => void;
}

export class ProgressLine implements ProgressReporter {
  private readonly options: ProgressOptions;
  private readonly write: (text: string) => void;
  private current = 0;
  private done = false;

  constructor(options: ProgressOptions) {
    this.options = options;
    this.write = options.write ?? ((text) => process.stdout.write(text));
  }

  get transferred(): number {
    return this.current;
  }

  get completed(): boolean {
    return this.done;
  }

  get fraction(): number {
    if (this.options.total === 0) return this.done ? 1 : 0;
    return Math.min(1, this.current / this.options.total);
  }

  private render(): string {
    const percent = Math.round(this.fraction * 100);
    return (
      `  ${pc.cyan('→')} ${this.options.label} ` +
      `${formatBytes(this.current)}/${formatBytes(this.options.total)} ${pc.dim(`(${percent}%)`)}`
    );
  }

  advance(bytes: number): void {
    this.current += bytes;
    if (this.options.interactive) {
      this.write(`\r${this.render()}`);
    }
  }

  complete(): void {
    if (this.done) return;
    this.done = true;
    // Nothing queued counts as finished
    if (this.options.total === 0) return;
    this.write(`${this.options.interactive ? '\r' : ''}${this.render()}\n`);
  }
}
