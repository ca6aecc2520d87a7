/**
 * Console logger
 *
 * Verbosity is a property of the logger instance, created once per command
 * from the run configuration and handed to each component.
 */

import pc from 'picocolors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  readonly verbose: boolean;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  /** Defaults to picocolors' terminal detection */
  colors?: boolean;
  /** Receives each formatted line; defaults to console.log / console.error */
  sink?: (line: string, level: LogLevel) => void;
  /** Clock for verbose timestamps */
  now?: () => Date;
}

const PREFIX = '[charmwarm]';

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO',
  warn: 'WARNING',
  error: 'ERROR',
};

function pad(n: number): string {
  return n.toString().padStart(2, '0');
}

/**
 * Local time as `YYYY-MM-DD HH:MM:SS`
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

function defaultSink(line: string, level: LogLevel): void {
  if (level === 'warn' || level === 'error') {
    console.error(line);
  } else {
    console.log(line);
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const verbose = options.verbose ?? false;
  const colors = pc.createColors(options.colors ?? pc.isColorSupported);
  const sink = options.sink ?? defaultSink;
  const now = options.now ?? (() => new Date());

  const paint: Record<LogLevel, (text: string) => string> = {
    debug: colors.dim,
    info: colors.cyan,
    warn: colors.yellow,
    error: colors.red,
  };

  function emit(level: LogLevel, message: string): void {
    if (level === 'debug' && !verbose) return;

    const parts: string[] = [];
    if (verbose) parts.push(colors.dim(formatTimestamp(now())));
    parts.push(colors.dim(PREFIX));
    // Level is only shown for warnings and errors, unless verbose
    if (verbose || level === 'warn' || level === 'error') {
      parts.push(paint[level](LEVEL_LABELS[level]));
    }
    parts.push(level === 'debug' ? colors.dim(message) : message);

    sink(parts.join(' '), level);
  }

  return {
    verbose,
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message),
  };
}
