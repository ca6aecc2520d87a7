/**
 * Error types for charmwarm
 */

export enum ErrorCode {
  PRECONDITION = 'PRECONDITION',
  VALIDATION = 'VALIDATION',
  RATE_LIMIT = 'RATE_LIMIT',
  CATALOG = 'CATALOG',
  NO_CACHE = 'NO_CACHE',
  ARCHIVE_INTEGRITY = 'ARCHIVE_INTEGRITY',
}

export class CharmwarmError extends Error {
  public readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options: { cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'CharmwarmError';
    this.code = code;
  }
}

/** Tool missing or too old, input file missing, not inside a git repository */
export class PreconditionError extends CharmwarmError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(ErrorCode.PRECONDITION, message, options);
    this.name = 'PreconditionError';
  }
}

/** Bad user selection or manifest content, raised before any network call */
export class ValidationError extends CharmwarmError {
  constructor(message: string) {
    super(ErrorCode.VALIDATION, message);
    this.name = 'ValidationError';
  }
}

export class RateLimitError extends CharmwarmError {
  public readonly retryAfterSeconds: number;
  public readonly retryAt: Date;

  constructor(message: string, retryAfterSeconds: number, retryAt: Date) {
    super(ErrorCode.RATE_LIMIT, message);
    this.name = 'RateLimitError';
    this.retryAfterSeconds = retryAfterSeconds;
    this.retryAt = retryAt;
  }
}

export class CatalogError extends CharmwarmError {
  /** HTTP status, absent when the request never got a response */
  public readonly status: number | undefined;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(ErrorCode.CATALOG, message, options);
    this.name = 'CatalogError';
    this.status = options.status;
  }
}

export class NoCacheFoundError extends CharmwarmError {
  constructor(message: string) {
    super(ErrorCode.NO_CACHE, message);
    this.name = 'NoCacheFoundError';
  }
}

export class ArchiveIntegrityError extends CharmwarmError {
  public readonly entry: string;

  constructor(archive: string, entry: string, reason: string) {
    super(ErrorCode.ARCHIVE_INTEGRITY, `Refusing to unpack ${archive}: entry '${entry}' ${reason}`);
    this.name = 'ArchiveIntegrityError';
    this.entry = entry;
  }
}

/**
 * Node filesystem/spawn errors carry a string `code`
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}
