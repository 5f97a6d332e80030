export type LruDirErrorCode =
  | 'INVALID_ARGUMENT'
  | 'NOT_FOUND'
  | 'IO_FAILURE'
  | 'NOT_A_CACHE'
  | 'LOCK_FAILURE';

/**
 * Base class for every error the cache raises. `code` discriminates the kind,
 * `path` names the file involved when there is one.
 */
export class LruDirError extends Error {
  readonly code: LruDirErrorCode;
  readonly path: string | undefined;

  constructor(code: LruDirErrorCode, message: string, path?: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'LruDirError';
    this.code = code;
    this.path = path;
  }
}

export class InvalidArgumentError extends LruDirError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
    this.name = 'InvalidArgumentError';
  }
}

export class CacheClosedError extends LruDirError {
  constructor() {
    super('INVALID_ARGUMENT', 'Cache is closed');
    this.name = 'CacheClosedError';
  }
}

export class NotFoundError extends LruDirError {
  constructor(message: string, path?: string, cause?: unknown) {
    super('NOT_FOUND', message, path, cause);
    this.name = 'NotFoundError';
  }
}

export class IOFailureError extends LruDirError {
  constructor(message: string, path?: string, cause?: unknown) {
    super('IO_FAILURE', message, path, cause);
    this.name = 'IOFailureError';
  }
}

export class NotACacheError extends LruDirError {
  constructor(message: string, path?: string, cause?: unknown) {
    super('NOT_A_CACHE', message, path, cause);
    this.name = 'NotACacheError';
  }
}

export class LockFailureError extends LruDirError {
  constructor(message: string, path?: string, cause?: unknown) {
    super('LOCK_FAILURE', message, path, cause);
    this.name = 'LockFailureError';
  }
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}

export function hasErrno(err: unknown, code: string): boolean {
  return isErrnoException(err) && err.code === code;
}

export function isNotFound(err: unknown): boolean {
  return err instanceof NotFoundError;
}

/**
 * Translate a filesystem failure into the cache's taxonomy.
 * ENOENT becomes NotFound, anything else IOFailure. Cache errors pass through.
 */
export function toCacheError(err: unknown, path: string): LruDirError {
  if (err instanceof LruDirError) return err;
  if (hasErrno(err, 'ENOENT')) {
    return new NotFoundError(`No such file: ${path}`, path, err);
  }
  const reason = err instanceof Error ? err.message : String(err);
  return new IOFailureError(`I/O failure on ${path}: ${reason}`, path, err);
}
