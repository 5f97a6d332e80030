/**
 * A cache key as stored on disk. The empty key is reserved for the list anchors.
 */
export type Key = Uint8Array;

/** Keys and values may be given as bytes or as strings (encoded as UTF-8). */
export type KeyInput = Uint8Array | string;
export type ValueInput = Uint8Array | string;

export interface Logger {
  debug(message: string, ...data: unknown[]): void;
  warn(message: string, ...data: unknown[]): void;
}

/**
 * Configuration options for LruDir
 *
 * @remarks
 * **Known Limitations:**
 * - Multi-file updates are not atomic. A crash in the middle of a splice can leave the
 *   recency list inconsistent, and nothing detects or repairs that.
 * - The lock handle is never taken by cache operations; wrap call sequences in
 *   `withLock()` when several processes share a directory.
 */
export interface CacheOptions {
  /** Mode for entry, pointer, state and lock files (default: 0o644) */
  fileMode?: number;
  /** Write each file through a temp file and rename (default: true) */
  atomicWrites?: boolean;
  /** Milliseconds `lock()` waits before giving up (default: 10000) */
  lockTimeout?: number;
  /** Milliseconds between lock attempts (default: 25) */
  lockRetryInterval?: number;
  /** Logger for lifecycle warnings (default: console, debug silenced) */
  logger?: Logger;
}

export type ResolvedCacheOptions = Required<CacheOptions>;

/** Persisted in `.lru` to mark a directory as a cache. */
export interface CacheState {
  version: number;
}

export const STATE_VERSION = 1;

export const STATE_FILE = ".lru";
export const LOCK_FILE = ".lrulock";

export const defaultLogger: Logger = {
  debug: () => {},
  warn: (message: string, ...data: unknown[]) => console.warn(`[lru-dir] ${message}`, ...data),
};

export const DEFAULT_OPTIONS: ResolvedCacheOptions = {
  fileMode: 0o644,
  atomicWrites: true,
  lockTimeout: 10_000,
  lockRetryInterval: 25,
  logger: defaultLogger,
};

export function resolveOptions(options: CacheOptions = {}): ResolvedCacheOptions {
  return {
    fileMode: options.fileMode ?? DEFAULT_OPTIONS.fileMode,
    atomicWrites: options.atomicWrites ?? DEFAULT_OPTIONS.atomicWrites,
    lockTimeout: options.lockTimeout ?? DEFAULT_OPTIONS.lockTimeout,
    lockRetryInterval: options.lockRetryInterval ?? DEFAULT_OPTIONS.lockRetryInterval,
    logger: options.logger ?? DEFAULT_OPTIONS.logger,
  };
}
