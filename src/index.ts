export { LruDir } from "./cache.js";
export { FileMutex } from "./file-mutex.js";
export type { FileMutexOptions } from "./file-mutex.js";
export { escapeKey } from "./utils.js";
export {
  LruDirError,
  InvalidArgumentError,
  CacheClosedError,
  NotFoundError,
  IOFailureError,
  NotACacheError,
  LockFailureError,
} from "./errors.js";
export type { LruDirErrorCode } from "./errors.js";
export { DEFAULT_OPTIONS, STATE_FILE, LOCK_FILE } from "./types.js";
export type { CacheOptions, CacheState, Key, KeyInput, ValueInput, Logger } from "./types.js";
