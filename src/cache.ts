import { promises as fs } from "fs";
import { join } from "path";
import {
  CacheOptions,
  Key,
  KeyInput,
  LOCK_FILE,
  Logger,
  ResolvedCacheOptions,
  ValueInput,
  resolveOptions,
} from "./types.js";
import { EntryStore } from "./entry-store.js";
import { RecencyList } from "./recency-list.js";
import { FileMutex, FileMutexOptions } from "./file-mutex.js";
import { readState, writeState } from "./state.js";
import { describeKey, toBytes, WriteOptions } from "./utils.js";
import {
  CacheClosedError,
  IOFailureError,
  InvalidArgumentError,
  NotACacheError,
  NotFoundError,
  hasErrno,
  isNotFound,
  toCacheError,
} from "./errors.js";

function writeOptions(opts: ResolvedCacheOptions): WriteOptions {
  return { mode: opts.fileMode, atomic: opts.atomicWrites };
}

function mutexOptions(opts: ResolvedCacheOptions): FileMutexOptions {
  return {
    mode: opts.fileMode,
    timeout: opts.lockTimeout,
    retryInterval: opts.lockRetryInterval,
    logger: opts.logger,
  };
}

/**
 * LruDir - A directory of files with least-recently-used ordering.
 *
 * Features:
 * - One file per entry, binary keys and values
 * - Recency order kept on disk as a doubly linked list of pointer files,
 *   so the key set is never loaded into memory
 * - O(1) get/put/delete/oldest, O(n) keys()
 * - A cross-process lock handle for callers that share a directory
 *
 * Nothing here synchronizes concurrent calls. Callers serialize access within
 * a process, and use `withLock()` across processes.
 */
export class LruDir {
  /** Cache root directory */
  readonly dir: string;
  /** Lock handle backed by `.lrulock`. Cache operations never take it. */
  readonly lock: FileMutex;

  private readonly entries: EntryStore;
  private readonly list: RecencyList;
  private readonly logger: Logger;
  private closed = false;

  private constructor(dir: string, lock: FileMutex, opts: ResolvedCacheOptions) {
    this.dir = dir;
    this.lock = lock;
    this.logger = opts.logger;
    this.entries = new EntryStore({ dir, ...writeOptions(opts) });
    this.list = new RecencyList({ dir, ...writeOptions(opts) });
  }

  /**
   * Initialize a cache in an existing directory.
   * If initialization fails, the whole directory is removed.
   */
  static async create(dir: string, options: CacheOptions = {}): Promise<LruDir> {
    const opts = resolveOptions(options);

    let isDirectory: boolean;
    try {
      isDirectory = (await fs.stat(dir)).isDirectory();
    } catch (err) {
      throw toCacheError(err, dir);
    }
    if (!isDirectory) {
      throw new IOFailureError(`${dir} is not a directory`, dir);
    }

    try {
      const lock = await FileMutex.open(join(dir, LOCK_FILE), mutexOptions(opts));
      const cache = new LruDir(dir, lock, opts);
      await cache.list.init();
      await writeState(dir, writeOptions(opts));
      opts.logger.debug(`Created LRU cache at ${dir}`);
      return cache;
    } catch (err) {
      opts.logger.warn(`Failed to initialize LRU cache at ${dir}, removing it`, err);
      try {
        await fs.rm(dir, { recursive: true, force: true });
      } catch (rmErr) {
        opts.logger.warn(`Could not remove ${dir} after failed initialization`, rmErr);
      }
      throw err;
    }
  }

  /**
   * Open an existing cache. Throws NotACacheError if the directory does not exist
   * or has no valid state marker. List consistency is not checked.
   */
  static async open(dir: string, options: CacheOptions = {}): Promise<LruDir> {
    const opts = resolveOptions(options);

    let isDirectory: boolean;
    try {
      isDirectory = (await fs.stat(dir)).isDirectory();
    } catch (err) {
      if (hasErrno(err, "ENOENT")) {
        throw new NotACacheError(`${dir} does not exist`, dir, err);
      }
      throw toCacheError(err, dir);
    }
    if (!isDirectory) {
      throw new NotACacheError(`${dir} is not a directory`, dir);
    }

    await readState(dir);
    const lock = await FileMutex.open(join(dir, LOCK_FILE), mutexOptions(opts));
    opts.logger.debug(`Opened LRU cache at ${dir}`);
    return new LruDir(dir, lock, opts);
  }

  /**
   * Open the cache at `dir`, or create the directory and a cache in it if it does not exist.
   * An existing directory that is not a cache fails with NotACacheError.
   */
  static async openOrCreate(dir: string, options: CacheOptions = {}): Promise<LruDir> {
    try {
      await fs.stat(dir);
    } catch (err) {
      if (!hasErrno(err, "ENOENT")) throw toCacheError(err, dir);
      try {
        await fs.mkdir(dir, { recursive: true });
      } catch (mkdirErr) {
        throw toCacheError(mkdirErr, dir);
      }
      return LruDir.create(dir, options);
    }
    return LruDir.open(dir, options);
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new CacheClosedError();
    }
  }

  private requireKey(input: KeyInput, action: string): Key {
    this.assertOpen();
    const key = toBytes(input);
    if (key.length === 0) {
      throw new InvalidArgumentError(`Cannot ${action} the empty key`);
    }
    return key;
  }

  /**
   * Path of the entry file for a key, whether or not the entry exists.
   */
  path(key: KeyInput): string {
    return this.entries.path(this.requireKey(key, "locate"));
  }

  /**
   * Get a value and mark the key as most recently used.
   * Throws NotFoundError if the key is absent.
   */
  async get(key: KeyInput): Promise<Buffer> {
    const k = this.requireKey(key, "get");
    const value = await this.entries.read(k);
    await this.list.detach(k);
    await this.list.attachHead(k);
    return value;
  }

  /**
   * Get a value without changing recency order.
   */
  async peek(key: KeyInput): Promise<Buffer> {
    return this.entries.read(this.requireKey(key, "peek"));
  }

  /**
   * Check whether an entry exists (does not change recency order).
   */
  async has(key: KeyInput): Promise<boolean> {
    return this.entries.exists(this.requireKey(key, "check"));
  }

  /**
   * Store a value and mark the key as most recently used.
   */
  async put(key: KeyInput, value: ValueInput): Promise<void> {
    const k = this.requireKey(key, "put");
    await this.entries.write(k, toBytes(value));

    try {
      await this.list.detach(k);
    } catch (err) {
      // A new key is not in the list yet
      if (!isNotFound(err)) throw err;
    }

    await this.list.attachHead(k);
  }

  /**
   * Remove a key. Throws NotFoundError if it is not in the cache.
   * A failure part way through is not rolled back.
   */
  async delete(key: KeyInput): Promise<void> {
    const k = this.requireKey(key, "delete");
    await this.list.detach(k);
    await this.entries.remove(k);
    await this.list.removeNode(k);
  }

  /**
   * All keys, most recently used first.
   */
  async keys(): Promise<Buffer[]> {
    this.assertOpen();
    return this.list.traverse();
  }

  /**
   * The least recently used key. Throws NotFoundError if the cache is empty.
   */
  async oldest(): Promise<Buffer> {
    this.assertOpen();
    const key = await this.list.tail();
    if (key === null) {
      throw new NotFoundError("Cache is empty", this.list.prevPath(new Uint8Array(0)));
    }
    return key;
  }

  /**
   * The most recently used key. Throws NotFoundError if the cache is empty.
   */
  async newest(): Promise<Buffer> {
    this.assertOpen();
    const key = await this.list.head();
    if (key === null) {
      throw new NotFoundError("Cache is empty", this.list.nextPath(new Uint8Array(0)));
    }
    return key;
  }

  /**
   * Evict the least recently used key and return it.
   */
  async deleteOldest(): Promise<Buffer> {
    const key = await this.oldest();
    await this.delete(key);
    this.logger.debug(`Evicted ${describeKey(key)} from ${this.dir}`);
    return key;
  }

  /**
   * Run `fn` while holding the directory's cross-process lock.
   */
  async withLock<T>(fn: (cache: LruDir) => T | Promise<T>): Promise<T> {
    this.assertOpen();
    return this.lock.withLock(() => fn(this));
  }

  /**
   * Release the lock if this handle holds it. Later calls fail with CacheClosedError.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (this.lock.locked) {
      await this.lock.unlock();
    }
    this.logger.debug(`Closed LRU cache at ${this.dir}`);
  }
}
