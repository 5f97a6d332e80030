import { promises as fs } from 'fs';
import { randomBytes } from 'crypto';
import { setTimeout as sleep } from 'timers/promises';
import { Logger } from './types.js';
import { LockFailureError, hasErrno } from './errors.js';

export interface FileMutexOptions {
  mode: number;
  /** Milliseconds lock() waits before failing */
  timeout: number;
  /** Milliseconds between attempts */
  retryInterval: number;
  logger: Logger;
}

const OWNER_SUFFIX = '.owner';
const STALE_SUFFIX = '.stale-';

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else
    return hasErrno(err, 'EPERM');
  }
}

/**
 * Cross-process mutex keyed by a file path.
 *
 * The backing file is created when the handle is opened. Holding the lock means
 * owning `<path>.owner`, created exclusively and containing `<pid>:<token>`, where
 * the token is unique to the handle. An owner file whose pid is no longer running
 * is treated as stale and removed.
 */
export class FileMutex {
  readonly path: string;
  private readonly ownerPath: string;
  private readonly options: FileMutexOptions;
  private readonly ownerContent: string;
  private held = false;

  private constructor(path: string, options: FileMutexOptions) {
    this.path = path;
    this.ownerPath = path + OWNER_SUFFIX;
    this.options = options;
    this.ownerContent = `${process.pid}:${randomBytes(8).toString('hex')}`;
  }

  /**
   * Establish a handle, creating the backing file if it does not exist.
   */
  static async open(path: string, options: FileMutexOptions): Promise<FileMutex> {
    try {
      const handle = await fs.open(path, 'a', options.mode);
      await handle.close();
    } catch (err) {
      throw new LockFailureError(`Cannot establish lock at ${path}`, path, err);
    }
    return new FileMutex(path, options);
  }

  /** Whether this handle currently holds the lock. */
  get locked(): boolean {
    return this.held;
  }

  private async createOwner(): Promise<boolean> {
    try {
      await fs.writeFile(this.ownerPath, this.ownerContent, {
        flag: 'wx',
        mode: this.options.mode,
      });
      return true;
    } catch (err) {
      if (hasErrno(err, 'EEXIST')) return false;
      throw new LockFailureError(`Cannot acquire lock at ${this.path}`, this.ownerPath, err);
    }
  }

  /**
   * Remove the owner file if its process is gone. Returns true if the lock may now be free.
   * An owner file without a readable pid is left alone: its writer may still be running.
   *
   * The stale file is renamed aside before it is deleted, and deleted only if the
   * renamed file is the one that was judged stale. Another handle may have
   * reclaimed and locked in between; its owner file is linked back in place.
   */
  private async reclaimStale(): Promise<boolean> {
    let content: string;
    try {
      content = await fs.readFile(this.ownerPath, 'utf8');
    } catch (err) {
      if (hasErrno(err, 'ENOENT')) return true;
      throw new LockFailureError(`Cannot inspect lock at ${this.path}`, this.ownerPath, err);
    }

    const pid = Number.parseInt(content, 10);
    if (!Number.isInteger(pid) || pid <= 0 || isProcessAlive(pid)) return false;

    const stalePath = `${this.ownerPath}${STALE_SUFFIX}${randomBytes(6).toString('hex')}`;
    try {
      await fs.rename(this.ownerPath, stalePath);
    } catch (err) {
      // Someone else moved it first
      if (hasErrno(err, 'ENOENT')) return true;
      throw new LockFailureError(`Cannot remove stale lock at ${this.path}`, this.ownerPath, err);
    }

    let moved: string;
    try {
      moved = await fs.readFile(stalePath, 'utf8');
    } catch (err) {
      throw new LockFailureError(`Cannot inspect lock at ${this.path}`, stalePath, err);
    }

    if (moved !== content) {
      await this.restoreOwner(stalePath);
      return false;
    }

    this.options.logger.warn(`Reclaiming stale lock ${this.ownerPath} left by pid ${pid}`);
    try {
      await fs.rm(stalePath, { force: true });
    } catch (err) {
      throw new LockFailureError(`Cannot remove stale lock at ${this.path}`, stalePath, err);
    }
    return true;
  }

  /**
   * Put a live owner file back after moving it aside by mistake.
   * `link` fails rather than overwrite if a third handle locked in the meantime.
   */
  private async restoreOwner(stalePath: string): Promise<void> {
    try {
      await fs.link(stalePath, this.ownerPath);
    } catch (err) {
      throw new LockFailureError(
        `Cannot restore the owner of ${this.path} after a concurrent reclaim`,
        this.ownerPath,
        err
      );
    } finally {
      await fs.rm(stalePath, { force: true });
    }
  }

  /**
   * Try once to take the lock.
   */
  async tryLock(): Promise<boolean> {
    if (this.held) {
      throw new LockFailureError('Lock is already held by this handle', this.path);
    }

    let acquired = await this.createOwner();
    if (!acquired && (await this.reclaimStale())) {
      acquired = await this.createOwner();
    }

    this.held = acquired;
    return acquired;
  }

  /**
   * Wait for the lock, polling until the configured timeout elapses.
   */
  async lock(): Promise<void> {
    const deadline = Date.now() + this.options.timeout;
    while (!(await this.tryLock())) {
      if (Date.now() >= deadline) {
        throw new LockFailureError(
          `Timed out after ${this.options.timeout}ms waiting for lock at ${this.path}`,
          this.ownerPath
        );
      }
      await sleep(this.options.retryInterval);
    }
  }

  /**
   * Release the lock. The owner file is removed only if it is still this handle's;
   * otherwise it is left in place and LockFailureError is thrown.
   */
  async unlock(): Promise<void> {
    if (!this.held) {
      throw new LockFailureError('Lock is not held by this handle', this.path);
    }

    let content: string;
    try {
      content = await fs.readFile(this.ownerPath, 'utf8');
    } catch (err) {
      if (hasErrno(err, 'ENOENT')) {
        this.held = false;
        throw new LockFailureError(`Lock at ${this.path} was released by someone else`, this.ownerPath, err);
      }
      throw new LockFailureError(`Cannot release lock at ${this.path}`, this.ownerPath, err);
    }

    if (content !== this.ownerContent) {
      this.held = false;
      throw new LockFailureError(`Lock at ${this.path} is now owned by someone else`, this.ownerPath);
    }

    try {
      await fs.unlink(this.ownerPath);
    } catch (err) {
      if (hasErrno(err, 'ENOENT')) {
        this.held = false;
        throw new LockFailureError(`Lock at ${this.path} was released by someone else`, this.ownerPath, err);
      }
      throw new LockFailureError(`Cannot release lock at ${this.path}`, this.ownerPath, err);
    }
    this.held = false;
  }

  /**
   * Run `fn` while holding the lock. The lock is released on every exit path,
   * unless `fn` already released it.
   */
  async withLock<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.lock();
    try {
      return await fn();
    } finally {
      if (this.held) {
        await this.unlock();
      }
    }
  }
}
