import { promises as fs } from 'fs';
import { join } from 'path';
import { Key } from './types.js';
import { escapeKey, writeFileAtomic, WriteOptions } from './utils.js';
import { toCacheError } from './errors.js';

export interface EntryStoreOptions extends WriteOptions {
  dir: string;
}

/**
 * Value files, one per key, named by the escaped key.
 * No locking: callers serialize access.
 */
export class EntryStore {
  private readonly dir: string;
  private readonly writeOptions: WriteOptions;

  constructor(options: EntryStoreOptions) {
    this.dir = options.dir;
    this.writeOptions = { mode: options.mode, atomic: options.atomic };
  }

  /**
   * Get the file path for a key, whether or not the entry exists
   */
  path(key: Key): string {
    return join(this.dir, escapeKey(key));
  }

  async write(key: Key, value: Uint8Array): Promise<void> {
    const filePath = this.path(key);
    try {
      await writeFileAtomic(filePath, value, this.writeOptions);
    } catch (err) {
      throw toCacheError(err, filePath);
    }
  }

  /**
   * Read a value. Throws NotFoundError if the entry does not exist.
   */
  async read(key: Key): Promise<Buffer> {
    const filePath = this.path(key);
    try {
      return await fs.readFile(filePath);
    } catch (err) {
      throw toCacheError(err, filePath);
    }
  }

  async remove(key: Key): Promise<void> {
    const filePath = this.path(key);
    try {
      await fs.unlink(filePath);
    } catch (err) {
      throw toCacheError(err, filePath);
    }
  }

  async exists(key: Key): Promise<boolean> {
    const filePath = this.path(key);
    try {
      const stat = await fs.stat(filePath);
      return stat.isFile();
    } catch (err) {
      const mapped = toCacheError(err, filePath);
      if (mapped.code === 'NOT_FOUND') return false;
      throw mapped;
    }
  }
}
