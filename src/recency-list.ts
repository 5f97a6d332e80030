import { promises as fs } from 'fs';
import { join } from 'path';
import { Key } from './types.js';
import { escapeKey, writeFileAtomic, WriteOptions } from './utils.js';
import { InvalidArgumentError, toCacheError } from './errors.js';

export interface RecencyListOptions extends WriteOptions {
  dir: string;
}

const EMPTY: Key = new Uint8Array(0);

const NEXT_SUFFIX = '~next';
const PREV_SUFFIX = '~prev';

/**
 * Doubly linked list of keys kept entirely on disk.
 *
 * Every attached key has two pointer files: `<name>~next` holds the key after it
 * (toward the tail, less recently used) and `<name>~prev` the key before it.
 * An empty file means "no neighbour". The empty key's own pointer files,
 * `~next` and `~prev`, are the head and tail anchors, so splices never need a
 * special case for the ends of the list.
 *
 * Splices are sequences of independent writes. A failure part way through
 * leaves the list inconsistent; nothing here detects or repairs that.
 */
export class RecencyList {
  private readonly dir: string;
  private readonly writeOptions: WriteOptions;

  constructor(options: RecencyListOptions) {
    this.dir = options.dir;
    this.writeOptions = { mode: options.mode, atomic: options.atomic };
  }

  nextPath(key: Key): string {
    return join(this.dir, escapeKey(key) + NEXT_SUFFIX);
  }

  prevPath(key: Key): string {
    return join(this.dir, escapeKey(key) + PREV_SUFFIX);
  }

  private async readPointer(filePath: string): Promise<Buffer> {
    try {
      return await fs.readFile(filePath);
    } catch (err) {
      throw toCacheError(err, filePath);
    }
  }

  private async writePointer(filePath: string, key: Key): Promise<void> {
    try {
      await writeFileAtomic(filePath, key, this.writeOptions);
    } catch (err) {
      throw toCacheError(err, filePath);
    }
  }

  private async removePointer(filePath: string): Promise<void> {
    try {
      await fs.unlink(filePath);
    } catch (err) {
      throw toCacheError(err, filePath);
    }
  }

  /**
   * Write both anchors empty.
   */
  async init(): Promise<void> {
    await this.writePointer(this.nextPath(EMPTY), EMPTY);
    await this.writePointer(this.prevPath(EMPTY), EMPTY);
  }

  /** Most recently used key, or null when the list is empty. */
  async head(): Promise<Buffer | null> {
    const key = await this.readPointer(this.nextPath(EMPTY));
    return key.length === 0 ? null : key;
  }

  /** Least recently used key, or null when the list is empty. */
  async tail(): Promise<Buffer | null> {
    const key = await this.readPointer(this.prevPath(EMPTY));
    return key.length === 0 ? null : key;
  }

  /**
   * Link a key in front of the current head. The key must not be attached.
   */
  async attachHead(key: Key): Promise<void> {
    const head = await this.readPointer(this.nextPath(EMPTY));

    await this.writePointer(this.nextPath(EMPTY), key);
    await this.writePointer(this.prevPath(key), EMPTY);
    await this.writePointer(this.nextPath(key), head);
    // With an empty list `head` is the empty key, so this sets the tail anchor.
    await this.writePointer(this.prevPath(head), key);
  }

  /**
   * Unlink a key from its neighbours, leaving its own pointer files stale.
   * Throws NotFoundError when the key is not attached.
   */
  async detach(key: Key): Promise<void> {
    if (key.length === 0) {
      throw new InvalidArgumentError('Cannot detach the anchor');
    }

    const next = await this.readPointer(this.nextPath(key));
    const prev = await this.readPointer(this.prevPath(key));

    await this.writePointer(this.prevPath(next), prev);
    await this.writePointer(this.nextPath(prev), next);
  }

  /**
   * Delete a detached key's pointer files.
   */
  async removeNode(key: Key): Promise<void> {
    if (key.length === 0) {
      throw new InvalidArgumentError('Cannot remove the anchor');
    }
    await this.removePointer(this.nextPath(key));
    await this.removePointer(this.prevPath(key));
  }

  /**
   * All keys from most to least recently used. O(n) reads.
   */
  async traverse(): Promise<Buffer[]> {
    const keys: Buffer[] = [];
    let key = await this.readPointer(this.nextPath(EMPTY));
    while (key.length > 0) {
      keys.push(key);
      key = await this.readPointer(this.nextPath(key));
    }
    return keys;
  }
}
