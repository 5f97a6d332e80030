import { describe, it, expect, beforeEach } from 'vitest';
import { promises as fs } from 'fs';
import { join } from 'path';
import { EntryStore } from '../src/entry-store.js';
import { NotFoundError } from '../src/errors.js';
import { toBytes } from '../src/utils.js';
import { createTestDir } from './test-utils.js';

const k = (s: string) => toBytes(s);

describe('EntryStore', () => {
  let dir: string;
  let store: EntryStore;

  beforeEach(async () => {
    dir = await createTestDir('entry-store');
    store = new EntryStore({ dir, mode: 0o644, atomic: true });
  });

  describe('write/read', () => {
    it('should store and retrieve values', async () => {
      await store.write(k('key1'), toBytes('value1'));
      expect((await store.read(k('key1'))).toString()).toBe('value1');
    });

    it('should store binary values byte for byte', async () => {
      const value = new Uint8Array([0, 255, 1, 254, 10, 13]);
      await store.write(k('bin'), value);
      expect(await store.read(k('bin'))).toEqual(Buffer.from(value));
    });

    it('should overwrite existing values', async () => {
      await store.write(k('key'), toBytes('value1'));
      await store.write(k('key'), toBytes('v2'));
      expect((await store.read(k('key'))).toString()).toBe('v2');
    });

    it('should throw NotFoundError for missing keys', async () => {
      await expect(store.read(k('nonexistent'))).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should name files by the escaped key and leave no temp files', async () => {
      await store.write(k('a/b c'), toBytes('x'));
      expect(await fs.readdir(dir)).toEqual(['a_%_b#40c']);
      expect(await fs.readFile(join(dir, 'a_%_b#40c'), 'utf8')).toBe('x');
    });

    it('should write in place when atomic writes are off', async () => {
      const direct = new EntryStore({ dir, mode: 0o644, atomic: false });
      await direct.write(k('plain'), toBytes('value'));
      expect((await direct.read(k('plain'))).toString()).toBe('value');
      expect(await fs.readdir(dir)).toEqual(['plain']);
    });
  });

  describe('remove', () => {
    it('should delete existing entries', async () => {
      await store.write(k('key'), toBytes('value'));
      await store.remove(k('key'));
      await expect(store.read(k('key'))).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should throw NotFoundError for missing entries', async () => {
      await expect(store.remove(k('nonexistent'))).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('exists', () => {
    it('should report existing and missing entries', async () => {
      await store.write(k('key'), toBytes('value'));
      expect(await store.exists(k('key'))).toBe(true);
      expect(await store.exists(k('other'))).toBe(false);
    });
  });

  describe('path', () => {
    it('should join the directory and escaped key', () => {
      expect(store.path(k('.hidden'))).toBe(join(dir, '#5chidden'));
    });
  });
});
