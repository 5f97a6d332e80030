import { describe, it, expect, vi } from "vitest";
import { promises as fs } from "fs";
import { join } from "path";
import { LruDir } from "../src/cache.js";
import { IOFailureError, NotACacheError, NotFoundError } from "../src/errors.js";
import { Logger } from "../src/types.js";
import { createTestDir, keyStrings, silentLogger, testDir } from "./test-utils.js";

const CACHE_LAYOUT = [".lru", ".lrulock", "~next", "~prev"];

describe("LruDir lifecycle", () => {
  describe("create", () => {
    it("should write the anchors, lock file and state marker", async () => {
      const dir = await createTestDir("create");
      const cache = await LruDir.create(dir, { logger: silentLogger });

      expect((await fs.readdir(dir)).sort()).toEqual(CACHE_LAYOUT);
      expect(await fs.readFile(join(dir, ".lru"), "utf8")).toBe('{"version":1}\n');
      expect(await fs.readFile(join(dir, "~next"), "utf8")).toBe("");
      expect(await fs.readFile(join(dir, "~prev"), "utf8")).toBe("");
      expect(await cache.keys()).toEqual([]);
    });

    it("should fail with NotFoundError when the directory does not exist", async () => {
      const dir = testDir("create-missing");
      await expect(LruDir.create(dir, { logger: silentLogger })).rejects.toBeInstanceOf(NotFoundError);
      await expect(fs.stat(dir)).rejects.toThrow();
    });

    it("should refuse a path that is a file and leave it alone", async () => {
      const parent = await createTestDir("create-file");
      const file = join(parent, "plain");
      await fs.writeFile(file, "data");

      await expect(LruDir.create(file, { logger: silentLogger })).rejects.toBeInstanceOf(IOFailureError);
      expect(await fs.readFile(file, "utf8")).toBe("data");
    });

    it("should remove the directory when initialization fails", async () => {
      const dir = await createTestDir("create-rollback");
      // A directory where the state marker goes makes the final write fail
      await fs.mkdir(join(dir, ".lru"));
      const logger: Logger = { debug: vi.fn(), warn: vi.fn() };

      await expect(LruDir.create(dir, { logger })).rejects.toBeInstanceOf(IOFailureError);
      await expect(fs.stat(dir)).rejects.toThrow();
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });
  });

  describe("open", () => {
    it("should reopen an existing cache with its contents and order", async () => {
      const dir = await createTestDir("open");
      const created = await LruDir.create(dir, { logger: silentLogger });
      await created.put("a", "1");
      await created.put("b", "2");
      await created.close();

      const cache = await LruDir.open(dir, { logger: silentLogger });
      expect(keyStrings(await cache.keys())).toEqual(["b", "a"]);
      expect((await cache.get("a")).toString()).toBe("1");
      expect(keyStrings(await cache.keys())).toEqual(["a", "b"]);
    });

    it("should fail with NotACacheError without a state marker", async () => {
      const dir = await createTestDir("open-plain");
      await fs.writeFile(join(dir, "unrelated"), "x");

      await expect(LruDir.open(dir, { logger: silentLogger })).rejects.toBeInstanceOf(NotACacheError);
      expect(await fs.readdir(dir)).toEqual(["unrelated"]);
    });

    it("should fail with NotACacheError for an unparseable marker", async () => {
      const dir = await createTestDir("open-corrupt");
      await fs.writeFile(join(dir, ".lru"), "{not json");
      await expect(LruDir.open(dir, { logger: silentLogger })).rejects.toBeInstanceOf(NotACacheError);
    });

    it("should fail with NotACacheError for a marker of the wrong shape", async () => {
      const dir = await createTestDir("open-shape");
      await fs.writeFile(join(dir, ".lru"), '{"version":"one"}');
      await expect(LruDir.open(dir, { logger: silentLogger })).rejects.toBeInstanceOf(NotACacheError);
    });

    it("should fail with IOFailureError when the marker cannot be read", async () => {
      const dir = await createTestDir("open-unreadable");
      await fs.mkdir(join(dir, ".lru"));

      await expect(LruDir.open(dir, { logger: silentLogger })).rejects.toBeInstanceOf(IOFailureError);
      expect(await fs.readdir(dir)).toEqual([".lru"]);
    });

    it("should fail with NotACacheError for a missing directory", async () => {
      const dir = testDir("open-missing");
      await expect(LruDir.open(dir, { logger: silentLogger })).rejects.toBeInstanceOf(NotACacheError);
    });
  });

  describe("openOrCreate", () => {
    it("should create the directory and cache when missing", async () => {
      const root = testDir("ooc-missing");
      const dir = join(root, "nested", "cache");

      const cache = await LruDir.openOrCreate(dir, { logger: silentLogger });
      expect((await fs.readdir(dir)).sort()).toEqual(CACHE_LAYOUT);
      await cache.put("k", "v");
      expect((await cache.get("k")).toString()).toBe("v");
    });

    it("should open an existing cache", async () => {
      const dir = await createTestDir("ooc-existing");
      const created = await LruDir.create(dir, { logger: silentLogger });
      await created.put("k", "v");

      const cache = await LruDir.openOrCreate(dir, { logger: silentLogger });
      expect(keyStrings(await cache.keys())).toEqual(["k"]);
    });

    it("should surface NotACacheError for an existing non-cache directory", async () => {
      const dir = await createTestDir("ooc-plain");
      await expect(LruDir.openOrCreate(dir, { logger: silentLogger })).rejects.toBeInstanceOf(NotACacheError);
      expect(await fs.readdir(dir)).toEqual([]);
    });
  });
});
