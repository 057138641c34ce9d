// packages/scanners/src/indexer/indexer.test.ts
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, mkdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { AssetIndexer } from "./indexer.js";
import { InMemoryAssetStore } from "./asset-store.js";

const modelDir = join("Models", "Vehicles");
const OBJ = join(modelDir, "tree_prop.obj");
const MTL = join(modelDir, "tree_prop.mtl");
const BARK = join(modelDir, "bark.png");
const BRICK = join("Textures", "brick.jpg");
const THEME = join("audio", "theme.mp3");
const EMPTY = "empty.wav";

async function createAssetTree(root: string): Promise<void> {
  await mkdir(join(root, modelDir), { recursive: true });
  await mkdir(join(root, "Textures"));
  await mkdir(join(root, "audio"));
  await writeFile(join(root, OBJ), "mtllib tree_prop.mtl\nv 0 0 0\nv 1 0 0\nv 0 1 0\nf 1 2 3\n");
  await writeFile(join(root, MTL), "newmtl bark\nmap_Kd bark.png\n");
  await writeFile(join(root, BARK), Buffer.from([0x89, 0x50, 0x4e, 0x47]));
  await writeFile(join(root, BRICK), Buffer.from([0xff, 0xd8, 0xff]));
  await writeFile(join(root, THEME), "ID3");
  await writeFile(join(root, EMPTY), "");
  await writeFile(join(root, "notes.txt"), "not an asset");
}

function paths(records: { relativePath: string }[]): string[] {
  return records.map((record) => record.relativePath).sort();
}

describe("AssetIndexer", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "assetlens-index-"));
    await createAssetTree(root);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  describe("scan", () => {
    it("indexes supported files in path order", async () => {
      const indexer = new AssetIndexer();

      expect(await indexer.scan(root)).toBe(true);

      expect(indexer.getAllAssets().map((record) => record.relativePath)).toEqual([
        BARK,
        MTL,
        OBJ,
        BRICK,
        THEME,
        EMPTY,
      ]);
      expect(indexer.getCacheSize()).toBe(6);
      expect(indexer.getAssetByPath("notes.txt")).toBeNull();
      expect(indexer.getRootPath()).toBe(root);
      expect(indexer.isCacheValid()).toBe(true);
    });

    it("builds category and type projections", async () => {
      const indexer = new AssetIndexer();
      await indexer.scan(root);

      expect(indexer.getCategories()).toEqual(["Environment", "Misc", "Vehicles"]);
      expect(indexer.getTypes()).toEqual(["Audio", "Material", "Model", "Texture"]);
      expect(paths(indexer.getAssetsByCategory("Environment"))).toEqual([MTL, OBJ]);
      expect(paths(indexer.getAssetsByCategory("Vehicles"))).toEqual([BARK]);
      expect(paths(indexer.getAssetsByType("Texture"))).toEqual([BARK, BRICK]);
    });

    it("records dependencies and indexer-level issues", async () => {
      const indexer = new AssetIndexer();
      await indexer.scan(root);

      expect(indexer.getAssetByPath(OBJ)?.dependencies).toEqual([MTL, BARK]);
      expect(indexer.getAssetByPath(EMPTY)).toMatchObject({
        isValid: false,
        issues: ["File is empty"],
      });
    });

    it("answers a second scan from the cache", async () => {
      const indexer = new AssetIndexer();

      await indexer.scan(root);
      await indexer.scan(root);

      expect(indexer.getStats()).toMatchObject({
        traversals: 1,
        cacheHits: 1,
        filesVisited: 7,
        assetsFound: 6,
      });
    });

    it("serializes concurrent scans on one instance", async () => {
      const indexer = new AssetIndexer();

      const outcomes = await Promise.all([indexer.scan(root), indexer.scan(root)]);

      expect(outcomes).toEqual([true, true]);
      expect(indexer.getStats()).toMatchObject({ traversals: 1, cacheHits: 1 });
    });

    it("rescans when forced", async () => {
      const indexer = new AssetIndexer();

      await indexer.scan(root);
      await writeFile(join(root, "house.fbx"), "; FBX 7.4.0 project file");
      await indexer.scan(root, { forceRefresh: true });

      expect(indexer.getStats().traversals).toBe(2);
      expect(indexer.getAssetByPath("house.fbx")?.category).toBe("Buildings");
    });

    it("rescans once the snapshot expires", async () => {
      let clock = 1_000_000;
      const indexer = new AssetIndexer({ now: () => clock, cacheExpirySeconds: 300 });

      await indexer.scan(root);
      expect(indexer.getLastScanTime()).toEqual(new Date(1_000_000));

      clock += 299_999;
      expect(indexer.isCacheValid()).toBe(true);

      clock += 1;
      expect(indexer.isCacheValid()).toBe(false);

      await indexer.scan(root);
      expect(indexer.getStats()).toMatchObject({ traversals: 2, cacheHits: 0 });
    });

    it("rescans when asked for a different root", async () => {
      const other = await mkdtemp(join(tmpdir(), "assetlens-index-other-"));
      try {
        await writeFile(join(other, "car.obj"), "v 0 0 0\n");
        const indexer = new AssetIndexer();

        await indexer.scan(root);
        await indexer.scan(other);

        expect(indexer.getStats().traversals).toBe(2);
        expect(paths(indexer.getAllAssets())).toEqual(["car.obj"]);
      } finally {
        await rm(other, { recursive: true, force: true });
      }
    });

    it("returns false for an inaccessible root and keeps no partial state", async () => {
      const indexer = new AssetIndexer();
      await indexer.scan(root);

      expect(await indexer.scan(join(root, "missing"))).toBe(false);

      expect(indexer.getCacheSize()).toBe(0);
      expect(indexer.isCacheValid()).toBe(false);
    });

    it("returns false when the root is a file", async () => {
      const indexer = new AssetIndexer();

      expect(await indexer.scan(join(root, THEME))).toBe(false);
    });

    it("returns false and leaves the index empty when aborted", async () => {
      const controller = new AbortController();
      controller.abort();
      const indexer = new AssetIndexer();

      expect(await indexer.scan(root, { signal: controller.signal })).toBe(false);

      expect(indexer.getCacheSize()).toBe(0);
      expect(indexer.isCacheValid()).toBe(false);
    });

    it("writes through an injected store", async () => {
      const store = new InMemoryAssetStore();
      const indexer = new AssetIndexer({ store });

      await indexer.scan(root);

      expect(store.size).toBe(6);
    });

    it("skips metadata extraction when details are disabled", async () => {
      const indexer = new AssetIndexer({ extractDetails: false });
      await indexer.scan(root);

      expect(indexer.getAssetByPath(OBJ)?.metadata).toEqual({ kind: "none" });
      expect(indexer.getAssetByPath(OBJ)?.dependencies).toEqual([]);
    });

    it("reports progress and verbose messages", async () => {
      const onProgress = vi.fn();
      const onVerbose = vi.fn();
      const indexer = new AssetIndexer({ onProgress, onVerbose });

      await indexer.scan(root);
      await indexer.scan(root);

      expect(onProgress).toHaveBeenCalledTimes(6);
      expect(onProgress).toHaveBeenLastCalledWith(6);
      expect(onVerbose).toHaveBeenCalledWith(`Starting asset scan in: ${root}`);
      expect(onVerbose).toHaveBeenCalledWith("Using cached asset index (valid for 300 seconds)");
    });
  });

  describe("cache expiry", () => {
    it("is configurable", () => {
      const indexer = new AssetIndexer();
      expect(indexer.getCacheExpiry()).toBe(300);

      indexer.setCacheExpiry(10);

      expect(indexer.getCacheExpiry()).toBe(10);
    });

    it("clearCache drops records and validity", async () => {
      const indexer = new AssetIndexer();
      await indexer.scan(root);

      indexer.clearCache();

      expect(indexer.getCacheSize()).toBe(0);
      expect(indexer.getCategories()).toEqual([]);
      expect(indexer.isCacheValid()).toBe(false);
    });
  });

  describe("search", () => {
    it("filters by text, type, category, size and modification time", async () => {
      const indexer = new AssetIndexer();
      await indexer.scan(root);

      expect(paths(indexer.search({ text: "TREE" }))).toEqual([MTL, OBJ]);
      expect(paths(indexer.search({ assetType: "Audio", maxSizeBytes: 0 }))).toEqual([EMPTY]);
      expect(paths(indexer.search({ assetType: "Audio", minSizeBytes: 1 }))).toEqual([THEME]);
      expect(paths(indexer.search({ category: "Vehicles" }))).toEqual([BARK]);
      expect(indexer.search({ modifiedAfter: Number.MAX_SAFE_INTEGER })).toEqual([]);
      expect(indexer.search({ modifiedBefore: 0 })).toEqual([]);
      expect(indexer.search({})).toHaveLength(6);
    });
  });

  describe("incremental updates", () => {
    it("indexes a new file without a rescan", async () => {
      const indexer = new AssetIndexer();
      await indexer.scan(root);
      await writeFile(join(root, "house.fbx"), "; FBX 7.4.0 project file");

      const record = await indexer.updateAsset("house.fbx");

      expect(record).toMatchObject({
        relativePath: "house.fbx",
        assetType: "Model",
        category: "Buildings",
        metadata: { kind: "fbx-header", encoding: "ascii" },
      });
      expect(paths(indexer.getAssetsByCategory("Buildings"))).toEqual(["house.fbx"]);
      expect(indexer.getStats().traversals).toBe(1);
    });

    it("drops the record of a deleted file", async () => {
      const indexer = new AssetIndexer();
      await indexer.scan(root);
      await rm(join(root, THEME));

      expect(await indexer.updateAsset(join(root, THEME))).toBeNull();

      expect(indexer.getAssetByPath(THEME)).toBeNull();
      expect(paths(indexer.getAssetsByType("Audio"))).toEqual([EMPTY]);
    });

    it("ignores updates before any scan", async () => {
      const indexer = new AssetIndexer();

      expect(await indexer.updateAsset(join(root, OBJ))).toBeNull();
      expect(indexer.getCacheSize()).toBe(0);
    });

    it("removes a record from every projection", async () => {
      const indexer = new AssetIndexer();
      await indexer.scan(root);

      expect(await indexer.removeAsset(BRICK)).toBe(true);
      expect(await indexer.removeAsset(BRICK)).toBe(false);

      expect(indexer.getAssetByPath(BRICK)).toBeNull();
      expect(paths(indexer.getAssetsByType("Texture"))).toEqual([BARK]);
      expect(paths(indexer.getAssetsByCategory("Misc"))).toEqual([THEME, EMPTY].sort());
    });
  });

  describe("persistence", () => {
    it("restores the same index after save, clear and load", async () => {
      const indexer = new AssetIndexer();
      await indexer.scan(root);
      const before = indexer.getAllAssets();
      const cacheFile = join(root, "cache", "index.json");

      expect(await indexer.saveCache(cacheFile)).toBe(true);
      indexer.clearCache();
      expect(indexer.getCacheSize()).toBe(0);

      expect(await indexer.loadCache(cacheFile)).toBe(true);

      expect(indexer.getAllAssets()).toEqual(before);
      expect(indexer.getCategories()).toEqual(["Environment", "Misc", "Vehicles"]);
      expect(paths(indexer.getAssetsByType("Texture"))).toEqual([BARK, BRICK]);
    });

    it("defaults to a cache file under the scan root", async () => {
      const indexer = new AssetIndexer();
      await indexer.scan(root);

      expect(await indexer.saveCache()).toBe(true);

      const fresh = new AssetIndexer();
      expect(await fresh.loadCache(join(root, ".assetlens", "index-cache.json"))).toBe(true);
      expect(fresh.getCacheSize()).toBe(6);
      expect(fresh.getRootPath()).toBe(root);
    });

    it("loads an old snapshot as expired", async () => {
      const cacheFile = join(root, "old-cache.json");
      const writer = new AssetIndexer({ now: () => 1_000_000 });
      await writer.scan(root);
      await writer.saveCache(cacheFile);

      const reader = new AssetIndexer();
      expect(await reader.loadCache(cacheFile)).toBe(true);

      expect(reader.getCacheSize()).toBe(6);
      expect(reader.getLastScanTime()).toEqual(new Date(1_000_000));
      expect(reader.isCacheValid()).toBe(false);
    });

    it("treats an unreadable cache as a miss and keeps the current index", async () => {
      const indexer = new AssetIndexer();
      await indexer.scan(root);
      await writeFile(join(root, "broken.json"), "{");

      expect(await indexer.loadCache(join(root, "broken.json"))).toBe(false);
      expect(await indexer.loadCache(join(root, "absent.json"))).toBe(false);

      expect(indexer.getCacheSize()).toBe(6);
    });

    it("reports save failures as false", async () => {
      const indexer = new AssetIndexer();
      await indexer.scan(root);

      expect(await indexer.saveCache(join(root, EMPTY, "cache.json"))).toBe(false);
    });

    it("cannot save without a path before any scan", async () => {
      expect(await new AssetIndexer().saveCache()).toBe(false);
    });
  });
});
