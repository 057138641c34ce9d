// packages/scanners/src/cache/index-cache.test.ts
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { NO_METADATA, type AssetRecord } from "@assetlens/core";
import { IndexCache, createSnapshot, getDefaultCachePath } from "./index-cache.js";

const records: AssetRecord[] = [
  {
    relativePath: "props/crate.obj",
    name: "crate",
    assetType: "Model",
    format: "OBJ",
    category: "Misc",
    sizeBytes: 120,
    modifiedAt: 1_700_000_100,
    metadata: { kind: "mesh", vertexCount: 8, faceCount: 6, materialCount: 1 },
    dependencies: ["props/crate.mtl"],
    isValid: true,
    issues: [],
    warnings: [],
  },
  {
    relativePath: "audio/rain.wav",
    name: "rain",
    assetType: "Audio",
    format: "WAV",
    category: "Misc",
    sizeBytes: 0,
    modifiedAt: 1_700_000_200,
    metadata: NO_METADATA,
    dependencies: [],
    isValid: false,
    issues: ["File is empty"],
    warnings: [],
  },
];

describe("IndexCache", () => {
  let dir: string;
  let cachePath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "assetlens-cache-"));
    cachePath = join(dir, "nested", "index-cache.json");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("places the default cache under the scan root", () => {
    expect(getDefaultCachePath(dir)).toBe(join(dir, ".assetlens", "index-cache.json"));
  });

  it("round-trips records through the snapshot file", async () => {
    const cache = new IndexCache(cachePath);
    await cache.save(records, 1_700_000_300, "/assets");

    const loaded = await cache.load();

    expect(loaded).toEqual({
      scanTime: 1_700_000_300,
      root: "/assets",
      records: [records[1], records[0]],
    });
  });

  it("writes the versioned on-disk format sorted by path", async () => {
    await new IndexCache(cachePath).save(records, 1_700_000_300, null);

    const raw: unknown = JSON.parse(await readFile(cachePath, "utf-8"));

    expect(raw).toMatchObject({
      version: "1.0",
      scan_time: 1_700_000_300,
      assets: [
        { path: "audio/rain.wav", type: "Audio", file_size: 0, is_valid: false, issues: ["File is empty"] },
        { path: "props/crate.obj", type: "Model", category: "Misc", last_modified: 1_700_000_100 },
      ],
    });
    expect(raw).not.toHaveProperty("root");
  });

  it("treats a missing file as a miss", async () => {
    expect(await new IndexCache(join(dir, "absent.json")).load()).toBeNull();
  });

  it("treats malformed JSON as a miss", async () => {
    await writeFile(join(dir, "broken.json"), "{ not json");

    expect(await new IndexCache(join(dir, "broken.json")).load()).toBeNull();
  });

  it("treats another version as a miss", async () => {
    const snapshot = { ...createSnapshot(records, 1, null), version: "0.9" };
    await writeFile(join(dir, "old.json"), JSON.stringify(snapshot));

    expect(await new IndexCache(join(dir, "old.json")).load()).toBeNull();
  });

  it("treats an unknown asset type as a miss", async () => {
    const snapshot = createSnapshot(records, 1, null);
    const tampered = {
      ...snapshot,
      assets: snapshot.assets.map((entry) => ({ ...entry, type: "Hologram" })),
    };
    await writeFile(join(dir, "bad-type.json"), JSON.stringify(tampered));

    expect(await new IndexCache(join(dir, "bad-type.json")).load()).toBeNull();
  });

  it("fills defaults for entries without the optional fields", async () => {
    const snapshot = {
      version: "1.0",
      scan_time: 42,
      assets: [
        {
          path: "bark.png",
          name: "bark",
          type: "Texture",
          category: "Misc",
          file_size: 4,
          last_modified: 10,
          is_valid: true,
          issues: [],
          warnings: [],
        },
      ],
    };
    await writeFile(join(dir, "minimal.json"), JSON.stringify(snapshot));

    const loaded = await new IndexCache(join(dir, "minimal.json")).load();

    expect(loaded?.root).toBeNull();
    expect(loaded?.records).toEqual([
      {
        relativePath: "bark.png",
        name: "bark",
        assetType: "Texture",
        format: "Texture",
        category: "Misc",
        sizeBytes: 4,
        modifiedAt: 10,
        metadata: { kind: "none" },
        dependencies: [],
        isValid: true,
        issues: [],
        warnings: [],
      },
    ]);
  });

  it("rejects when the target cannot be written", async () => {
    await writeFile(join(dir, "blocker"), "file");

    await expect(new IndexCache(join(dir, "blocker", "cache.json")).save(records, 1, null)).rejects.toThrow();
  });
});
