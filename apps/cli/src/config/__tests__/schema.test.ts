import { describe, it, expect } from "vitest";
import { AssetLensConfigSchema, defineConfig } from "../schema.js";

describe("AssetLensConfigSchema", () => {
  it("fills every section with defaults", () => {
    const config = AssetLensConfigSchema.parse({});

    expect(config.indexer.cacheExpirySeconds).toBe(300);
    expect(config.indexer.concurrency).toBe(16);
    expect(config.validator).toEqual({
      maxFileSizeMb: 1000,
      checkFileIntegrity: true,
      checkFormatSpecific: true,
      checkTextureDependencies: true,
      concurrency: 16,
    });
  });

  it("keeps optional exclude patterns", () => {
    const config = AssetLensConfigSchema.parse({
      indexer: { exclude: ["**/cache/**"] },
    });

    expect(config.indexer.exclude).toEqual(["**/cache/**"]);
  });

  it("rejects non-positive limits", () => {
    expect(AssetLensConfigSchema.safeParse({ validator: { maxFileSizeMb: 0 } }).success).toBe(false);
    expect(AssetLensConfigSchema.safeParse({ indexer: { concurrency: 0 } }).success).toBe(false);
  });

  it("rejects unknown output formats", () => {
    expect(AssetLensConfigSchema.safeParse({ output: { format: "xml" } }).success).toBe(false);
  });
});

describe("defineConfig", () => {
  it("returns the config unchanged", () => {
    const input = { indexer: { root: "assets" } };

    expect(defineConfig(input)).toBe(input);
  });
});
