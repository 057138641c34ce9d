// packages/scanners/src/cache/index-cache.ts
import { readFile, writeFile, mkdir } from "fs/promises";
import { dirname, join } from "path";
import {
  CACHE_VERSION,
  CacheSnapshotSchema,
  NO_METADATA,
  type AssetRecord,
  type CacheEntry,
  type CacheSnapshot,
} from "@assetlens/core";
import { comparePaths } from "../utils/paths.js";

const CACHE_FILE = "index-cache.json";
const CACHE_DIR = ".assetlens";

/**
 * Snapshot read back from disk
 */
export interface LoadedSnapshot {
  /** Seconds since epoch */
  scanTime: number;
  root: string | null;
  records: AssetRecord[];
}

export function getDefaultCachePath(root: string): string {
  return join(root, CACHE_DIR, CACHE_FILE);
}

export function toCacheEntry(record: AssetRecord): CacheEntry {
  return {
    path: record.relativePath,
    name: record.name,
    type: record.assetType,
    format: record.format,
    category: record.category,
    file_size: record.sizeBytes,
    last_modified: record.modifiedAt,
    is_valid: record.isValid,
    issues: record.issues,
    warnings: record.warnings,
    metadata: record.metadata,
    dependencies: record.dependencies,
  };
}

export function fromCacheEntry(entry: CacheEntry): AssetRecord {
  return {
    relativePath: entry.path,
    name: entry.name,
    assetType: entry.type,
    format: entry.format ?? entry.type,
    category: entry.category,
    sizeBytes: entry.file_size,
    modifiedAt: entry.last_modified,
    metadata: entry.metadata ?? NO_METADATA,
    dependencies: entry.dependencies ?? [],
    isValid: entry.is_valid,
    issues: entry.issues,
    warnings: entry.warnings,
  };
}

export function createSnapshot(
  records: AssetRecord[],
  scanTime: number,
  root: string | null,
): CacheSnapshot {
  const sorted = [...records].sort((a, b) => comparePaths(a.relativePath, b.relativePath));
  return {
    version: CACHE_VERSION,
    scan_time: scanTime,
    ...(root !== null ? { root } : {}),
    assets: sorted.map(toCacheEntry),
  };
}

/**
 * Persisted index snapshot at a fixed file path.
 */
export class IndexCache {
  constructor(private readonly filePath: string) {}

  /**
   * Read the snapshot. A missing file, malformed JSON, an unrecognised
   * version or an invalid entry all count as a miss and return null.
   */
  async load(): Promise<LoadedSnapshot | null> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(this.filePath, "utf-8"));
    } catch {
      return null;
    }

    const parsed = CacheSnapshotSchema.safeParse(raw);
    if (!parsed.success) {
      return null;
    }

    return {
      scanTime: parsed.data.scan_time,
      root: parsed.data.root ?? null,
      records: parsed.data.assets.map(fromCacheEntry),
    };
  }

  /**
   * Write the snapshot, creating the parent directory. Rejects on I/O failure.
   */
  async save(records: AssetRecord[], scanTime: number, root: string | null): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(
      this.filePath,
      JSON.stringify(createSnapshot(records, scanTime, root), null, 2),
      "utf-8",
    );
  }
}
