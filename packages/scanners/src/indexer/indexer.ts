// packages/scanners/src/indexer/indexer.ts
import { stat } from "fs/promises";
import { resolve } from "path";
import { isSupportedFormat, type AssetRecord, type AssetType } from "@assetlens/core";
import { walkFiles, type FileVisit } from "../base/walker.js";
import { parallelProcess, extractResults } from "../base/pool.js";
import { IndexCache, getDefaultCachePath } from "../cache/index-cache.js";
import { errorMessage } from "../utils/errors.js";
import { pathExists } from "../utils/fs.js";
import { comparePaths, toRootRelative } from "../utils/paths.js";
import { SerialQueue } from "../utils/serial-queue.js";
import { InMemoryAssetStore, type AssetStore } from "./asset-store.js";
import { buildAssetRecord } from "./record.js";

export const DEFAULT_CACHE_EXPIRY_SECONDS = 300;
export const DEFAULT_INDEX_CONCURRENCY = 16;

export interface AssetIndexerOptions {
  /** Backing store; defaults to a fresh in-memory store */
  store?: AssetStore;
  /** Seconds a completed scan stays valid (default: 300) */
  cacheExpirySeconds?: number;
  /** Files processed at once during a scan (default: 16) */
  concurrency?: number;
  /** Glob patterns skipped by the walk */
  exclude?: string[];
  /** Extract metadata and dependencies while scanning (default: true) */
  extractDetails?: boolean;
  /** Callback for verbose logging */
  onVerbose?: (message: string) => void;
  /** Called after each supported file has been processed */
  onProgress?: (completed: number) => void;
  /** Clock in milliseconds; replaceable in tests */
  now?: () => number;
}

export interface ScanOptions {
  /** Rescan even when the current snapshot is still valid */
  forceRefresh?: boolean;
  /** Best-effort cancellation, checked between files */
  signal?: AbortSignal;
}

export interface AssetSearchFilters {
  /** Case-insensitive substring of the name or path */
  text?: string;
  assetType?: AssetType;
  category?: string;
  minSizeBytes?: number;
  maxSizeBytes?: number;
  /** Seconds since epoch, inclusive */
  modifiedAfter?: number;
  /** Seconds since epoch, inclusive */
  modifiedBefore?: number;
}

export interface IndexerStats {
  /** Completed filesystem traversals */
  traversals: number;
  cacheHits: number;
  filesVisited: number;
  assetsFound: number;
  failedFiles: number;
  lastScanDurationMs: number;
}

/**
 * Catalogs a directory tree of production assets.
 *
 * A completed scan stays valid for `cacheExpirySeconds`; within that window
 * `scan()` answers from memory. Validity is purely time-based, so callers
 * that need to observe on-disk changes pass `forceRefresh`.
 *
 * Scans, updates, removals and cache loads on one instance run one at a
 * time in call order.
 */
export class AssetIndexer {
  private readonly store: AssetStore;
  private readonly queue = new SerialQueue();
  private readonly options: AssetIndexerOptions;
  private readonly now: () => number;
  private cacheExpiryMs: number;
  private rootPath: string | null = null;
  private lastScanTime: number | null = null;
  private cacheValid = false;
  private stats: IndexerStats = {
    traversals: 0,
    cacheHits: 0,
    filesVisited: 0,
    assetsFound: 0,
    failedFiles: 0,
    lastScanDurationMs: 0,
  };

  constructor(options: AssetIndexerOptions = {}) {
    this.options = options;
    this.store = options.store ?? new InMemoryAssetStore();
    this.now = options.now ?? Date.now;
    this.cacheExpiryMs = (options.cacheExpirySeconds ?? DEFAULT_CACHE_EXPIRY_SECONDS) * 1000;
  }

  /**
   * Scan `root` and rebuild the index. Resolves false when the root is
   * inaccessible, the walk fails or the signal aborts; never rejects.
   */
  scan(root: string, options: ScanOptions = {}): Promise<boolean> {
    return this.queue.run(() => this.runScan(resolve(root), options));
  }

  private async runScan(root: string, options: ScanOptions): Promise<boolean> {
    const { forceRefresh = false, signal } = options;

    if (!forceRefresh && this.rootPath === root && this.isCacheValid()) {
      this.stats.cacheHits++;
      this.verbose(
        `Using cached asset index (valid for ${Math.round(this.cacheExpiryMs / 1000)} seconds)`,
      );
      return true;
    }

    this.clearCache();
    const startTime = this.now();

    try {
      const rootStats = await stat(root);
      if (!rootStats.isDirectory()) {
        this.verbose(`Scan root is not a directory: ${root}`);
        return false;
      }
    } catch (error) {
      this.verbose(`Scan root is not accessible: ${root} (${errorMessage(error)})`);
      return false;
    }

    this.verbose(`Starting asset scan in: ${root}`);
    let filesVisited = 0;
    const walk = walkFiles(root, { exclude: this.options.exclude, signal });

    // Unmapped extensions are dropped before any per-file work
    async function* supported(visits: AsyncIterable<FileVisit>): AsyncGenerator<FileVisit> {
      for await (const visit of visits) {
        filesVisited++;
        if (isSupportedFormat(visit.absolutePath)) yield visit;
      }
    }

    let records: AssetRecord[];
    let failures: { reason: unknown }[];
    try {
      const settled = await parallelProcess(
        supported(walk),
        (visit) =>
          buildAssetRecord(root, visit.absolutePath, {
            shallow: this.options.extractDetails === false,
          }),
        this.options.concurrency ?? DEFAULT_INDEX_CONCURRENCY,
        {
          signal,
          onProgress: (completed) => this.options.onProgress?.(completed),
        },
      );
      ({ successes: records, failures } = extractResults(settled));
    } catch (error) {
      this.verbose(`Asset scan failed: ${errorMessage(error)}`);
      return false;
    }

    if (signal?.aborted) {
      this.verbose("Asset scan cancelled");
      return false;
    }

    for (const failure of failures) {
      this.verbose(`Skipped unreadable file: ${errorMessage(failure.reason)}`);
    }

    // Single-writer merge in path order keeps the result independent of worker scheduling
    records.sort((a, b) => comparePaths(a.relativePath, b.relativePath));
    this.store.replaceAll(records);

    this.rootPath = root;
    this.lastScanTime = this.now();
    this.cacheValid = true;
    this.stats = {
      ...this.stats,
      traversals: this.stats.traversals + 1,
      filesVisited,
      assetsFound: records.length,
      failedFiles: failures.length,
      lastScanDurationMs: this.lastScanTime - startTime,
    };

    this.verbose(
      `Asset scan completed: ${filesVisited} files visited, ${records.length} assets indexed in ${this.stats.lastScanDurationMs} ms`,
    );
    return true;
  }

  /**
   * True while a completed scan (or loaded cache) is younger than the expiry window.
   */
  isCacheValid(): boolean {
    if (!this.cacheValid || this.lastScanTime === null) {
      return false;
    }
    return this.now() - this.lastScanTime < this.cacheExpiryMs;
  }

  /** Drop every record and invalidate the snapshot */
  clearCache(): void {
    this.store.clear();
    this.cacheValid = false;
  }

  setCacheExpiry(seconds: number): void {
    this.cacheExpiryMs = seconds * 1000;
  }

  getCacheExpiry(): number {
    return this.cacheExpiryMs / 1000;
  }

  getCacheSize(): number {
    return this.store.size;
  }

  getRootPath(): string | null {
    return this.rootPath;
  }

  getLastScanTime(): Date | null {
    return this.lastScanTime === null ? null : new Date(this.lastScanTime);
  }

  getStats(): IndexerStats {
    return { ...this.stats };
  }

  // Read accessors over the current snapshot

  getAllAssets(): AssetRecord[] {
    return this.store.all().sort((a, b) => comparePaths(a.relativePath, b.relativePath));
  }

  getAssetByPath(relativePath: string): AssetRecord | null {
    return this.store.get(relativePath) ?? null;
  }

  getAssetsByCategory(category: string): AssetRecord[] {
    return this.store.byCategory(category);
  }

  getAssetsByType(assetType: string): AssetRecord[] {
    return this.store.byType(assetType);
  }

  getCategories(): string[] {
    return this.store.categories();
  }

  getTypes(): string[] {
    return this.store.types();
  }

  search(filters: AssetSearchFilters): AssetRecord[] {
    const text = filters.text?.toLowerCase();
    return this.getAllAssets().filter((record) => {
      if (
        text &&
        !record.name.toLowerCase().includes(text) &&
        !record.relativePath.toLowerCase().includes(text)
      ) {
        return false;
      }
      if (filters.assetType && record.assetType !== filters.assetType) return false;
      if (filters.category && record.category !== filters.category) return false;
      if (filters.minSizeBytes !== undefined && record.sizeBytes < filters.minSizeBytes) return false;
      if (filters.maxSizeBytes !== undefined && record.sizeBytes > filters.maxSizeBytes) return false;
      if (filters.modifiedAfter !== undefined && record.modifiedAt < filters.modifiedAfter) return false;
      if (filters.modifiedBefore !== undefined && record.modifiedAt > filters.modifiedBefore) return false;
      return true;
    });
  }

  /**
   * Re-classify a single file without a rescan. `filePath` is absolute or
   * relative to the scan root. A file that no longer exists, or is no
   * longer a supported format, has its record removed.
   */
  updateAsset(filePath: string): Promise<AssetRecord | null> {
    return this.queue.run(async () => {
      const root = this.rootPath;
      if (root === null) {
        this.verbose(`Cannot update ${filePath}: no scan root`);
        return null;
      }

      const relativePath = toRootRelative(root, filePath);
      const absolutePath = resolve(root, relativePath);

      if (!isSupportedFormat(absolutePath) || !(await pathExists(absolutePath))) {
        this.store.delete(relativePath);
        return null;
      }

      try {
        const record = await buildAssetRecord(root, absolutePath, {
          shallow: this.options.extractDetails === false,
        });
        this.store.put(record);
        return record;
      } catch (error) {
        this.verbose(`Failed to update ${relativePath}: ${errorMessage(error)}`);
        this.store.delete(relativePath);
        return null;
      }
    });
  }

  /**
   * Drop one record from the primary map and both group projections.
   */
  removeAsset(filePath: string): Promise<boolean> {
    return this.queue.run(async () => {
      const relativePath =
        this.rootPath === null ? filePath : toRootRelative(this.rootPath, filePath);
      return this.store.delete(relativePath);
    });
  }

  /**
   * Persist the current snapshot. Resolves false on any I/O failure.
   */
  saveCache(cacheFilePath?: string): Promise<boolean> {
    return this.queue.run(async () => {
      const target = this.resolveCachePath(cacheFilePath);
      if (target === null) {
        this.verbose("Cannot save cache: no cache path and no scan root");
        return false;
      }
      try {
        const scanTime = Math.floor((this.lastScanTime ?? 0) / 1000);
        await new IndexCache(target).save(this.store.all(), scanTime, this.rootPath);
        this.verbose(`Cache saved to ${target}`);
        return true;
      } catch (error) {
        this.verbose(`Failed to save cache to ${target}: ${errorMessage(error)}`);
        return false;
      }
    });
  }

  /**
   * Replace the whole index with a persisted snapshot. A missing,
   * malformed or differently versioned file is a miss: resolves false and
   * leaves the index as it was.
   */
  loadCache(cacheFilePath?: string): Promise<boolean> {
    return this.queue.run(async () => {
      const target = this.resolveCachePath(cacheFilePath);
      if (target === null) return false;

      const snapshot = await new IndexCache(target).load();
      if (!snapshot) {
        this.verbose(`No usable cache at ${target}`);
        return false;
      }

      this.store.replaceAll(snapshot.records);
      this.rootPath = snapshot.root ?? this.rootPath;
      this.lastScanTime = snapshot.scanTime * 1000;
      this.cacheValid = true;
      this.verbose(`Loaded ${snapshot.records.length} assets from ${target}`);
      return true;
    });
  }

  private resolveCachePath(cacheFilePath: string | undefined): string | null {
    if (cacheFilePath) return resolve(cacheFilePath);
    return this.rootPath === null ? null : getDefaultCachePath(this.rootPath);
  }

  private verbose(message: string): void {
    this.options.onVerbose?.(message);
  }
}
