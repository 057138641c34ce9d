// Base
export { walkFiles, DEFAULT_EXCLUDES, type FileVisit, type WalkOptions } from "./base/walker.js";
export {
  parallelProcess,
  extractResults,
  type ParallelProcessOptions,
} from "./base/pool.js";

// Indexer
export {
  AssetIndexer,
  DEFAULT_CACHE_EXPIRY_SECONDS,
  DEFAULT_INDEX_CONCURRENCY,
  type AssetIndexerOptions,
  type ScanOptions,
  type AssetSearchFilters,
  type IndexerStats,
} from "./indexer/indexer.js";
export { InMemoryAssetStore, type AssetStore } from "./indexer/asset-store.js";
export { buildAssetRecord, type BuildRecordOptions } from "./indexer/record.js";
export { extractMetadata, findDependencies } from "./indexer/extract.js";

// Cache
export { IndexCache, getDefaultCachePath, type LoadedSnapshot } from "./cache/index-cache.js";

// Validator
export {
  AssetValidator,
  DEFAULT_VALIDATOR_OPTIONS,
  type ValidatorOptions,
  type BatchOptions,
} from "./validator/validator.js";
export type { ValidationStats } from "./validator/stats.js";

// Reports
export {
  generateReport,
  saveReport,
  summarizeResults,
  type ReportOptions,
  type ReportSummary,
} from "./report/report.js";
