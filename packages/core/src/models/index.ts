// Asset models
export {
  AssetTypeSchema,
  FileKindSchema,
  MeshMetadataSchema,
  FbxHeaderMetadataSchema,
  BlendHeaderMetadataSchema,
  PlaceholderMetadataSchema,
  EmptyMetadataSchema,
  AssetMetadataSchema,
  AssetRecordSchema,
  NO_METADATA,
  describeMetadata,
} from "./asset.js";

export type {
  AssetType,
  FileKind,
  MeshMetadata,
  FbxHeaderMetadata,
  BlendHeaderMetadata,
  PlaceholderMetadata,
  AssetMetadata,
  AssetRecord,
} from "./asset.js";

// Validation models
export {
  SeveritySchema,
  IssueCodeSchema,
  ValidationIssueSchema,
  ValidationResultSchema,
  SEVERITY_LABELS,
  ISSUE_SEVERITY,
  getSeverityWeight,
  compareSeverity,
  isBlockingSeverity,
  createEmptyResult,
} from "./validation.js";

export type {
  Severity,
  IssueCode,
  ValidationIssue,
  ValidationResult,
} from "./validation.js";

// Cache snapshot
export { CACHE_VERSION, CacheEntrySchema, CacheSnapshotSchema } from "./cache.js";

export type { CacheEntry, CacheSnapshot } from "./cache.js";
