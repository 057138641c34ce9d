import { z } from "zod";
import { AssetMetadataSchema, AssetTypeSchema } from "./asset.js";

export const CACHE_VERSION = "1.0";

/**
 * One persisted asset entry. Field names follow the on-disk format.
 */
export const CacheEntrySchema = z.object({
  path: z.string(),
  name: z.string(),
  type: AssetTypeSchema,
  format: z.string().optional(),
  category: z.string(),
  file_size: z.number().int().nonnegative(),
  last_modified: z.number().int(),
  is_valid: z.boolean(),
  issues: z.array(z.string()),
  warnings: z.array(z.string()),
  metadata: AssetMetadataSchema.optional(),
  dependencies: z.array(z.string()).optional(),
});

export const CacheSnapshotSchema = z.object({
  version: z.literal(CACHE_VERSION),
  /** Seconds since epoch */
  scan_time: z.number().int(),
  root: z.string().optional(),
  assets: z.array(CacheEntrySchema),
});

export type CacheEntry = z.infer<typeof CacheEntrySchema>;
export type CacheSnapshot = z.infer<typeof CacheSnapshotSchema>;
