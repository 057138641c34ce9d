import { z } from "zod";

// Indexer settings
export const IndexerConfigSchema = z.object({
  /** Directory to scan when a command is given no root */
  root: z.string().default("."),
  /** Seconds a completed scan stays valid */
  cacheExpirySeconds: z.number().int().positive().default(300),
  /** Snapshot file; defaults to <root>/.assetlens/index-cache.json */
  cacheFile: z.string().optional(),
  concurrency: z.number().int().positive().default(16),
  exclude: z.array(z.string()).optional(),
  extractDetails: z.boolean().default(true),
});

// Validator settings
export const ValidatorConfigSchema = z.object({
  maxFileSizeMb: z.number().positive().default(1000),
  checkFileIntegrity: z.boolean().default(true),
  checkFormatSpecific: z.boolean().default(true),
  checkTextureDependencies: z.boolean().default(true),
  concurrency: z.number().int().positive().default(16),
  exclude: z.array(z.string()).optional(),
});

// Output config
export const OutputConfigSchema = z.object({
  format: z.enum(["table", "json"]).default("table"),
  colors: z.boolean().default(true),
  /** Write the text report here after every validate run */
  reportFile: z.string().optional(),
});

// Full config schema
export const AssetLensConfigSchema = z.object({
  indexer: IndexerConfigSchema.default({}),
  validator: ValidatorConfigSchema.default({}),
  output: OutputConfigSchema.default({}),
});

// Types
export type IndexerConfig = z.infer<typeof IndexerConfigSchema>;
export type ValidatorConfig = z.infer<typeof ValidatorConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type AssetLensConfig = z.infer<typeof AssetLensConfigSchema>;

// User-facing input, before defaults are applied
export type AssetLensConfigInput = z.input<typeof AssetLensConfigSchema>;

// Helper for defining config in JS/TS files
export function defineConfig(config: AssetLensConfigInput): AssetLensConfigInput {
  return config;
}
