import { z } from "zod";

// Coarse classification derived from the file extension
export const AssetTypeSchema = z.enum([
  "Model",
  "Texture",
  "Material",
  "Audio",
  "Video",
  "Unknown",
]);

// Format kind the validator dispatches on
export const FileKindSchema = z.enum([
  "obj",
  "fbx",
  "blend",
  "mtl",
  "texture",
  "model",
  "audio",
  "video",
  "unknown",
]);

// Closed set of metadata shapes the indexer can extract
export const MeshMetadataSchema = z.object({
  kind: z.literal("mesh"),
  vertexCount: z.number().int().nonnegative(),
  faceCount: z.number().int().nonnegative(),
  materialCount: z.number().int().nonnegative(),
});

export const FbxHeaderMetadataSchema = z.object({
  kind: z.literal("fbx-header"),
  encoding: z.enum(["binary", "ascii", "unknown"]),
  version: z.number().int().optional(),
});

export const BlendHeaderMetadataSchema = z.object({
  kind: z.literal("blend-header"),
  valid: z.boolean(),
  version: z.string().optional(),
  pointerSize: z.union([z.literal(32), z.literal(64)]).optional(),
  endianness: z.enum(["little", "big"]).optional(),
});

export const PlaceholderMetadataSchema = z.object({
  kind: z.literal("placeholder"),
  format: z.string(),
  note: z.string(),
});

export const EmptyMetadataSchema = z.object({
  kind: z.literal("none"),
});

export const AssetMetadataSchema = z.discriminatedUnion("kind", [
  MeshMetadataSchema,
  FbxHeaderMetadataSchema,
  BlendHeaderMetadataSchema,
  PlaceholderMetadataSchema,
  EmptyMetadataSchema,
]);

export const AssetRecordSchema = z.object({
  /** Path relative to the scan root; unique within a snapshot */
  relativePath: z.string(),
  /** Filename without extension */
  name: z.string(),
  assetType: AssetTypeSchema,
  /** Fine-grained format label from the extension table, e.g. "OBJ" */
  format: z.string(),
  category: z.string(),
  sizeBytes: z.number().int().nonnegative(),
  /** Seconds since epoch */
  modifiedAt: z.number().int(),
  metadata: AssetMetadataSchema,
  /** Root-relative paths of referenced files that exist on disk */
  dependencies: z.array(z.string()),
  isValid: z.boolean(),
  issues: z.array(z.string()),
  warnings: z.array(z.string()),
});

// Types
export type AssetType = z.infer<typeof AssetTypeSchema>;
export type FileKind = z.infer<typeof FileKindSchema>;
export type MeshMetadata = z.infer<typeof MeshMetadataSchema>;
export type FbxHeaderMetadata = z.infer<typeof FbxHeaderMetadataSchema>;
export type BlendHeaderMetadata = z.infer<typeof BlendHeaderMetadataSchema>;
export type PlaceholderMetadata = z.infer<typeof PlaceholderMetadataSchema>;
export type AssetMetadata = z.infer<typeof AssetMetadataSchema>;
export type AssetRecord = z.infer<typeof AssetRecordSchema>;

export const NO_METADATA: AssetMetadata = { kind: "none" };

/**
 * Human-readable one-line summary of a metadata value.
 */
export function describeMetadata(metadata: AssetMetadata): string {
  switch (metadata.kind) {
    case "mesh":
      return `${metadata.vertexCount} vertices, ${metadata.faceCount} faces, ${metadata.materialCount} materials`;
    case "fbx-header":
      return metadata.version !== undefined
        ? `FBX ${metadata.encoding} v${metadata.version}`
        : `FBX ${metadata.encoding}`;
    case "blend-header":
      if (!metadata.valid) return "Blend header invalid";
      return `Blend ${metadata.version ?? "?"} (${metadata.pointerSize ?? "?"}-bit, ${metadata.endianness ?? "?"} endian)`;
    case "placeholder":
      return `${metadata.format}: ${metadata.note}`;
    case "none":
      return "";
  }
}
