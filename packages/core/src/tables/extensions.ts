import { extname } from "path";
import type { AssetType, FileKind } from "../models/asset.js";

export interface ExtensionEntry {
  assetType: AssetType;
  kind: FileKind;
  /** Display label for the format */
  format: string;
}

/**
 * Single source of truth for every extension the indexer catalogs and the
 * validator recognises. Keys are lower-case and carry no leading dot.
 */
export const EXTENSION_TABLE: Readonly<Record<string, ExtensionEntry>> = {
  // 3D models
  blend: { assetType: "Model", kind: "blend", format: "Blend" },
  obj: { assetType: "Model", kind: "obj", format: "OBJ" },
  fbx: { assetType: "Model", kind: "fbx", format: "FBX" },
  dae: { assetType: "Model", kind: "model", format: "Collada" },
  "3ds": { assetType: "Model", kind: "model", format: "3DS" },
  stl: { assetType: "Model", kind: "model", format: "STL" },
  ply: { assetType: "Model", kind: "model", format: "PLY" },

  // Materials
  mtl: { assetType: "Material", kind: "mtl", format: "MTL" },

  // Textures
  png: { assetType: "Texture", kind: "texture", format: "PNG" },
  jpg: { assetType: "Texture", kind: "texture", format: "JPEG" },
  jpeg: { assetType: "Texture", kind: "texture", format: "JPEG" },
  tga: { assetType: "Texture", kind: "texture", format: "TGA" },
  tif: { assetType: "Texture", kind: "texture", format: "TIFF" },
  tiff: { assetType: "Texture", kind: "texture", format: "TIFF" },
  bmp: { assetType: "Texture", kind: "texture", format: "BMP" },
  exr: { assetType: "Texture", kind: "texture", format: "OpenEXR" },
  hdr: { assetType: "Texture", kind: "texture", format: "Radiance HDR" },

  // Audio
  mp3: { assetType: "Audio", kind: "audio", format: "MP3" },
  wav: { assetType: "Audio", kind: "audio", format: "WAV" },
  flac: { assetType: "Audio", kind: "audio", format: "FLAC" },
  aac: { assetType: "Audio", kind: "audio", format: "AAC" },
  ogg: { assetType: "Audio", kind: "audio", format: "OGG" },

  // Video
  mp4: { assetType: "Video", kind: "video", format: "MP4" },
  avi: { assetType: "Video", kind: "video", format: "AVI" },
  mov: { assetType: "Video", kind: "video", format: "QuickTime" },
  wmv: { assetType: "Video", kind: "video", format: "WMV" },
  flv: { assetType: "Video", kind: "video", format: "FLV" },
  webm: { assetType: "Video", kind: "video", format: "WebM" },
  mkv: { assetType: "Video", kind: "video", format: "Matroska" },
};

/**
 * Lower-cased extension without the leading dot, e.g. ".OBJ" -> "obj".
 */
export function normalizeExtension(extension: string): string {
  return extension.replace(/^\./, "").toLowerCase();
}

/** Extension of a file path, normalized; empty for dotfiles and bare names. */
export function extensionOf(filePath: string): string {
  return normalizeExtension(extname(filePath));
}

export function lookupExtension(filePath: string): ExtensionEntry | undefined {
  const ext = extensionOf(filePath);
  return ext && Object.hasOwn(EXTENSION_TABLE, ext) ? EXTENSION_TABLE[ext] : undefined;
}

export function isSupportedFormat(filePath: string): boolean {
  return lookupExtension(filePath) !== undefined;
}

export function determineAssetType(filePath: string): AssetType {
  return lookupExtension(filePath)?.assetType ?? "Unknown";
}

export function detectFileType(filePath: string): FileKind {
  return lookupExtension(filePath)?.kind ?? "unknown";
}

export function getExtensionsForType(assetType: AssetType): string[] {
  return Object.entries(EXTENSION_TABLE)
    .filter(([, entry]) => entry.assetType === assetType)
    .map(([ext]) => ext);
}
