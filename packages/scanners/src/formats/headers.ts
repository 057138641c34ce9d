import type { BlendHeaderMetadata, FbxHeaderMetadata } from "@assetlens/core";

/** "Kaydara FBX Binary  " followed by NUL, 0x1A, NUL */
export const FBX_BINARY_MAGIC = Buffer.concat([
  Buffer.from("Kaydara FBX Binary  ", "latin1"),
  Buffer.from([0x00, 0x1a, 0x00]),
]);
export const FBX_HEADER_LENGTH = FBX_BINARY_MAGIC.length;
/** Magic plus the little-endian uint32 version */
export const FBX_VERSIONED_HEADER_LENGTH = FBX_HEADER_LENGTH + 4;

export const BLEND_MAGIC = "BLENDER";
export const BLEND_HEADER_LENGTH = 12;

/** Below this many bytes a binary scene file cannot hold real content */
export const MIN_SCENE_FILE_BYTES = 1024;

export function hasFbxBinaryMagic(header: Buffer): boolean {
  return (
    header.length >= FBX_HEADER_LENGTH &&
    header.subarray(0, FBX_HEADER_LENGTH).equals(FBX_BINARY_MAGIC)
  );
}

/**
 * Version field following the magic, or undefined when the header is too short.
 */
export function readFbxVersion(header: Buffer): number | undefined {
  if (header.length < FBX_VERSIONED_HEADER_LENGTH) return undefined;
  return header.readUInt32LE(FBX_HEADER_LENGTH);
}

export function parseFbxHeader(header: Buffer): FbxHeaderMetadata {
  if (hasFbxBinaryMagic(header)) {
    const version = readFbxVersion(header);
    return version !== undefined
      ? { kind: "fbx-header", encoding: "binary", version }
      : { kind: "fbx-header", encoding: "binary" };
  }
  // ASCII exports start with a "; FBX 7.4.0 project file" comment
  if (header.toString("latin1").includes("FBX")) {
    return { kind: "fbx-header", encoding: "ascii" };
  }
  return { kind: "fbx-header", encoding: "unknown" };
}

export interface BlendHeader {
  pointerSize: 32 | 64;
  endianness: "little" | "big";
  version: string;
}

/**
 * Decode "BLENDER" + pointer flag + endianness flag + 3-digit version.
 * Null when the magic does not match or the header is truncated.
 */
export function decodeBlendHeader(header: Buffer): BlendHeader | null {
  if (header.length < BLEND_HEADER_LENGTH) return null;
  if (header.toString("latin1", 0, BLEND_MAGIC.length) !== BLEND_MAGIC) return null;

  return {
    pointerSize: header.toString("latin1", 7, 8) === "_" ? 32 : 64,
    endianness: header.toString("latin1", 8, 9) === "v" ? "little" : "big",
    version: header.toString("latin1", 9, 12),
  };
}

export function parseBlendHeader(header: Buffer): BlendHeaderMetadata {
  const decoded = decodeBlendHeader(header);
  if (!decoded) {
    return { kind: "blend-header", valid: false };
  }
  return { kind: "blend-header", valid: true, ...decoded };
}
