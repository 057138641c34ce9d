import { dirname, isAbsolute, join } from "path";
import { extensionOf, type FileKind } from "@assetlens/core";
import { readLines, readPrefix } from "../formats/lines.js";
import {
  BLEND_HEADER_LENGTH,
  BLEND_MAGIC,
  FBX_HEADER_LENGTH,
  FBX_VERSIONED_HEADER_LENGTH,
  MIN_SCENE_FILE_BYTES,
  decodeBlendHeader,
  hasFbxBinaryMagic,
  readFbxVersion,
} from "../formats/headers.js";
import { TEXTURE_PREFIX_LENGTH, matchesTextureSignature } from "../formats/texture-signatures.js";
import { isMaterialDefinition, parseTextureDirective, tokenize } from "../formats/wavefront.js";
import { pathExists } from "../utils/fs.js";
import type { ResultBuilder } from "./result-builder.js";

// Known-good FBX SDK versions, inclusive
export const FBX_MIN_VERSION = 6000;
export const FBX_MAX_VERSION = 8000;

export type FormatRule = (filePath: string, sizeBytes: number, result: ResultBuilder) => Promise<void>;

/**
 * Resolve a referenced file against the referencing file's directory.
 */
export function resolveReference(fromFile: string, target: string): string {
  return isAbsolute(target) ? target : join(dirname(fromFile), target);
}

/**
 * Material libraries named by `mtllib` lines, in file order.
 */
export async function readMaterialLibraries(objPath: string): Promise<string[]> {
  const libraries: string[] = [];
  for await (const line of readLines(objPath)) {
    const parsed = tokenize(line);
    if (parsed?.keyword === "mtllib") libraries.push(...parsed.args);
  }
  return libraries;
}

/**
 * Report every texture directive in `materialPath` whose target is missing.
 */
export async function reportMissingTextures(
  materialPath: string,
  result: ResultBuilder,
  context: (texture: string, expectedAt: string) => string,
): Promise<void> {
  for await (const line of readLines(materialPath)) {
    const texture = parseTextureDirective(line);
    if (!texture) continue;

    const texturePath = resolveReference(materialPath, texture);
    if (!(await pathExists(texturePath))) {
      result.addIssue({
        code: "MISSING_DEPENDENCY",
        description: "Referenced texture file not found",
        context: context(texture, texturePath),
        recommendation: "Ensure all texture files exist in the same directory as the MTL file",
      });
    }
  }
}

export const validateObj: FormatRule = async (filePath, _sizeBytes, result) => {
  let vertexCount = 0;
  let faceCount = 0;
  const libraries: string[] = [];

  for await (const line of readLines(filePath)) {
    const parsed = tokenize(line);
    if (!parsed) continue;
    if (parsed.keyword === "v") vertexCount++;
    else if (parsed.keyword === "f") faceCount++;
    else if (parsed.keyword === "mtllib") libraries.push(...parsed.args);
  }

  if (vertexCount === 0) {
    result.addIssue({
      code: "STRUCTURAL_DEFECT",
      description: "OBJ file contains no vertices",
      context: `File: ${filePath}`,
      recommendation: "Add vertex data to make this a valid 3D model",
    });
  }

  if (faceCount === 0) {
    result.addIssue({
      code: "STRUCTURAL_WARNING",
      description: "OBJ file contains no faces",
      context: `File: ${filePath}`,
      recommendation: "Add face data to create a complete 3D model",
    });
  }

  for (const library of libraries) {
    const libraryPath = resolveReference(filePath, library);
    if (!(await pathExists(libraryPath))) {
      result.addIssue({
        code: "MISSING_DEPENDENCY",
        description: "Referenced MTL file not found",
        context: `MTL file: ${library} (expected at: ${libraryPath})`,
        recommendation: "Ensure the MTL file exists in the same directory as the OBJ file",
      });
    }
  }
};

export const validateFbx: FormatRule = async (filePath, sizeBytes, result) => {
  const header = await readPrefix(filePath, FBX_VERSIONED_HEADER_LENGTH);

  if (header.length < FBX_HEADER_LENGTH) {
    result.addIssue({
      code: "STRUCTURAL_DEFECT",
      description: "FBX file is too small to be valid",
      context: `Header length: ${header.length} bytes`,
      recommendation: "Check if the file is complete and not truncated",
    });
    return;
  }

  if (!hasFbxBinaryMagic(header)) {
    result.addIssue({
      code: "SIGNATURE_MISMATCH",
      description: "FBX file may not be in standard binary format",
      context: `Signature: ${printable(header.subarray(0, FBX_HEADER_LENGTH))}`,
      recommendation: "This might be a text-based FBX file or corrupted binary file",
    });
  }

  // A header cut short of the version field reads as version 0
  const version = readFbxVersion(header) ?? 0;
  if (version < FBX_MIN_VERSION || version > FBX_MAX_VERSION) {
    result.addIssue({
      code: "STRUCTURAL_WARNING",
      description: `FBX version is outside common range (${FBX_MIN_VERSION}-${FBX_MAX_VERSION})`,
      context: `Version: ${version}`,
      recommendation: "Check compatibility with your 3D software",
    });
  } else {
    result.addIssue({
      code: "FORMAT_NOTE",
      description: "FBX version detected",
      context: `Version: ${version}`,
      recommendation: "Version appears to be within a common range",
    });
  }

  if (sizeBytes < MIN_SCENE_FILE_BYTES) {
    result.addIssue({
      code: "STRUCTURAL_DEFECT",
      description: "FBX file is suspiciously small",
      context: `File size: ${sizeBytes} bytes`,
      recommendation: "File may be incomplete or corrupted",
    });
  }
};

export const validateBlend: FormatRule = async (filePath, sizeBytes, result) => {
  const header = await readPrefix(filePath, BLEND_HEADER_LENGTH);

  if (header.length < BLEND_HEADER_LENGTH) {
    result.addIssue({
      code: "STRUCTURAL_DEFECT",
      description: "Blend file is too small to be valid",
      context: `Header length: ${header.length} bytes`,
      recommendation: "Check if the file is complete and not truncated",
    });
    return;
  }

  const decoded = decodeBlendHeader(header);
  if (!decoded) {
    result.addIssue({
      code: "INVALID_SIGNATURE",
      description: "Invalid Blend file signature",
      context: `Expected: ${BLEND_MAGIC}, Found: ${printable(header.subarray(0, BLEND_MAGIC.length))}`,
      recommendation: "This file may not be a valid Blender file",
    });
  } else {
    const endianness = decoded.endianness === "little" ? "Little" : "Big";
    result.addIssue({
      code: "FORMAT_NOTE",
      description: "Blend file version detected",
      context: `Version: ${decoded.version}, Pointer size: ${decoded.pointerSize}-bit, Endianness: ${endianness}`,
    });
  }

  if (sizeBytes < MIN_SCENE_FILE_BYTES) {
    result.addIssue({
      code: "STRUCTURAL_DEFECT",
      description: "Blend file is suspiciously small",
      context: `File size: ${sizeBytes} bytes`,
      recommendation: "File may be incomplete or corrupted",
    });
  }
};

export const validateMtl: FormatRule = async (filePath, _sizeBytes, result) => {
  let hasMaterial = false;
  for await (const line of readLines(filePath)) {
    if (isMaterialDefinition(line)) hasMaterial = true;
  }

  if (!hasMaterial) {
    result.addIssue({
      code: "STRUCTURAL_WARNING",
      description: "MTL file contains no material definitions",
      context: `File: ${filePath}`,
      recommendation: "Add material definitions using 'newmtl' keyword",
    });
  }

  await reportMissingTextures(
    filePath,
    result,
    (texture, expectedAt) => `Texture: ${texture} (expected at: ${expectedAt})`,
  );
};

export const validateTexture: FormatRule = async (filePath, _sizeBytes, result) => {
  const extension = extensionOf(filePath);
  const prefix = await readPrefix(filePath, TEXTURE_PREFIX_LENGTH);

  if (!matchesTextureSignature(extension, prefix)) {
    result.addIssue({
      code: "SIGNATURE_MISMATCH",
      description: "Texture file format may not match its extension",
      context: `Extension: .${extension}, File: ${filePath}`,
      recommendation: "Re-export the texture or rename it to match its actual format",
    });
  }
};

// Dispatch by detected kind; kinds without an entry pass unchecked
export const FORMAT_RULES: Partial<Record<FileKind, FormatRule>> = {
  obj: validateObj,
  fbx: validateFbx,
  blend: validateBlend,
  mtl: validateMtl,
  texture: validateTexture,
};

function printable(bytes: Buffer): string {
  return bytes.toString("latin1").replace(/[^\x20-\x7e]/g, ".");
}
