import { dirname, isAbsolute, join, relative, resolve } from "path";
import {
  NO_METADATA,
  extensionOf,
  lookupExtension,
  type AssetMetadata,
  type MeshMetadata,
} from "@assetlens/core";
import { readLines, readPrefix } from "../formats/lines.js";
import { pathExists } from "../utils/fs.js";
import { classifyObjLine, parseTextureDirective } from "../formats/wavefront.js";
import {
  FBX_VERSIONED_HEADER_LENGTH,
  BLEND_HEADER_LENGTH,
  parseFbxHeader,
  parseBlendHeader,
} from "../formats/headers.js";

export const EXTERNAL_SDK_NOTE = "requires external SDK";

/**
 * Count vertex, face and material-use lines in one streaming pass.
 */
export async function countMeshElements(filePath: string): Promise<MeshMetadata> {
  let vertexCount = 0;
  let faceCount = 0;
  let materialCount = 0;

  for await (const line of readLines(filePath)) {
    switch (classifyObjLine(line)) {
      case "vertex":
        vertexCount++;
        break;
      case "face":
        faceCount++;
        break;
      case "material-use":
        materialCount++;
        break;
      default:
        break;
    }
  }

  return { kind: "mesh", vertexCount, faceCount, materialCount };
}

/**
 * Cheap structural metadata for formats that allow it; a placeholder for
 * model formats that would need a full parser.
 */
export async function extractMetadata(filePath: string): Promise<AssetMetadata> {
  const entry = lookupExtension(filePath);
  if (!entry || entry.assetType !== "Model") return NO_METADATA;

  switch (entry.kind) {
    case "obj":
      return countMeshElements(filePath);
    case "fbx":
      return parseFbxHeader(await readPrefix(filePath, FBX_VERSIONED_HEADER_LENGTH));
    case "blend":
      return parseBlendHeader(await readPrefix(filePath, BLEND_HEADER_LENGTH));
    default:
      return { kind: "placeholder", format: entry.format, note: EXTERNAL_SDK_NOTE };
  }
}

/**
 * Absolute paths of the texture files a material library references that
 * exist on disk. Relative targets resolve against `baseDir`.
 */
export async function findTextureReferences(
  materialPath: string,
  baseDir: string = dirname(materialPath),
): Promise<string[]> {
  const found: string[] = [];
  for await (const line of readLines(materialPath)) {
    const target = parseTextureDirective(line);
    if (!target) continue;
    const texturePath = isAbsolute(target) ? target : join(baseDir, target);
    if (await pathExists(texturePath)) {
      found.push(resolve(texturePath));
    }
  }
  return found;
}

/**
 * Sibling material library of a mesh: same stem, `.mtl` extension.
 */
export function siblingMaterialPath(meshPath: string): string {
  const ext = extensionOf(meshPath);
  return `${meshPath.slice(0, meshPath.length - ext.length - 1)}.mtl`;
}

/**
 * Root-relative paths of the files an asset depends on.
 *
 * OBJ: the sibling `.mtl` and the textures it names, resolved against the
 * mesh's directory. MTL: the textures it names.
 */
export async function findDependencies(filePath: string, root: string): Promise<string[]> {
  const kind = lookupExtension(filePath)?.kind;
  const absolute: string[] = [];

  if (kind === "obj") {
    const materialPath = siblingMaterialPath(filePath);
    if (await pathExists(materialPath)) {
      absolute.push(resolve(materialPath));
      absolute.push(...(await findTextureReferences(materialPath, dirname(filePath))));
    }
  } else if (kind === "mtl") {
    absolute.push(...(await findTextureReferences(filePath)));
  }

  return [...new Set(absolute.map((path) => relative(root, path)))];
}
