import type { FileKind } from "@assetlens/core";
import { pathExists } from "../utils/fs.js";
import { readMaterialLibraries, reportMissingTextures, resolveReference } from "./formats.js";
import type { ResultBuilder } from "./result-builder.js";

/**
 * Follow a mesh's material libraries to the textures they name and report
 * each missing one. Missing libraries themselves are the OBJ rule's
 * concern; nothing is recorded when every texture resolves.
 */
export async function checkTextureDependencies(
  filePath: string,
  kind: FileKind,
  result: ResultBuilder,
): Promise<void> {
  // FBX and Blend embed texture paths in binary structures this stage does not parse
  if (kind !== "obj") return;

  for (const library of await readMaterialLibraries(filePath)) {
    const libraryPath = resolveReference(filePath, library);
    if (!(await pathExists(libraryPath))) continue;

    await reportMissingTextures(
      libraryPath,
      result,
      (texture, expectedAt) =>
        `Texture: ${texture} (expected at: ${expectedAt}), referenced by material library ${library}`,
    );
  }
}
