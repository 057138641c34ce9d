import { stat } from "fs/promises";
import { basename, extname, relative } from "path";
import {
  NO_METADATA,
  categorize,
  lookupExtension,
  type AssetMetadata,
  type AssetRecord,
} from "@assetlens/core";
import { errorMessage } from "../utils/errors.js";
import { extractMetadata, findDependencies } from "./extract.js";

export const EMPTY_FILE_ISSUE = "File is empty";

export interface BuildRecordOptions {
  /** Skip metadata and dependency extraction */
  shallow?: boolean;
}

/**
 * Classify one file and capture its size, modification time, metadata and
 * dependencies. Rejects only when the file cannot be stat'ed; extraction
 * failures are recorded as warnings on the record.
 */
export async function buildAssetRecord(
  root: string,
  absolutePath: string,
  options: BuildRecordOptions = {},
): Promise<AssetRecord> {
  const stats = await stat(absolutePath);
  const relativePath = relative(root, absolutePath);
  const entry = lookupExtension(absolutePath);

  const issues: string[] = [];
  const warnings: string[] = [];
  let metadata: AssetMetadata = NO_METADATA;
  let dependencies: string[] = [];

  if (!options.shallow) {
    try {
      metadata = await extractMetadata(absolutePath);
    } catch (error) {
      warnings.push(`Metadata extraction failed: ${errorMessage(error)}`);
    }
    try {
      dependencies = await findDependencies(absolutePath, root);
    } catch (error) {
      warnings.push(`Dependency scan failed: ${errorMessage(error)}`);
    }
  }

  if (stats.size === 0) {
    issues.push(EMPTY_FILE_ISSUE);
  }

  return {
    relativePath,
    name: basename(absolutePath, extname(absolutePath)),
    assetType: entry?.assetType ?? "Unknown",
    format: entry?.format ?? "Unknown",
    category: categorize(relativePath),
    sizeBytes: stats.size,
    modifiedAt: Math.floor(stats.mtimeMs / 1000),
    metadata,
    dependencies,
    isValid: issues.length === 0,
    issues,
    warnings,
  };
}
