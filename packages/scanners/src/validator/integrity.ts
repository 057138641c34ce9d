import { open, stat, type FileHandle } from "fs/promises";
import type { Stats } from "fs";
import { errorCode, errorMessage } from "../utils/errors.js";
import type { ResultBuilder } from "./result-builder.js";

/** Bytes read by the corruption probe */
export const INTEGRITY_PROBE_BYTES = 1024;

const BYTES_PER_MB = 1024 * 1024;

export interface IntegrityOptions {
  maxFileSizeMb: number;
}

/**
 * Existence, file kind, size and readability checks.
 *
 * Returns the file's stats when later stages may run, or null when the
 * asset is missing, not a regular file, unreadable or fails the prefix
 * probe. Empty and oversize files only warn.
 */
export async function checkIntegrity(
  filePath: string,
  result: ResultBuilder,
  options: IntegrityOptions,
): Promise<Stats | null> {
  let stats: Stats;
  try {
    stats = await stat(filePath);
  } catch (error) {
    if (errorCode(error) === "ENOENT" || errorCode(error) === "ENOTDIR") {
      result.addIssue({
        code: "MISSING_FILE",
        description: "File does not exist",
        context: `File path: ${filePath}`,
        recommendation: "Verify the file path and ensure the file exists",
      });
    } else {
      result.addIssue({
        code: "UNREADABLE_FILE",
        description: "Cannot determine file attributes",
        context: `Error: ${errorMessage(error)}`,
        recommendation: "Check file permissions and accessibility",
      });
    }
    return null;
  }

  if (!stats.isFile()) {
    result.addIssue({
      code: "NOT_REGULAR_FILE",
      description: "Path is not a regular file",
      context: `Path: ${filePath}`,
      recommendation: "Ensure the path points to a valid file, not a directory or special file",
    });
    return null;
  }

  if (stats.size === 0) {
    result.addIssue({
      code: "EMPTY_FILE",
      description: "File is empty (0 bytes)",
      context: "File size: 0 bytes",
      recommendation: "Consider removing empty files or checking if they should contain data",
    });
  }

  const sizeMb = stats.size / BYTES_PER_MB;
  if (sizeMb > options.maxFileSizeMb) {
    result.addIssue({
      code: "OVERSIZE",
      description: "File size exceeds recommended limit",
      context: `File size: ${sizeMb.toFixed(2)} MB, Limit: ${options.maxFileSizeMb} MB`,
      recommendation: "Consider optimizing the file or increasing the size limit if necessary",
    });
  }

  let handle: FileHandle;
  try {
    handle = await open(filePath, "r");
  } catch (error) {
    result.addIssue({
      code: "UNREADABLE_FILE",
      description: "Cannot open file for reading",
      context: `File path: ${filePath} (${errorMessage(error)})`,
      recommendation: "Check file permissions and ensure the file is not locked by another process",
    });
    return null;
  }

  try {
    // A short read at end of file is fine; only a failing read counts
    await handle.read(Buffer.alloc(INTEGRITY_PROBE_BYTES), 0, INTEGRITY_PROBE_BYTES, 0);
  } catch (error) {
    result.addIssue({
      code: "CORRUPT_PREFIX",
      description: "File appears to be corrupted or unreadable",
      context: `Failed to read file contents: ${errorMessage(error)}`,
      recommendation: "Check if the file is corrupted or try re-downloading it",
    });
    return null;
  } finally {
    await handle.close();
  }

  return stats;
}
