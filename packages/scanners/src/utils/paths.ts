import { isAbsolute, relative, resolve } from "path";

/** Ordinal comparison; independent of the current locale */
export function comparePaths(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Express `filePath` relative to `root`. Relative inputs are taken as
 * already root-relative and only normalized.
 */
export function toRootRelative(root: string, filePath: string): string {
  return isAbsolute(filePath) ? relative(root, filePath) : relative(root, resolve(root, filePath));
}
