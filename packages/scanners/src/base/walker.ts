import { globIterate } from "glob";
import { stat } from "fs/promises";
import { resolve } from "path";

/**
 * One regular file discovered under a walk root
 */
export interface FileVisit {
  absolutePath: string;
  /** Path relative to the walk root, using the platform separator */
  relativePath: string;
}

export interface WalkOptions {
  /** Glob patterns to skip (default: DEFAULT_EXCLUDES) */
  exclude?: string[];
  signal?: AbortSignal;
}

/**
 * Default exclusion patterns for file discovery: version control
 * directories, OS metadata files and editor/backup leftovers.
 */
export const DEFAULT_EXCLUDES = [
  "**/.git/**",
  "**/.svn/**",
  "**/.hg/**",
  "**/.bzr/**",
  "**/.DS_Store",
  "**/Thumbs.db",
  "**/desktop.ini",
  "**/*.tmp",
  "**/*.temp",
  "**/*.bak",
  "**/*.backup",
  "**/*~",
];

/**
 * Lazily walk every regular file below `root`.
 *
 * Rejects when the root is missing or not a directory. Symbolic links are
 * not followed and are not reported.
 */
export async function* walkFiles(
  root: string,
  options: WalkOptions = {},
): AsyncGenerator<FileVisit> {
  const absoluteRoot = resolve(root);
  const rootStats = await stat(absoluteRoot);
  if (!rootStats.isDirectory()) {
    throw new Error(`Not a directory: ${absoluteRoot}`);
  }

  const entries = globIterate("**/*", {
    cwd: absoluteRoot,
    dot: true,
    nodir: true,
    follow: false,
    withFileTypes: true,
    ignore: options.exclude ?? DEFAULT_EXCLUDES,
    signal: options.signal,
  });

  for await (const entry of entries) {
    if (!entry.isFile()) continue;
    yield {
      absolutePath: entry.fullpath(),
      relativePath: entry.relative(),
    };
  }
}
