import { resolve } from "path";
import chalk from "chalk";
import type { Ora } from "ora";
import { AssetIndexer, getDefaultCachePath } from "@assetlens/scanners";
import { loadConfig } from "../config/loader.js";
import type { AssetLensConfig } from "../config/schema.js";
import { info, setJsonMode, spinner, verboseLogger } from "../output/reporters.js";

export interface CommonOptions {
  json?: boolean;
  verbose?: boolean;
}

export interface CommandContext {
  config: AssetLensConfig;
  json: boolean;
  spin: Ora;
}

/**
 * Load the config file and apply its output settings. JSON mode is set
 * before the spinner starts so spinner output goes to stderr.
 */
export async function prepareCommand(options: CommonOptions): Promise<CommandContext> {
  const { config, configPath } = await loadConfig();
  const json = options.json === true || config.output.format === "json";

  if (json) {
    setJsonMode(true);
  }
  if (!config.output.colors) {
    chalk.level = 0;
  }
  if (options.verbose && configPath) {
    info(`Using config: ${configPath}`);
  }

  return { config, json, spin: spinner("Loading configuration...") };
}

export interface IndexOptions extends CommonOptions {
  force?: boolean;
  cache?: boolean;
  cacheFile?: string;
}

export interface LoadedIndex {
  indexer: AssetIndexer;
  root: string;
  cacheFile: string;
  /** False when the root could not be scanned */
  ok: boolean;
  /** False when the snapshot file was wanted but could not be written */
  cacheSaved: boolean;
}

/**
 * Bring an index for `root` up to date: read the snapshot file, scan
 * (a cache hit when the snapshot is still valid), then write the snapshot.
 */
export async function loadIndex(
  rootArg: string | undefined,
  options: IndexOptions,
  { config, spin }: CommandContext,
): Promise<LoadedIndex> {
  const root = resolve(rootArg ?? config.indexer.root);
  const cacheFile = resolve(options.cacheFile ?? config.indexer.cacheFile ?? getDefaultCachePath(root));
  const useCache = options.cache !== false;

  const indexer = new AssetIndexer({
    cacheExpirySeconds: config.indexer.cacheExpirySeconds,
    concurrency: config.indexer.concurrency,
    exclude: config.indexer.exclude,
    extractDetails: config.indexer.extractDetails,
    onVerbose: verboseLogger(options.verbose),
    onProgress: (completed) => {
      spin.text = `Indexing assets... (${completed})`;
    },
  });

  if (useCache) {
    spin.text = "Loading index cache...";
    await indexer.loadCache(cacheFile);
  }

  spin.text = `Scanning ${root}...`;
  const ok = await indexer.scan(root, { forceRefresh: options.force === true });

  const cacheSaved = ok && useCache ? await indexer.saveCache(cacheFile) : true;

  return { indexer, root, cacheFile, ok, cacheSaved };
}

export function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
