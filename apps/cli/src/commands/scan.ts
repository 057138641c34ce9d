import { Command } from "commander";
import chalk from "chalk";
import {
  success,
  error,
  info,
  warning,
  header,
  keyValue,
  newline,
} from "../output/reporters.js";
import { countBy, formatCountTable } from "../output/formatters.js";
import { errorText, loadIndex, prepareCommand, type IndexOptions } from "./shared.js";

export function createScanCommand(): Command {
  const cmd = new Command("scan")
    .description("Index the production assets under a directory")
    .argument("[root]", "Directory to scan (default: indexer.root from config)")
    .option("-f, --force", "Rescan even when the cached index is still valid")
    .option("--cache-file <path>", "Index snapshot file")
    .option("--no-cache", "Neither read nor write the index snapshot")
    .option("--json", "Output as JSON")
    .option("-v, --verbose", "Verbose output")
    .action(async (root: string | undefined, options: IndexOptions) => {
      const context = await prepareCommand(options).catch((err: unknown) => {
        error(errorText(err));
        process.exitCode = 1;
        return null;
      });
      if (!context) return;
      const { spin } = context;

      try {
        const { indexer, root: scanRoot, cacheFile, ok, cacheSaved } = await loadIndex(
          root,
          options,
          context,
        );
        spin.stop();

        if (!ok) {
          error(`Could not scan ${scanRoot}: directory missing or unreadable`);
          process.exitCode = 1;
          return;
        }
        if (!cacheSaved) {
          warning(`Could not write index cache to ${cacheFile}`);
        }

        const assets = indexer.getAllAssets();
        const stats = indexer.getStats();
        const fromCache = stats.traversals === 0;

        if (context.json) {
          console.log(
            JSON.stringify(
              {
                root: scanRoot,
                fromCache,
                scannedAt: indexer.getLastScanTime()?.toISOString() ?? null,
                stats,
                assets,
              },
              null,
              2,
            ),
          );
          return;
        }

        header("Asset Index");
        keyValue("Root", scanRoot);
        keyValue("Assets", String(assets.length));
        if (fromCache) {
          keyValue("Source", chalk.cyan("cached index"));
        } else {
          keyValue("Files visited", String(stats.filesVisited));
          keyValue("Duration", `${stats.lastScanDurationMs} ms`);
        }
        newline();

        console.log(formatCountTable("Category", countBy(assets, (asset) => asset.category)));
        newline();
        console.log(formatCountTable("Type", countBy(assets, (asset) => asset.assetType)));
        newline();

        const flagged = assets.filter((asset) => !asset.isValid);
        if (flagged.length > 0) {
          warning(`${flagged.length} asset(s) flagged during indexing`);
          info(`Run ${chalk.cyan("assetlens validate --dir " + scanRoot)} for details`);
        }

        success(`Indexed ${assets.length} assets`);
      } catch (err) {
        spin.stop();
        error(`Scan failed: ${errorText(err)}`);
        process.exitCode = 1;
      }
    });

  return cmd;
}
