import { Command } from "commander";
import { AssetTypeSchema } from "@assetlens/core";
import { error, header, info } from "../output/reporters.js";
import { formatAssetTable } from "../output/formatters.js";
import { errorText, loadIndex, prepareCommand, type IndexOptions } from "./shared.js";

interface ListOptions extends IndexOptions {
  category?: string;
  type?: string;
}

export function createListCommand(): Command {
  const cmd = new Command("list")
    .description("List indexed assets, optionally filtered by category or type")
    .argument("[root]", "Directory whose index to list (default: indexer.root from config)")
    .option("-c, --category <category>", "Only assets in this category")
    .option("-t, --type <type>", "Only assets of this type (Model, Texture, Material, Audio, Video)")
    .option("--cache-file <path>", "Index snapshot file")
    .option("--json", "Output as JSON")
    .option("-v, --verbose", "Verbose output")
    .action(async (root: string | undefined, options: ListOptions) => {
      const context = await prepareCommand(options).catch((err: unknown) => {
        error(errorText(err));
        process.exitCode = 1;
        return null;
      });
      if (!context) return;
      const { spin } = context;

      const assetType = options.type === undefined ? undefined : AssetTypeSchema.safeParse(options.type);
      if (assetType && !assetType.success) {
        spin.stop();
        error(`Unknown asset type "${options.type}". Expected one of: ${AssetTypeSchema.options.join(", ")}`);
        process.exitCode = 1;
        return;
      }

      try {
        const { indexer, root: scanRoot, ok } = await loadIndex(root, options, context);
        spin.stop();

        if (!ok) {
          error(`Could not scan ${scanRoot}: directory missing or unreadable`);
          process.exitCode = 1;
          return;
        }

        const assets = indexer.search({
          category: options.category,
          assetType: assetType?.data,
        });

        if (context.json) {
          console.log(JSON.stringify(assets, null, 2));
          return;
        }

        header(`Assets in ${scanRoot}`);
        console.log(formatAssetTable(assets));
        if (assets.length === 0 && options.category) {
          info(`Known categories: ${indexer.getCategories().join(", ") || "none"}`);
        }
      } catch (err) {
        spin.stop();
        error(`List failed: ${errorText(err)}`);
        process.exitCode = 1;
      }
    });

  return cmd;
}
