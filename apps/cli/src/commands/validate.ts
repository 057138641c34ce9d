import { resolve } from "path";
import { Command, InvalidArgumentError } from "commander";
import type { ValidationResult } from "@assetlens/core";
import { AssetValidator, saveReport, summarizeResults } from "@assetlens/scanners";
import { error, newline, success, verboseLogger, warning } from "../output/reporters.js";
import { formatValidationSummary, formatValidationTable } from "../output/formatters.js";
import { errorText, prepareCommand, type CommonOptions } from "./shared.js";

interface ValidateOptions extends CommonOptions {
  dir?: string;
  output?: string;
  maxSize?: number;
  textures: boolean;
}

function parseMegabytes(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive number of megabytes.");
  }
  return parsed;
}

export function createValidateCommand(): Command {
  const cmd = new Command("validate")
    .description("Check assets for corruption, format violations and missing dependencies")
    .argument("[paths...]", "Files to validate")
    .option("-d, --dir <directory>", "Validate every recognised file under a directory")
    .option("-o, --output <file>", "Write the text report to a file")
    .option("--max-size <mb>", "Warn about files larger than this many megabytes", parseMegabytes)
    .option("--no-textures", "Skip texture dependency checks")
    .option("--json", "Output as JSON")
    .option("-v, --verbose", "Verbose output")
    .action(async (paths: string[], options: ValidateOptions) => {
      const context = await prepareCommand(options).catch((err: unknown) => {
        error(errorText(err));
        process.exitCode = 1;
        return null;
      });
      if (!context) return;
      const { config, spin } = context;

      const validator = new AssetValidator({
        ...config.validator,
        maxFileSizeMb: options.maxSize ?? config.validator.maxFileSizeMb,
        checkTextureDependencies: options.textures && config.validator.checkTextureDependencies,
        onVerbose: verboseLogger(options.verbose),
        onProgress: (completed, total) => {
          spin.text = total === undefined
            ? `Validating assets... (${completed})`
            : `Validating assets... (${completed}/${total})`;
        },
      });

      try {
        const results: ValidationResult[] = [];
        if (paths.length > 0) {
          results.push(...(await validator.validateMany(paths.map((path) => resolve(path)))));
        }
        if (options.dir || paths.length === 0) {
          const directory = resolve(options.dir ?? config.indexer.root);
          spin.text = `Validating ${directory}...`;
          results.push(...(await validator.validateDirectory(directory)));
        }
        spin.stop();

        const summary = summarizeResults(results);
        const reportFile = options.output ?? config.output.reportFile;
        if (reportFile) {
          const saved = await saveReport(results, resolve(reportFile), {
            onVerbose: verboseLogger(options.verbose),
          });
          if (saved) {
            success(`Report written to ${reportFile}`);
          } else {
            warning(`Could not write report to ${reportFile}`);
          }
        }

        if (summary.validAssets < summary.totalAssets) {
          process.exitCode = 1;
        }

        if (context.json) {
          console.log(JSON.stringify({ summary, stats: validator.getStats(), results }, null, 2));
          return;
        }

        console.log(formatValidationTable(results));
        newline();
        console.log(formatValidationSummary(summary));

        if (summary.validAssets === summary.totalAssets) {
          success(`All ${summary.totalAssets} assets passed validation`);
        } else {
          error(`${summary.totalAssets - summary.validAssets} of ${summary.totalAssets} assets failed validation`);
        }
      } catch (err) {
        spin.stop();
        error(`Validation failed: ${errorText(err)}`);
        process.exitCode = 1;
      }
    });

  return cmd;
}
