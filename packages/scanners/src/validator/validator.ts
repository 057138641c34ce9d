// packages/scanners/src/validator/validator.ts
import { stat } from "fs/promises";
import { resolve } from "path";
import { performance } from "perf_hooks";
import { detectFileType, type ValidationResult } from "@assetlens/core";
import { parallelProcess } from "../base/pool.js";
import { walkFiles } from "../base/walker.js";
import { errorMessage } from "../utils/errors.js";
import { comparePaths } from "../utils/paths.js";
import { checkTextureDependencies } from "./dependencies.js";
import { FORMAT_RULES } from "./formats.js";
import { checkIntegrity } from "./integrity.js";
import { ResultBuilder } from "./result-builder.js";
import { StatsAccumulator, type ValidationStats } from "./stats.js";

export interface ValidatorOptions {
  /** Files above this size get a warning (default: 1000) */
  maxFileSizeMb: number;
  /** Run existence, size and readability checks (default: true) */
  checkFileIntegrity: boolean;
  /** Run the per-format rules (default: true) */
  checkFormatSpecific: boolean;
  /** Follow OBJ material libraries to their textures (default: true) */
  checkTextureDependencies: boolean;
  /** Files validated at once by batch calls (default: 16) */
  concurrency: number;
  /** Glob patterns skipped by directory validation */
  exclude?: string[];
  /** Callback for verbose logging */
  onVerbose?: (message: string) => void;
  /** Called after each file of a batch */
  onProgress?: (completed: number, total: number | undefined) => void;
}

export const DEFAULT_VALIDATOR_OPTIONS: ValidatorOptions = {
  maxFileSizeMb: 1000,
  checkFileIntegrity: true,
  checkFormatSpecific: true,
  checkTextureDependencies: true,
  concurrency: 16,
};

export interface BatchOptions {
  /** Stop starting new files once aborted */
  signal?: AbortSignal;
}

/**
 * Judges individual assets through a linear pipeline:
 * integrity, then the rule for the detected format, then dependencies.
 *
 * Every call returns fresh results; nothing is cached between calls apart
 * from the running statistics.
 */
export class AssetValidator {
  private options: ValidatorOptions;
  private readonly stats = new StatsAccumulator();

  constructor(options: Partial<ValidatorOptions> = {}) {
    this.options = { ...DEFAULT_VALIDATOR_OPTIONS, ...options };
  }

  setOptions(options: Partial<ValidatorOptions>): void {
    this.options = { ...this.options, ...options };
  }

  getOptions(): ValidatorOptions {
    return { ...this.options };
  }

  /**
   * Validate one file. Never rejects: unexpected failures become a
   * critical issue on the returned result.
   */
  async validateOne(filePath: string): Promise<ValidationResult> {
    const startTime = performance.now();
    const result = new ResultBuilder(filePath);

    try {
      await this.runPipeline(filePath, result);
    } catch (error) {
      result.addIssue({
        code: "VALIDATION_FAILED",
        description: `Validation failed with exception: ${errorMessage(error)}`,
        context: "Exception occurred during validation process",
        recommendation: "Check file accessibility and try again",
      });
    }

    const built = result.build();
    this.stats.record(built, performance.now() - startTime);
    this.verbose(
      `Validated ${filePath}: ${built.isValid ? "valid" : "invalid"} (${built.totalIssues} issues)`,
    );
    return built;
  }

  private async runPipeline(filePath: string, result: ResultBuilder): Promise<void> {
    let sizeBytes: number | undefined;

    if (this.options.checkFileIntegrity) {
      const stats = await checkIntegrity(filePath, result, this.options);
      if (!stats) return;
      sizeBytes = stats.size;
    }

    // Nothing further to inspect in an empty file; the integrity warning is the finding
    if (sizeBytes === 0) return;

    const kind = detectFileType(filePath);

    if (this.options.checkFormatSpecific) {
      const rule = FORMAT_RULES[kind];
      if (rule) {
        await rule(filePath, sizeBytes ?? (await statSize(filePath)), result);
      }
    }

    if (this.options.checkTextureDependencies) {
      await checkTextureDependencies(filePath, kind, result);
    }
  }

  /**
   * Validate several files on a bounded pool. Results follow input order;
   * after an abort only the files already started are returned.
   */
  async validateMany(filePaths: string[], options: BatchOptions = {}): Promise<ValidationResult[]> {
    const settled = await parallelProcess(
      filePaths,
      (filePath) => this.validateOne(filePath),
      this.options.concurrency,
      { signal: options.signal, onProgress: this.options.onProgress },
    );

    return settled.map((entry, index) => {
      if (entry.status === "fulfilled") return entry.value;
      const fallback = new ResultBuilder(filePaths[index] ?? "");
      fallback.addIssue({
        code: "VALIDATION_FAILED",
        description: `Validation failed with exception: ${errorMessage(entry.reason)}`,
        context: "Exception occurred during validation process",
        recommendation: "Check file accessibility and try again",
      });
      return fallback.build();
    });
  }

  /**
   * Walk `directory` and validate every file of a recognised type, in path
   * order. A walk failure yields a single critical result for the directory.
   */
  async validateDirectory(directory: string, options: BatchOptions = {}): Promise<ValidationResult[]> {
    const root = resolve(directory);
    const filePaths: string[] = [];

    try {
      for await (const visit of walkFiles(root, {
        exclude: this.options.exclude,
        signal: options.signal,
      })) {
        if (detectFileType(visit.absolutePath) !== "unknown") {
          filePaths.push(visit.absolutePath);
        }
      }
    } catch (error) {
      if (options.signal?.aborted) return [];
      this.verbose(`Directory validation failed for ${root}: ${errorMessage(error)}`);
      const failure = new ResultBuilder(directory);
      failure.addIssue({
        code: "VALIDATION_FAILED",
        description: `Directory validation failed: ${errorMessage(error)}`,
        context: "Exception occurred during directory scanning",
        recommendation: "Check directory permissions and accessibility",
      });
      return [failure.build()];
    }

    filePaths.sort(comparePaths);
    this.verbose(`Validating ${filePaths.length} files in ${root}`);
    return this.validateMany(filePaths, options);
  }

  getStats(): ValidationStats {
    return this.stats.snapshot();
  }

  resetStats(): void {
    this.stats.reset();
  }

  private verbose(message: string): void {
    this.options.onVerbose?.(message);
  }
}

async function statSize(filePath: string): Promise<number> {
  return (await stat(filePath)).size;
}
