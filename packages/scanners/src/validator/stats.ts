import type { ValidationResult } from "@assetlens/core";

export interface ValidationStats {
  totalFilesValidated: number;
  totalIssuesFound: number;
  /** Assets with at least one error or critical issue */
  filesWithErrors: number;
  filesWithWarnings: number;
  /** Wall-clock time spent inside validate calls */
  validationTimeMs: number;
}

export function createEmptyStats(): ValidationStats {
  return {
    totalFilesValidated: 0,
    totalIssuesFound: 0,
    filesWithErrors: 0,
    filesWithWarnings: 0,
    validationTimeMs: 0,
  };
}

/**
 * Running totals across every result a validator has produced.
 */
export class StatsAccumulator {
  private stats = createEmptyStats();

  record(result: ValidationResult, elapsedMs: number): void {
    this.stats.totalFilesValidated++;
    this.stats.totalIssuesFound += result.totalIssues;
    if (result.errorCount > 0) this.stats.filesWithErrors++;
    if (result.warningCount > 0) this.stats.filesWithWarnings++;
    this.stats.validationTimeMs += elapsedMs;
  }

  snapshot(): ValidationStats {
    return { ...this.stats };
  }

  reset(): void {
    this.stats = createEmptyStats();
  }
}
