import { mkdir, writeFile } from "fs/promises";
import { dirname } from "path";
import { SEVERITY_LABELS, type ValidationResult } from "@assetlens/core";
import { errorMessage } from "../utils/errors.js";

export interface ReportSummary {
  totalAssets: number;
  validAssets: number;
  totalIssues: number;
  criticalCount: number;
  /** Errors only; criticals are counted separately here */
  errorCount: number;
  warningCount: number;
  infoCount: number;
}

export interface ReportOptions {
  /** Timestamp printed in the header (default: now) */
  generatedAt?: Date;
  /** Receives the failure message when saving fails */
  onVerbose?: (message: string) => void;
}

export function summarizeResults(results: readonly ValidationResult[]): ReportSummary {
  const summary: ReportSummary = {
    totalAssets: results.length,
    validAssets: 0,
    totalIssues: 0,
    criticalCount: 0,
    errorCount: 0,
    warningCount: 0,
    infoCount: 0,
  };

  for (const result of results) {
    if (result.isValid) summary.validAssets++;
    summary.totalIssues += result.totalIssues;
    summary.criticalCount += result.criticalCount;
    summary.errorCount += result.errorCount - result.criticalCount;
    summary.warningCount += result.warningCount;
    summary.infoCount += result.infoCount;
  }

  return summary;
}

/**
 * Render results as the plain-text report. Output depends only on the
 * results and `generatedAt`.
 */
export function generateReport(
  results: readonly ValidationResult[],
  options: ReportOptions = {},
): string {
  const generatedAt = options.generatedAt ?? new Date();
  const summary = summarizeResults(results);
  const lines: string[] = [];

  lines.push("=== Asset Validation Report ===");
  lines.push("");
  lines.push(`Generated: ${generatedAt.toISOString()}`);
  lines.push(`Total assets validated: ${summary.totalAssets}`);
  lines.push("");

  lines.push("=== Summary ===");
  lines.push(`Valid assets: ${summary.validAssets}/${summary.totalAssets}`);
  lines.push(`Total issues found: ${summary.totalIssues}`);
  lines.push(`  - Critical: ${summary.criticalCount}`);
  lines.push(`  - Errors: ${summary.errorCount}`);
  lines.push(`  - Warnings: ${summary.warningCount}`);
  lines.push(`  - Info: ${summary.infoCount}`);
  lines.push("");

  lines.push("=== Detailed Results ===");
  for (const result of results) {
    const errors = result.errorCount - result.criticalCount;
    lines.push(`Asset: ${result.assetPath}`);
    lines.push(`  Status: ${result.isValid ? "VALID" : "INVALID"}`);
    lines.push(
      `  Issues: ${result.totalIssues} (C:${result.criticalCount} E:${errors} W:${result.warningCount} I:${result.infoCount})`,
    );

    for (const issue of result.issues) {
      lines.push(`    [${SEVERITY_LABELS[issue.severity]}] ${issue.description}`);
      if (issue.context) {
        lines.push(`      Context: ${issue.context}`);
      }
      if (issue.recommendation) {
        lines.push(`      Recommendation: ${issue.recommendation}`);
      }
    }
    lines.push("");
  }

  return lines.join("\n") + "\n";
}

/**
 * Write the rendered report to `outputPath`, creating its directory.
 * Resolves false instead of rejecting when anything fails.
 */
export async function saveReport(
  results: readonly ValidationResult[],
  outputPath: string,
  options: ReportOptions = {},
): Promise<boolean> {
  try {
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, generateReport(results, options), "utf-8");
    return true;
  } catch (error) {
    options.onVerbose?.(`Failed to save report to ${outputPath}: ${errorMessage(error)}`);
    return false;
  }
}
