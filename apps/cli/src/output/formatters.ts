import chalk, { type ChalkInstance } from "chalk";
import Table from "cli-table3";
import {
  SEVERITY_LABELS,
  describeMetadata,
  type AssetRecord,
  type Severity,
  type ValidationResult,
} from "@assetlens/core";
import type { ReportSummary } from "@assetlens/scanners";

// Severity colors
export function getSeverityColor(severity: Severity): ChalkInstance {
  switch (severity) {
    case "critical":
      return chalk.red.bold;
    case "error":
      return chalk.red;
    case "warning":
      return chalk.yellow;
    case "info":
      return chalk.blue;
  }
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  const units = ["KB", "MB", "GB", "TB"];
  let value = bytes / 1024;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(1)} ${units[unit]}`;
}

// Format asset table
export function formatAssetTable(assets: AssetRecord[]): string {
  if (assets.length === 0) {
    return chalk.dim("No assets found.");
  }

  const table = new Table({
    head: [
      chalk.bold("Path"),
      chalk.bold("Type"),
      chalk.bold("Category"),
      chalk.bold("Size"),
      chalk.bold("Details"),
    ],
    style: { head: [], border: [] },
  });

  for (const asset of assets) {
    const details = describeMetadata(asset.metadata);
    table.push([
      asset.isValid ? asset.relativePath : chalk.red(asset.relativePath),
      asset.format,
      asset.category,
      formatBytes(asset.sizeBytes),
      details || chalk.dim("-"),
    ]);
  }

  return table.toString();
}

// Format group counts (category or type -> number of assets)
export function formatCountTable(title: string, counts: Map<string, number>): string {
  if (counts.size === 0) {
    return chalk.dim(`No ${title.toLowerCase()} found.`);
  }

  const table = new Table({
    head: [chalk.bold(title), chalk.bold("Assets")],
    style: { head: [], border: [] },
  });

  for (const [name, count] of counts) {
    table.push([name, String(count)]);
  }

  return table.toString();
}

// Format validation results, one row per asset plus its worst issue
export function formatValidationTable(results: readonly ValidationResult[]): string {
  if (results.length === 0) {
    return chalk.dim("No assets validated.");
  }

  const table = new Table({
    head: [
      chalk.bold("Asset"),
      chalk.bold("Status"),
      chalk.bold("C"),
      chalk.bold("E"),
      chalk.bold("W"),
      chalk.bold("I"),
      chalk.bold("First issue"),
    ],
    style: { head: [], border: [] },
  });

  for (const result of results) {
    const first = result.issues[0];
    table.push([
      result.assetPath,
      result.isValid ? chalk.green("VALID") : chalk.red("INVALID"),
      String(result.criticalCount),
      String(result.errorCount - result.criticalCount),
      String(result.warningCount),
      String(result.infoCount),
      first
        ? getSeverityColor(first.severity)(`[${SEVERITY_LABELS[first.severity]}] ${first.description}`)
        : chalk.dim("-"),
    ]);
  }

  return table.toString();
}

// Format validation summary line
export function formatValidationSummary(summary: ReportSummary): string {
  const parts = [
    `${summary.validAssets}/${summary.totalAssets} valid`,
    getSeverityColor("critical")(`${summary.criticalCount} critical`),
    getSeverityColor("error")(`${summary.errorCount} errors`),
    getSeverityColor("warning")(`${summary.warningCount} warnings`),
    getSeverityColor("info")(`${summary.infoCount} info`),
  ];
  return parts.join(chalk.dim(" · "));
}

// Count records per key, sorted by key
export function countBy(assets: AssetRecord[], key: (asset: AssetRecord) => string): Map<string, number> {
  const counts = new Map<string, number>();
  for (const asset of assets) {
    const name = key(asset);
    counts.set(name, (counts.get(name) ?? 0) + 1);
  }
  return new Map([...counts.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}
