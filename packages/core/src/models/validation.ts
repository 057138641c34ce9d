import { z } from "zod";

// Severity levels, lowest impact first
export const SeveritySchema = z.enum(["info", "warning", "error", "critical"]);

// Issue taxonomy. Each code belongs to exactly one severity tier.
export const IssueCodeSchema = z.enum([
  "MISSING_FILE",
  "NOT_REGULAR_FILE",
  "UNREADABLE_FILE",
  "CORRUPT_PREFIX",
  "OVERSIZE",
  "EMPTY_FILE",
  "MISSING_DEPENDENCY",
  "INVALID_SIGNATURE",
  "SIGNATURE_MISMATCH",
  "STRUCTURAL_DEFECT",
  "STRUCTURAL_WARNING",
  "FORMAT_NOTE",
  "VALIDATION_FAILED",
]);

export const ValidationIssueSchema = z.object({
  code: IssueCodeSchema,
  severity: SeveritySchema,
  description: z.string(),
  filePath: z.string(),
  context: z.string(),
  recommendation: z.string(),
});

export const ValidationResultSchema = z.object({
  assetPath: z.string(),
  isValid: z.boolean(),
  totalIssues: z.number().int().nonnegative(),
  /** Errors and criticals together; drives isValid */
  errorCount: z.number().int().nonnegative(),
  criticalCount: z.number().int().nonnegative(),
  warningCount: z.number().int().nonnegative(),
  infoCount: z.number().int().nonnegative(),
  issues: z.array(ValidationIssueSchema),
});

// Types
export type Severity = z.infer<typeof SeveritySchema>;
export type IssueCode = z.infer<typeof IssueCodeSchema>;
export type ValidationIssue = z.infer<typeof ValidationIssueSchema>;
export type ValidationResult = z.infer<typeof ValidationResultSchema>;

export const SEVERITY_LABELS: Record<Severity, string> = {
  info: "INFO",
  warning: "WARNING",
  error: "ERROR",
  critical: "CRITICAL",
};

export const ISSUE_SEVERITY: Record<IssueCode, Severity> = {
  MISSING_FILE: "critical",
  UNREADABLE_FILE: "critical",
  VALIDATION_FAILED: "critical",
  NOT_REGULAR_FILE: "error",
  CORRUPT_PREFIX: "error",
  MISSING_DEPENDENCY: "error",
  INVALID_SIGNATURE: "error",
  STRUCTURAL_DEFECT: "error",
  OVERSIZE: "warning",
  EMPTY_FILE: "warning",
  SIGNATURE_MISMATCH: "warning",
  STRUCTURAL_WARNING: "warning",
  FORMAT_NOTE: "info",
};

export function getSeverityWeight(severity: Severity): number {
  switch (severity) {
    case "critical":
      return 4;
    case "error":
      return 3;
    case "warning":
      return 2;
    case "info":
      return 1;
  }
}

export function compareSeverity(a: Severity, b: Severity): number {
  return getSeverityWeight(a) - getSeverityWeight(b);
}

/** True for the tiers that make an asset invalid. */
export function isBlockingSeverity(severity: Severity): boolean {
  return severity === "error" || severity === "critical";
}

export function createEmptyResult(assetPath: string): ValidationResult {
  return {
    assetPath,
    isValid: true,
    totalIssues: 0,
    errorCount: 0,
    criticalCount: 0,
    warningCount: 0,
    infoCount: 0,
    issues: [],
  };
}
