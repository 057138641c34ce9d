import {
  ISSUE_SEVERITY,
  createEmptyResult,
  type IssueCode,
  type ValidationIssue,
  type ValidationResult,
} from "@assetlens/core";

export interface IssueInput {
  code: IssueCode;
  description: string;
  context?: string;
  recommendation?: string;
}

/**
 * Accumulates issues for one asset. The only place severity counts change;
 * `build()` hands back a frozen result.
 */
export class ResultBuilder {
  private readonly result: ValidationResult;

  constructor(readonly assetPath: string) {
    this.result = createEmptyResult(assetPath);
  }

  addIssue({ code, description, context = "", recommendation = "" }: IssueInput): void {
    const severity = ISSUE_SEVERITY[code];
    const issue: ValidationIssue = {
      code,
      severity,
      description,
      filePath: this.assetPath,
      context,
      recommendation,
    };

    this.result.issues.push(issue);
    this.result.totalIssues++;

    switch (severity) {
      case "critical":
        this.result.criticalCount++;
        this.result.errorCount++;
        break;
      case "error":
        this.result.errorCount++;
        break;
      case "warning":
        this.result.warningCount++;
        break;
      case "info":
        this.result.infoCount++;
        break;
    }
  }

  build(): ValidationResult {
    const issues = this.result.issues.map((issue) => Object.freeze({ ...issue }));
    Object.freeze(issues);
    return Object.freeze({
      ...this.result,
      isValid: this.result.errorCount === 0,
      issues,
    });
  }
}
