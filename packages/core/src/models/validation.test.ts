import { describe, it, expect } from "vitest";
import {
  ISSUE_SEVERITY,
  IssueCodeSchema,
  compareSeverity,
  createEmptyResult,
  getSeverityWeight,
  isBlockingSeverity,
} from "./validation.js";
import { describeMetadata } from "./asset.js";
import { CacheSnapshotSchema } from "./cache.js";

describe("severity ordering", () => {
  it("ranks info < warning < error < critical", () => {
    expect(getSeverityWeight("info")).toBeLessThan(getSeverityWeight("warning"));
    expect(getSeverityWeight("warning")).toBeLessThan(getSeverityWeight("error"));
    expect(getSeverityWeight("error")).toBeLessThan(getSeverityWeight("critical"));
    expect(compareSeverity("critical", "info")).toBe(3);
  });

  it("treats error and critical as blocking", () => {
    expect(isBlockingSeverity("critical")).toBe(true);
    expect(isBlockingSeverity("error")).toBe(true);
    expect(isBlockingSeverity("warning")).toBe(false);
    expect(isBlockingSeverity("info")).toBe(false);
  });
});

describe("ISSUE_SEVERITY", () => {
  it("assigns every issue code a tier", () => {
    for (const code of IssueCodeSchema.options) {
      expect(ISSUE_SEVERITY[code]).toBeDefined();
    }
  });

  it("reserves critical for missing and unreadable files", () => {
    expect(ISSUE_SEVERITY.MISSING_FILE).toBe("critical");
    expect(ISSUE_SEVERITY.UNREADABLE_FILE).toBe("critical");
    expect(ISSUE_SEVERITY.EMPTY_FILE).toBe("warning");
    expect(ISSUE_SEVERITY.SIGNATURE_MISMATCH).toBe("warning");
    expect(ISSUE_SEVERITY.STRUCTURAL_DEFECT).toBe("error");
  });
});

describe("createEmptyResult", () => {
  it("starts valid with zero counts", () => {
    expect(createEmptyResult("a.obj")).toEqual({
      assetPath: "a.obj",
      isValid: true,
      totalIssues: 0,
      errorCount: 0,
      criticalCount: 0,
      warningCount: 0,
      infoCount: 0,
      issues: [],
    });
  });
});

describe("describeMetadata", () => {
  it("summarizes mesh counts", () => {
    expect(
      describeMetadata({ kind: "mesh", vertexCount: 8, faceCount: 6, materialCount: 1 }),
    ).toBe("8 vertices, 6 faces, 1 materials");
  });

  it("summarizes placeholders", () => {
    expect(
      describeMetadata({ kind: "placeholder", format: "STL", note: "requires external SDK" }),
    ).toBe("STL: requires external SDK");
  });

  it("is empty for no metadata", () => {
    expect(describeMetadata({ kind: "none" })).toBe("");
  });
});

describe("CacheSnapshotSchema", () => {
  it("rejects an unknown version", () => {
    const result = CacheSnapshotSchema.safeParse({ version: "0.9", scan_time: 1, assets: [] });
    expect(result.success).toBe(false);
  });

  it("accepts the minimal on-disk entry shape", () => {
    const result = CacheSnapshotSchema.safeParse({
      version: "1.0",
      scan_time: 1700000000,
      assets: [
        {
          path: "Models/house.obj",
          name: "house",
          type: "Model",
          category: "Buildings",
          file_size: 120,
          last_modified: 1700000000,
          is_valid: true,
          issues: [],
          warnings: [],
        },
      ],
    });
    expect(result.success).toBe(true);
  });
});
