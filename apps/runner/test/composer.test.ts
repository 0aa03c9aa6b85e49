import { describe, it, expect, vi } from "vitest";
import { ANALYSIS_VERSION, ResultAnalyzer } from "../src/analysis/composer.js";
import type { ReportStore } from "../src/campaign/collaborators.js";
import { AnalysisError } from "../src/errors.js";
import { makeRecord, recordingSink } from "./fixtures.js";

const now = () => new Date("2026-03-01T12:00:00.000Z");

const records = [
  makeRecord("TC_001"),
  makeRecord("TC_002", { status: "failed", failureReason: "Element not found" }),
  makeRecord("TC_003", { status: "error", screenshots: [] }),
];

function fakeStore(saveAnalysis: ReportStore["saveAnalysis"]): ReportStore {
  return { saveAnalysis, saveFinalReport: vi.fn(async () => "unused") };
}

describe("ResultAnalyzer.compose", () => {
  it("assembles every section with metadata", () => {
    const report = new ResultAnalyzer({ now }).compose(records, "test_20260301_120000");

    expect(report.testRunId).toBe("test_20260301_120000");
    expect(report.summary.total).toBe(3);
    expect(report.validationResults.checks).toHaveLength(3);
    expect(report.triageNotes.high).toEqual(["TC_003: Test execution error - fix test infrastructure"]);
    expect(report.triageNotes.low).toEqual(["TC_002: General test failure - review test logic"]);
    expect(report.metadata).toEqual({
      analyzedBy: "ResultAnalyzer",
      timestamp: "2026-03-01T12:00:00.000Z",
      version: ANALYSIS_VERSION,
    });
  });

  it("gives the same report for the same input", () => {
    const analyzer = new ResultAnalyzer({ now });
    expect(analyzer.compose(records, "run")).toEqual(analyzer.compose(records, "run"));
  });

  it("freezes the report and its nested sections", () => {
    const report = new ResultAnalyzer({ now }).compose(records, "run");
    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.summary)).toBe(true);
    expect(Object.isFrozen(report.detailedAnalysis.errors.failurePatterns)).toBe(true);
  });

  it("applies partial threshold overrides over the defaults", () => {
    const analyzer = new ResultAnalyzer({ thresholds: { maxExecutionTime: 2 } });
    expect(analyzer.thresholds).toEqual({
      maxExecutionTime: 2,
      minSuccessRate: 0.8,
      maxErrorRate: 0.2,
      performanceBudgetMs: 3000,
    });
    expect(analyzer.compose(records, "run").detailedAnalysis.performance.slowTests).toHaveLength(3);
  });
});

describe("ResultAnalyzer.analyze", () => {
  it("persists the report through the store", async () => {
    const saveAnalysis = vi.fn(async () => "data/reports/run_analysis.json");
    const sink = recordingSink();
    const report = await new ResultAnalyzer({ store: fakeStore(saveAnalysis), sink, now }).analyze(records, "run");

    expect(saveAnalysis).toHaveBeenCalledWith(report);
    expect(sink.lines).toContainEqual({ level: "info", message: "Analysis saved: data/reports/run_analysis.json" });
  });

  it("raises AnalysisError when the store fails", async () => {
    const store = fakeStore(async () => {
      throw new Error("disk full");
    });
    await expect(new ResultAnalyzer({ store }).analyze(records, "run")).rejects.toThrow(AnalysisError);
    await expect(new ResultAnalyzer({ store }).analyze(records, "run")).rejects.toThrow(
      "Failed to persist analysis report: disk full",
    );
  });
});
