import { AnalysisThresholds } from "../config/types.js";
import { TestExecutionRecord } from "../campaign/test-types.js";
import { executionTime, ratio } from "./aggregator.js";
import {
  ArtifactAnalysis,
  CommonError,
  ErrorAnalysis,
  FailurePattern,
  PerformanceAnalysis,
  ReliabilityAnalysis,
  SlowTest,
  StepMetric,
} from "./types.js";

// ── Performance ───────────────────────────────────────────────────

export function analyzePerformance(
  records: readonly TestExecutionRecord[],
  thresholds: Pick<AnalysisThresholds, "maxExecutionTime">,
): PerformanceAnalysis {
  const limit = thresholds.maxExecutionTime;
  const slowTests: SlowTest[] = [];
  const performanceMetrics: StepMetric[] = [];

  for (const record of records) {
    const time = executionTime(record);
    if (time > limit) {
      slowTests.push({
        testId: record.testId,
        executionTime: time,
        thresholdExceeded: time - limit,
      });
    }

    for (const step of record.steps) {
      if (!step.performanceMetrics) continue;
      for (const [name, value] of Object.entries(step.performanceMetrics)) {
        performanceMetrics.push({ testId: record.testId, stepIndex: step.stepIndex, name, value });
      }
    }
  }

  const recommendations = [
    slowTests.length > 0 ? "Optimize slow test cases" : "Performance within acceptable limits",
  ];
  if (records.length > 5) {
    recommendations.push("Consider parallel execution for faster results");
  }

  return {
    summary: {
      totalTestsAnalyzed: records.length,
      slowTestsCount: slowTests.length,
      performanceThreshold: limit,
    },
    slowTests,
    performanceMetrics,
    recommendations,
  };
}

// ── Errors ────────────────────────────────────────────────────────

export function analyzeErrors(
  records: readonly TestExecutionRecord[],
  thresholds: Pick<AnalysisThresholds, "maxErrorRate">,
): ErrorAnalysis {
  const errorSummary: Record<string, number> = {};
  const failurePatterns: FailurePattern[] = [];

  const tally = (pattern: FailurePattern) => {
    errorSummary[pattern.errorType] = (errorSummary[pattern.errorType] ?? 0) + 1;
    failurePatterns.push(pattern);
  };

  for (const record of records) {
    for (const error of record.errors) {
      tally({
        testId: record.testId,
        errorType: error.type || "unknown",
        message: error.message,
        timestamp: error.timestamp,
      });
    }

    if (record.status === "failed") {
      tally({
        testId: record.testId,
        errorType: "test_failure",
        message: record.failureReason ?? "Unknown failure",
        timestamp: record.endTime,
      });
    }
  }

  const currentRate = ratio(failurePatterns.length, records.length);

  return {
    errorSummary,
    failurePatterns,
    commonErrors: commonErrors(failurePatterns),
    errorRateAnalysis: {
      withinThreshold: currentRate <= thresholds.maxErrorRate,
      currentRate,
      threshold: thresholds.maxErrorRate,
    },
  };
}

/** Error types seen more than once, most frequent first. */
function commonErrors(patterns: FailurePattern[]): CommonError[] {
  const counts = new Map<string, number>();
  for (const p of patterns) {
    counts.set(p.errorType, (counts.get(p.errorType) ?? 0) + 1);
  }

  return [...counts.entries()]
    .filter(([, count]) => count > 1)
    .map(([errorType, count]) => ({ errorType, count, frequency: count / patterns.length }))
    .sort((a, b) => b.count - a.count);
}

// ── Artifacts ─────────────────────────────────────────────────────

const QUALITY_SIGNALS = 5;

/**
 * Share of the five artifact signals present on a record: screenshots,
 * console logs, generic artifacts, step artifacts, step performance metrics.
 */
export function artifactQualityScore(record: TestExecutionRecord): number {
  const signals = [
    record.screenshots.length > 0,
    record.consoleLogs.length > 0,
    record.artifacts.length > 0,
    record.steps.some((s) => s.artifacts.length > 0),
    record.steps.some((s) => s.performanceMetrics !== undefined),
  ];
  return signals.filter(Boolean).length / QUALITY_SIGNALS;
}

export function analyzeArtifacts(records: readonly TestExecutionRecord[]): ArtifactAnalysis {
  let screenshots = 0;
  let consoleLogs = 0;
  let artifacts = 0;

  const artifactQuality = records.map((record) => {
    screenshots += record.screenshots.length;
    consoleLogs += record.consoleLogs.length;
    artifacts += record.artifacts.length;
    return {
      testId: record.testId,
      qualityScore: artifactQualityScore(record),
      artifactCount: record.artifacts.length + record.screenshots.length,
    };
  });

  const withAny = records.filter((r) => r.artifacts.length > 0 || r.screenshots.length > 0).length;

  return {
    artifactSummary: { screenshots, consoleLogs, artifacts },
    artifactQuality,
    coverageAnalysis: {
      testsWithScreenshots: records.filter((r) => r.screenshots.length > 0).length,
      testsWithConsoleLogs: records.filter((r) => r.consoleLogs.length > 0).length,
      overallCoverage: ratio(withAny, records.length),
    },
  };
}

// ── Reliability ───────────────────────────────────────────────────

export function analyzeReliability(records: readonly TestExecutionRecord[]): ReliabilityAnalysis {
  const byCategory = new Map<string, TestExecutionRecord[]>();
  for (const record of records) {
    const group = byCategory.get(record.category) ?? [];
    group.push(record);
    byCategory.set(record.category, group);
  }

  const categoryReliability: Record<string, number> = {};
  for (const [category, group] of byCategory) {
    categoryReliability[category] = ratio(group.filter((r) => r.status === "passed").length, group.length);
  }

  const scores = Object.values(categoryReliability);

  return {
    categoryReliability,
    overallReliability: ratio(scores.reduce((sum, s) => sum + s, 0), scores.length),
    flakyTests: findFlakyTests(records),
    repeatabilityAssessment: {
      consistentCategories: scores.filter((s) => s >= 0.9).length,
      inconsistentCategories: scores.filter((s) => s < 0.7).length,
    },
  };
}

/**
 * A passed test that still logged errors. There is no run history to compare
 * against, so this is the only flakiness signal available.
 */
export function findFlakyTests(records: readonly TestExecutionRecord[]): string[] {
  return records
    .filter((r) => r.status === "passed" && r.errors.length > 0)
    .map((r) => r.testId);
}
