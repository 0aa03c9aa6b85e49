import { TestExecutionRecord } from "../campaign/test-types.js";
import { executionTime } from "./aggregator.js";
import {
  ArtifactCompletenessCheck,
  ErrorPatternCheck,
  ExecutionTimeCheck,
  ValidationResults,
} from "./types.js";

const MAX_OUTLIER_SHARE = 0.1;
const MAX_DISTINCT_ERROR_TYPES = 3;

/**
 * Flags records whose time deviates from the batch mean by more than twice
 * the mean. With a mean close to zero almost any deviation qualifies.
 */
export function checkExecutionTimeConsistency(records: readonly TestExecutionRecord[]): ExecutionTimeCheck {
  if (records.length === 0) {
    return {
      name: "execution_time_consistency",
      status: "pass",
      details: "Found 0 execution time outliers",
      outliers: [],
    };
  }

  const times = records.map(executionTime);
  const mean = times.reduce((sum, t) => sum + t, 0) / times.length;
  const outliers = records
    .map((r, i) => ({ testId: r.testId, time: times[i] }))
    .filter((o) => Math.abs(o.time - mean) > 2 * mean);

  return {
    name: "execution_time_consistency",
    status: outliers.length <= records.length * MAX_OUTLIER_SHARE ? "pass" : "fail",
    details: `Found ${outliers.length} execution time outliers`,
    outliers,
  };
}

export function checkErrorPatterns(records: readonly TestExecutionRecord[]): ErrorPatternCheck {
  const errorPatterns: Record<string, number> = {};
  for (const record of records) {
    for (const error of record.errors) {
      const type = error.type || "unknown";
      errorPatterns[type] = (errorPatterns[type] ?? 0) + 1;
    }
  }

  const distinct = Object.keys(errorPatterns).length;
  return {
    name: "error_pattern_validation",
    status: distinct <= MAX_DISTINCT_ERROR_TYPES ? "pass" : "warning",
    details: `Found ${distinct} distinct error patterns`,
    errorPatterns,
  };
}

export function checkArtifactCompleteness(records: readonly TestExecutionRecord[]): ArtifactCompletenessCheck {
  const incompleteTests = records
    .filter((r) => r.screenshots.length === 0 && r.artifacts.length === 0)
    .map((r) => r.testId);

  return {
    name: "artifact_completeness",
    status: incompleteTests.length === 0 ? "pass" : "warning",
    details: `Found ${incompleteTests.length} tests with incomplete artifacts`,
    incompleteTests,
  };
}

export function validateResults(records: readonly TestExecutionRecord[]): ValidationResults {
  const checks: ValidationResults["checks"] = [
    checkExecutionTimeConsistency(records),
    checkErrorPatterns(records),
    checkArtifactCompleteness(records),
  ];
  const passed = checks.filter((c) => c.status === "pass").length;

  return {
    checks,
    overallStatus: passed === checks.length ? "pass" : "warning",
    crossValidationScore: passed / checks.length,
  };
}
