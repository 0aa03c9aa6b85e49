import { TestExecutionRecord } from "../campaign/test-types.js";
import { AggregateSummary, ExecutionTimeDistribution } from "./types.js";

/**
 * Counts and rates over a frozen batch. Records still marked `running` are
 * counted with `errors` so the three counts always add up to `total`.
 */
export function aggregateResults(records: readonly TestExecutionRecord[]): AggregateSummary {
  const total = records.length;
  const passed = records.filter((r) => r.status === "passed").length;
  const failed = records.filter((r) => r.status === "failed").length;
  const errors = total - passed - failed;

  return {
    total,
    passed,
    failed,
    errors,
    successRate: ratio(passed, total),
    failureRate: ratio(failed, total),
    errorRate: ratio(errors, total),
    executionTimes: distribution(
      records.map(executionTime).filter((t) => t > 0),
    ),
  };
}

/** Execution time in seconds, 0 when absent or not a number. */
export function executionTime(record: TestExecutionRecord): number {
  const t = record.executionTimeSeconds;
  return Number.isFinite(t) ? t : 0;
}

export function ratio(part: number, whole: number): number {
  return whole > 0 ? part / whole : 0;
}

function distribution(times: number[]): ExecutionTimeDistribution {
  if (times.length === 0) {
    return { min: 0, max: 0, average: 0, total: 0 };
  }
  const total = times.reduce((sum, t) => sum + t, 0);
  return {
    min: Math.min(...times),
    max: Math.max(...times),
    average: total / times.length,
    total,
  };
}
