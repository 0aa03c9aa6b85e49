import { AnalysisThresholds } from "../config/types.js";
import { AggregateSummary } from "./types.js";

const MIN_SUITE_SIZE = 10;

export const ALL_ACCEPTABLE = "All metrics within acceptable thresholds. Test suite performing well.";

export function formatPercent(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}

/**
 * Rules run in a fixed order and read only the aggregate summary, so equal
 * summaries always yield the same list.
 */
export function generateRecommendations(
  summary: AggregateSummary,
  thresholds: Pick<AnalysisThresholds, "minSuccessRate" | "maxExecutionTime" | "maxErrorRate">,
): string[] {
  const recommendations: string[] = [];

  if (summary.successRate < thresholds.minSuccessRate) {
    recommendations.push(
      `Success rate (${formatPercent(summary.successRate)}) is below threshold. Review failing tests.`,
    );
  }

  const avg = summary.executionTimes.average;
  if (avg > thresholds.maxExecutionTime) {
    recommendations.push(
      `Average execution time (${avg.toFixed(1)}s) exceeds threshold. Optimize slow tests.`,
    );
  }

  if (summary.errorRate > thresholds.maxErrorRate) {
    recommendations.push(
      `Error rate (${formatPercent(summary.errorRate)}) is too high. Investigate common failure patterns.`,
    );
  }

  if (summary.total < MIN_SUITE_SIZE) {
    recommendations.push("Consider expanding test coverage with more test cases.");
  }

  if (recommendations.length === 0) {
    recommendations.push(ALL_ACCEPTABLE);
  }

  return recommendations;
}
