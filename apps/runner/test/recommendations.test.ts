import { describe, it, expect } from "vitest";
import { aggregateResults } from "../src/analysis/aggregator.js";
import { ALL_ACCEPTABLE, formatPercent, generateRecommendations } from "../src/analysis/recommendations.js";
import { DEFAULT_THRESHOLDS } from "../src/config/index.js";
import type { TestExecutionRecord } from "../src/campaign/test-types.js";
import { makeRecord } from "./fixtures.js";

function batch(passed: number, failed: number, errors: number, seconds = 5) {
  const records: TestExecutionRecord[] = [];
  for (let i = 0; i < passed; i++) records.push(makeRecord(`P${i}`, { executionTimeSeconds: seconds }));
  for (let i = 0; i < failed; i++) records.push(makeRecord(`F${i}`, { status: "failed", executionTimeSeconds: seconds }));
  for (let i = 0; i < errors; i++) records.push(makeRecord(`E${i}`, { status: "error", executionTimeSeconds: seconds }));
  return aggregateResults(records);
}

describe("generateRecommendations", () => {
  it("reports all-clear for a healthy suite of ten or more", () => {
    expect(generateRecommendations(batch(10, 0, 0), DEFAULT_THRESHOLDS)).toEqual([ALL_ACCEPTABLE]);
  });

  it("fires every rule in fixed order", () => {
    expect(generateRecommendations(batch(1, 1, 2, 40), DEFAULT_THRESHOLDS)).toEqual([
      "Success rate (25.0%) is below threshold. Review failing tests.",
      "Average execution time (40.0s) exceeds threshold. Optimize slow tests.",
      "Error rate (50.0%) is too high. Investigate common failure patterns.",
      "Consider expanding test coverage with more test cases.",
    ]);
  });

  it("asks for more coverage on a small but healthy suite", () => {
    expect(generateRecommendations(batch(5, 0, 0), DEFAULT_THRESHOLDS)).toEqual([
      "Consider expanding test coverage with more test cases.",
    ]);
  });

  it("does not flag rates exactly at the thresholds", () => {
    expect(generateRecommendations(batch(8, 0, 2), DEFAULT_THRESHOLDS)).toEqual([ALL_ACCEPTABLE]);
  });
});

describe("formatPercent", () => {
  it("uses one decimal", () => {
    expect(formatPercent(0.9)).toBe("90.0%");
    expect(formatPercent(1 / 3)).toBe("33.3%");
  });
});
