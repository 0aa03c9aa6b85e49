import { AnalysisThresholds } from "../config/types.js";
import { TestExecutionRecord } from "../campaign/test-types.js";
import { executionTime } from "./aggregator.js";
import { TriageNotes, TriageTier } from "./types.js";

export function triageTier(
  record: TestExecutionRecord,
  thresholds: Pick<AnalysisThresholds, "maxExecutionTime">,
): { tier: TriageTier; note: string } | null {
  switch (record.status) {
    case "error":
      return { tier: "high", note: "Test execution error - fix test infrastructure" };
    case "failed":
      if (record.errors.some((e) => e.type === "page_error")) {
        return { tier: "high", note: "Page errors detected - investigate immediately" };
      }
      if (executionTime(record) > thresholds.maxExecutionTime) {
        return { tier: "medium", note: "Performance issues - timeout or slow execution" };
      }
      return { tier: "low", note: "General test failure - review test logic" };
    case "passed":
    case "running":
      return null;
  }
}

/** Buckets failed and errored records into priority tiers, in batch order. */
export function classifyFailures(
  records: readonly TestExecutionRecord[],
  thresholds: Pick<AnalysisThresholds, "maxExecutionTime">,
): TriageNotes {
  const notes: TriageNotes = { high: [], medium: [], low: [] };
  for (const record of records) {
    const result = triageTier(record, thresholds);
    if (result) notes[result.tier].push(`${record.testId}: ${result.note}`);
  }
  return notes;
}
