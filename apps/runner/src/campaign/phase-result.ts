import type { AnalysisReport } from "../analysis/types.js";
import { ratio } from "../analysis/aggregator.js";
import {
  GenerationRequirements,
  TestCaseDescriptor,
  TestExecutionRecord,
} from "./test-types.js";

export type PhaseName = "planning" | "ranking" | "execution" | "analysis";

/**
 * Outcome of one phase. A failed phase still carries a payload: the fallback
 * the pipeline continues with.
 */
export type PhaseResult<T> =
  | { status: "success"; durationSeconds: number; payload: T }
  | { status: "failed"; durationSeconds: number; payload: T; error: string };

export interface PlanningPayload {
  testCases: TestCaseDescriptor[];
  testCasesGenerated: number;
  requirements: GenerationRequirements;
}

export interface RankingPayload {
  selected: TestCaseDescriptor[];
  rejected: TestCaseDescriptor[];
}

export interface ExecutionStatistics {
  totalExecuted: number;
  passed: number;
  failed: number;
  errors: number;
  successRate: number;
}

export interface ExecutionPayload {
  records: TestExecutionRecord[];
  statistics: ExecutionStatistics;
}

export interface AnalysisPayload {
  report: Readonly<AnalysisReport> | null;
}

export interface PhaseResults {
  planning?: PhaseResult<PlanningPayload>;
  ranking?: PhaseResult<RankingPayload>;
  execution?: PhaseResult<ExecutionPayload>;
  analysis?: PhaseResult<AnalysisPayload>;
}

export function succeeded<T>(payload: T, durationSeconds: number): PhaseResult<T> {
  return { status: "success", durationSeconds, payload };
}

export function failed<T>(fallback: T, error: string, durationSeconds: number): PhaseResult<T> {
  return { status: "failed", durationSeconds, payload: fallback, error };
}

// ── Fallbacks ─────────────────────────────────────────────────────

export function planningFallback(requirements: GenerationRequirements): PlanningPayload {
  return { testCases: [], testCasesGenerated: 0, requirements };
}

/** First N candidates in their original order, nothing rejected. */
export function rankingFallback(
  candidates: readonly TestCaseDescriptor[],
  selectCount: number,
): RankingPayload {
  return { selected: candidates.slice(0, Math.max(0, selectCount)), rejected: [] };
}

export function executionFallback(): ExecutionPayload {
  return { records: [], statistics: executionStatistics([]) };
}

export function analysisFallback(): AnalysisPayload {
  return { report: null };
}

export function executionStatistics(records: readonly TestExecutionRecord[]): ExecutionStatistics {
  const passed = records.filter((r) => r.status === "passed").length;
  const failedCount = records.filter((r) => r.status === "failed").length;
  return {
    totalExecuted: records.length,
    passed,
    failed: failedCount,
    errors: records.length - passed - failedCount,
    successRate: ratio(passed, records.length),
  };
}
