import type { AnalysisReport } from "../analysis/types.js";
import type { WorkflowReport } from "./workflow-report.js";
import {
  GenerationRequirements,
  RankingOutcome,
  TestCaseDescriptor,
  TestExecutionRecord,
} from "./test-types.js";

/** Produces candidate test cases. May throw `GenerationError`. */
export interface TestCaseGenerator {
  generate(requirements: GenerationRequirements): Promise<TestCaseDescriptor[]>;
}

/** Partitions candidates into selected and rejected. May throw `RankingError`. */
export interface TestCaseRanker {
  rank(candidates: readonly TestCaseDescriptor[], selectCount: number): Promise<RankingOutcome>;
}

/**
 * Runs the selected cases. Individual test failures come back as records with
 * status `failed` or `error`; only a failure of the whole run throws
 * `ExecutionError`.
 */
export interface TestExecutor {
  execute(cases: readonly TestCaseDescriptor[], runId: string): Promise<TestExecutionRecord[]>;
}

/** Turns a record batch into the analysis report. May throw `AnalysisError`. */
export interface ReportAnalyzer {
  analyze(records: readonly TestExecutionRecord[], runId: string): Promise<Readonly<AnalysisReport>>;
}

/** Fire-and-forget progress notification, one call per phase transition. */
export interface ProgressObserver {
  onProgress(stage: string, percent: number, message: string): void | Promise<void>;
}

/** Persists one document per run and report kind; returns its location. */
export interface ReportStore {
  saveAnalysis(report: Readonly<AnalysisReport>): Promise<string>;
  saveFinalReport(report: WorkflowReport): Promise<string>;
}
