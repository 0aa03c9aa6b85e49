import { AnalysisThresholds } from "../config/types.js";
import { DEFAULT_THRESHOLDS } from "../config/index.js";
import { AnalysisError, errorMessage } from "../errors.js";
import type { OutputSink } from "../output-sink.js";
import type { ReportStore } from "../campaign/collaborators.js";
import { TestExecutionRecord } from "../campaign/test-types.js";
import { aggregateResults } from "./aggregator.js";
import {
  analyzeArtifacts,
  analyzeErrors,
  analyzePerformance,
  analyzeReliability,
} from "./analyzers.js";
import { validateResults } from "./validation.js";
import { classifyFailures } from "./triage.js";
import { generateRecommendations } from "./recommendations.js";
import { AnalysisReport, DetailedAnalysis } from "./types.js";

export const ANALYSIS_VERSION = "1.0.0";

export interface ResultAnalyzerOptions {
  thresholds?: Partial<AnalysisThresholds>;
  store?: ReportStore;
  sink?: OutputSink;
  now?: () => Date;
}

/** Freezes the report and every nested object and array in it. */
function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (typeof child === "object" && child !== null) deepFreeze(child);
  }
  return Object.freeze(value);
}

/**
 * Turns one batch of execution records into an immutable AnalysisReport and
 * hands it to the report store.
 */
export class ResultAnalyzer {
  readonly thresholds: AnalysisThresholds;
  private store?: ReportStore;
  private sink?: OutputSink;
  private now: () => Date;

  constructor(options: ResultAnalyzerOptions = {}) {
    this.thresholds = { ...DEFAULT_THRESHOLDS, ...options.thresholds };
    this.store = options.store;
    this.sink = options.sink;
    this.now = options.now ?? (() => new Date());
  }

  compose(records: readonly TestExecutionRecord[], testRunId: string): Readonly<AnalysisReport> {
    const summary = aggregateResults(records);

    // The four views share no state; any evaluation order gives the same report.
    const detailedAnalysis: DetailedAnalysis = {
      performance: analyzePerformance(records, this.thresholds),
      errors: analyzeErrors(records, this.thresholds),
      artifacts: analyzeArtifacts(records),
      reliability: analyzeReliability(records),
    };

    const report: AnalysisReport = {
      testRunId,
      summary,
      detailedAnalysis,
      validationResults: validateResults(records),
      recommendations: generateRecommendations(summary, this.thresholds),
      triageNotes: classifyFailures(records, this.thresholds),
      metadata: {
        analyzedBy: "ResultAnalyzer",
        timestamp: this.now().toISOString(),
        version: ANALYSIS_VERSION,
      },
    };

    return deepFreeze(report);
  }

  async analyze(records: readonly TestExecutionRecord[], testRunId: string): Promise<Readonly<AnalysisReport>> {
    this.sink?.info(`Analyzing ${records.length} test results`);
    const report = this.compose(records, testRunId);

    if (this.store) {
      try {
        const location = await this.store.saveAnalysis(report);
        this.sink?.info(`Analysis saved: ${location}`);
      } catch (err) {
        throw new AnalysisError(`Failed to persist analysis report: ${errorMessage(err)}`, { cause: err });
      }
    }

    return report;
  }
}
