import type { Verdict } from "@qa-campaign/shared";
import { formatPercent } from "../analysis/recommendations.js";
import type { OutputSink } from "../output-sink.js";
import type { GenerationRequirements } from "./test-types.js";
import type { PhaseName, PhaseResult, PhaseResults } from "./phase-result.js";

export const WORKFLOW_VERSION = "1.0.0";

export interface RunOptions extends GenerationRequirements {
  executeCount: number;
}

export interface FinalReport {
  overallVerdict: Verdict;
  verdictReason: string;
  executiveSummary: {
    testCasesGenerated: number;
    testCasesExecuted: number;
    overallSuccessRate: number;
    totalWorkflowTime: number;
  };
  keyFindings: string[];
  recommendations: string[];
  reproducibilityStats: {
    workflowReproducible: boolean;
    testArtifactsCaptured: number;
    crossValidationPerformed: boolean;
  };
  nextSteps: string[];
  reportMetadata: {
    generatedAt: string;
    workflowVersion: string;
    collaborators: string[];
  };
}

export interface WorkflowReport {
  testRunId: string;
  workflowStart: string;
  workflowEnd: string;
  config: RunOptions;
  phases: PhaseResults;
  status: "completed" | "failed";
  finalVerdict: Verdict | null;
  error?: string;
  finalReport?: FinalReport;
  artifactsLocation: string;
  reportsGenerated: string[];
}

const VERDICT_REASONS: Record<Verdict, string> = {
  EXCELLENT: "Very high success rate with minimal issues",
  GOOD: "Good success rate with some minor issues",
  FAIR: "Moderate success rate with several issues",
  POOR: "Low success rate indicating significant problems",
};

const NEXT_STEPS: Record<Verdict, string[]> = {
  POOR: [
    "Investigate failing tests immediately",
    "Review test environment setup",
    "Consider reducing test scope until issues are resolved",
  ],
  FAIR: [
    "Address identified issues in failing tests",
    "Optimize slow-running tests",
    "Expand test coverage gradually",
  ],
  GOOD: [
    "Integrate into CI/CD pipeline",
    "Expand test coverage",
    "Monitor test performance over time",
  ],
  EXCELLENT: [
    "Integrate into CI/CD pipeline",
    "Expand test coverage",
    "Monitor test performance over time",
  ],
};

const PHASE_ORDER: PhaseName[] = ["planning", "ranking", "execution", "analysis"];

export function recordedPhases(phases: PhaseResults): PhaseResult<unknown>[] {
  const recorded: PhaseResult<unknown>[] = [];
  for (const name of PHASE_ORDER) {
    const phase = phases[name];
    if (phase) recorded.push(phase);
  }
  return recorded;
}

export function verdictFor(successRate: number): Verdict {
  if (successRate >= 0.9) return "EXCELLENT";
  if (successRate >= 0.8) return "GOOD";
  if (successRate >= 0.6) return "FAIR";
  return "POOR";
}

/** Success rate of the execution phase's records, 0 when nothing ran. */
export function executionSuccessRate(phases: PhaseResults): number {
  return phases.execution?.payload.statistics.successRate ?? 0;
}

export function buildFinalReport(
  phases: PhaseResults,
  collaborators: string[],
  now = new Date(),
): FinalReport {
  const successRate = executionSuccessRate(phases);
  const verdict = verdictFor(successRate);
  const recommendations = [...(phases.analysis?.payload.report?.recommendations ?? [])];
  const recorded = recordedPhases(phases);

  return {
    overallVerdict: verdict,
    verdictReason: VERDICT_REASONS[verdict],
    executiveSummary: {
      testCasesGenerated: phases.planning?.payload.testCasesGenerated ?? 0,
      testCasesExecuted: phases.execution?.payload.statistics.totalExecuted ?? 0,
      overallSuccessRate: successRate,
      totalWorkflowTime: recorded.reduce((sum, p) => sum + p.durationSeconds, 0),
    },
    keyFindings: extractKeyFindings(phases),
    recommendations,
    reproducibilityStats: {
      workflowReproducible: recorded.every((p) => p.status === "success"),
      testArtifactsCaptured: countArtifacts(phases),
      crossValidationPerformed: Boolean(phases.analysis?.payload.report),
    },
    nextSteps: nextSteps(verdict, recommendations),
    reportMetadata: {
      generatedAt: now.toISOString(),
      workflowVersion: WORKFLOW_VERSION,
      collaborators,
    },
  };
}

export function extractKeyFindings(phases: PhaseResults): string[] {
  const findings: string[] = [];

  if (phases.planning?.status === "success") {
    findings.push(`Successfully generated ${phases.planning.payload.testCasesGenerated} test cases`);
  }

  if (phases.execution) {
    const stats = phases.execution.payload.statistics;
    findings.push(`Test execution: ${stats.passed}/${stats.totalExecuted} tests passed`);
  }

  const analysis = phases.analysis?.payload.report;
  if (analysis) {
    findings.push(`Success rate: ${formatPercent(analysis.summary.successRate)}`);
    findings.push(`Average execution time: ${analysis.summary.executionTimes.average.toFixed(1)}s`);
  }

  return findings;
}

function countArtifacts(phases: PhaseResults): number {
  const records = phases.execution?.payload.records ?? [];
  return records.reduce((sum, r) => sum + r.artifacts.length + r.screenshots.length, 0);
}

/** Verdict template first, then up to three recommendations not already listed. */
export function nextSteps(verdict: Verdict, recommendations: readonly string[]): string[] {
  const steps = [...NEXT_STEPS[verdict]];
  for (const rec of recommendations.slice(0, 3)) {
    if (!steps.includes(rec)) steps.push(rec);
  }
  return steps;
}

export function printWorkflowSummary(report: WorkflowReport, sink?: OutputSink): void {
  const log = (msg: string) => sink ? sink.log(msg) : console.log(msg);
  sink?.separator();

  log(`\n  Run: ${report.testRunId}`);
  log(`  Target: ${report.config.targetUrl}`);
  log(`  Started: ${report.workflowStart}\n`);

  for (const name of PHASE_ORDER) {
    const phase = report.phases[name];
    if (!phase) {
      log(`  ${name.padEnd(10)} SKIP`);
      continue;
    }
    const tag = phase.status === "success" ? "OK  " : "FAIL";
    log(`  ${name.padEnd(10)} ${tag} ${phase.durationSeconds.toFixed(1)}s`);
    if (phase.status === "failed") {
      log(`             Error: ${phase.error} (fallback applied)`);
    }
  }

  if (report.status === "failed") {
    log(`\n  STATUS: FAILED`);
    log(`  Error: ${report.error ?? "unknown"}`);
    return;
  }

  const stats = report.phases.execution?.payload.statistics;
  log(`\n  VERDICT: ${report.finalVerdict ?? "N/A"}`);
  if (stats) {
    log(`  ${stats.passed} passed  ${stats.failed} failed  ${stats.errors} errors  (${formatPercent(stats.successRate)})`);
  }

  const recommendations = report.finalReport?.recommendations ?? [];
  if (recommendations.length > 0) {
    log(`\n  Recommendations:`);
    for (const rec of recommendations) log(`    - ${rec}`);
  }
}
