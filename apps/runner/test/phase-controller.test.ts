import { describe, it, expect, vi } from "vitest";
import { ResultAnalyzer } from "../src/analysis/composer.js";
import { ALL_ACCEPTABLE } from "../src/analysis/recommendations.js";
import type {
  ReportStore,
  TestCaseGenerator,
  TestCaseRanker,
  TestExecutor,
} from "../src/campaign/collaborators.js";
import { PhaseController, type PhaseControllerDeps, createRunId } from "../src/campaign/phase-controller.js";
import { RunRegistry } from "../src/campaign/run-registry.js";
import type { TestCaseDescriptor, TestExecutionRecord } from "../src/campaign/test-types.js";
import { ExecutionError, GenerationError, RankingError } from "../src/errors.js";
import { HeuristicRanker } from "../src/planner/ranker.js";
import { PlaywrightExecutor } from "../src/browser/executor.js";
import type { Browser } from "playwright-core";
import { makeCase, makeRecord, recordingSink } from "./fixtures.js";

const defaults = {
  targetUrl: "https://app.test/",
  candidateCount: 10,
  executeCount: 10,
  categories: ["basic_flow"],
};

const fixedClock = () => new Date("2026-03-01T12:00:00.000Z");

function cases(count: number): TestCaseDescriptor[] {
  return Array.from({ length: count }, (_, i) => makeCase(`TC_${String(i + 1).padStart(3, "0")}`));
}

function generatorOf(list: TestCaseDescriptor[]): TestCaseGenerator {
  return { generate: vi.fn(async () => list) };
}

/** Passes every case except the last, which fails with a page error. */
function lastFails(): TestExecutor {
  return {
    execute: vi.fn(async (selected: readonly TestCaseDescriptor[]) =>
      selected.map((c, i): TestExecutionRecord =>
        i === selected.length - 1
          ? makeRecord(c.id, {
              status: "failed",
              failureReason: "Timeout waiting for selector",
              errors: [{ type: "page_error", message: "TypeError: x is undefined", timestamp: "t" }],
            })
          : makeRecord(c.id),
      ),
    ),
  };
}

function controller(overrides: Partial<PhaseControllerDeps> = {}) {
  const sink = recordingSink();
  const deps: PhaseControllerDeps = {
    generator: generatorOf(cases(10)),
    ranker: new HeuristicRanker(),
    executor: lastFails(),
    analyzer: new ResultAnalyzer({ now: fixedClock }),
    sink,
    clock: fixedClock,
    ...overrides,
  };
  return { controller: new PhaseController(deps, defaults), sink, deps };
}

function progressLog() {
  const calls: [string, number][] = [];
  return {
    calls,
    observer: {
      onProgress(stage: string, percent: number) {
        calls.push([stage, percent]);
      },
    },
  };
}

describe("PhaseController happy path", () => {
  it("runs every phase and derives the verdict from the execution success rate", async () => {
    const { controller: c } = controller();
    const report = await c.run({ runId: "run-1" });

    expect(report.status).toBe("completed");
    expect(report.error).toBeUndefined();
    expect(report.finalVerdict).toBe("EXCELLENT");
    expect(report.phases.execution?.payload.statistics).toEqual({
      totalExecuted: 10,
      passed: 9,
      failed: 1,
      errors: 0,
      successRate: 0.9,
    });
    expect(report.phases.analysis?.payload.report?.triageNotes.high).toEqual([
      "TC_010: Page errors detected - investigate immediately",
    ]);
  });

  it("emits progress in phase order", async () => {
    const { controller: c } = controller();
    const { calls, observer } = progressLog();
    await c.run({ runId: "run-1", observer });

    expect(calls).toEqual([
      ["Planning", 10],
      ["Ranking", 30],
      ["Execution", 50],
      ["Analysis", 80],
      ["Reporting", 95],
      ["Complete", 100],
    ]);
  });

  it("builds the final report from the phase results", async () => {
    const { controller: c } = controller();
    const report = await c.run({ runId: "run-1" });
    const final = report.finalReport;

    expect(final?.verdictReason).toBe("Very high success rate with minimal issues");
    expect(final?.executiveSummary.testCasesGenerated).toBe(10);
    expect(final?.executiveSummary.testCasesExecuted).toBe(10);
    expect(final?.executiveSummary.overallSuccessRate).toBe(0.9);
    expect(final?.keyFindings).toEqual([
      "Successfully generated 10 test cases",
      "Test execution: 9/10 tests passed",
      "Success rate: 90.0%",
      "Average execution time: 5.0s",
    ]);
    expect(final?.recommendations).toEqual([ALL_ACCEPTABLE]);
    expect(final?.nextSteps).toEqual([
      "Integrate into CI/CD pipeline",
      "Expand test coverage",
      "Monitor test performance over time",
      ALL_ACCEPTABLE,
    ]);
    expect(final?.reproducibilityStats).toEqual({
      workflowReproducible: true,
      testArtifactsCaptured: 10,
      crossValidationPerformed: true,
    });
    expect(final?.reportMetadata.collaborators).toContain("HeuristicRanker");
    expect(final?.reportMetadata.collaborators).toContain("ResultAnalyzer");
  });

  it("returns a frozen report", async () => {
    const { controller: c } = controller();
    expect(Object.isFrozen(await c.run())).toBe(true);
  });

  it("falls back to configured defaults and a timestamped run id", async () => {
    const { controller: c, deps } = controller();
    const report = await c.run();

    expect(report.testRunId).toBe(createRunId(fixedClock()));
    expect(report.config).toEqual({ ...defaults });
    expect(deps.generator.generate).toHaveBeenCalledWith({
      targetUrl: "https://app.test/",
      candidateCount: 10,
      categories: ["basic_flow"],
    });
  });
});

describe("PhaseController fallbacks", () => {
  it("selects the first candidates in order when ranking fails", async () => {
    const ranker: TestCaseRanker = {
      rank: vi.fn(async () => {
        throw new RankingError("scoring service unavailable");
      }),
    };
    const executor = lastFails();
    const { controller: c, sink } = controller({ generator: generatorOf(cases(8)), ranker, executor });
    const report = await c.run({ runId: "run-2", executeCount: 5 });

    const ranking = report.phases.ranking;
    expect(ranking?.status).toBe("failed");
    expect(ranking?.status === "failed" ? ranking.error : undefined).toBe("scoring service unavailable");
    expect(ranking?.payload.selected.map((t) => t.id)).toEqual(["TC_001", "TC_002", "TC_003", "TC_004", "TC_005"]);
    expect(ranking?.payload.rejected).toEqual([]);
    expect(executor.execute).toHaveBeenCalledTimes(1);
    expect(report.status).toBe("completed");
    expect(report.finalReport?.reproducibilityStats.workflowReproducible).toBe(false);
    expect(sink.lines).toContainEqual({
      level: "warn",
      message: "Ranking phase failed: scoring service unavailable. Continuing with fallback.",
    });
  });

  it("continues with no test cases when planning fails", async () => {
    const generator: TestCaseGenerator = {
      generate: vi.fn(async () => {
        throw new GenerationError("model quota exhausted");
      }),
    };
    const executor: TestExecutor = { execute: vi.fn(async () => []) };
    const { controller: c } = controller({ generator, executor });
    const report = await c.run({ runId: "run-3" });

    expect(report.phases.planning?.status).toBe("failed");
    expect(report.phases.planning?.payload.testCasesGenerated).toBe(0);
    expect(executor.execute).toHaveBeenCalledWith([], "run-3");
    expect(report.status).toBe("completed");
  });

  it("reports POOR with empty statistics when execution fails", async () => {
    const executor: TestExecutor = {
      execute: vi.fn(async () => {
        throw new ExecutionError("Browser launch failed: no chromium");
      }),
    };
    const { controller: c } = controller({ executor });
    const report = await c.run({ runId: "run-4" });

    expect(report.phases.execution?.status).toBe("failed");
    expect(report.phases.execution?.payload.statistics.totalExecuted).toBe(0);
    expect(report.phases.analysis?.status).toBe("success");
    expect(report.finalVerdict).toBe("POOR");
    expect(report.status).toBe("completed");

    const analysis = report.phases.analysis?.payload.report;
    expect(analysis?.summary).toEqual({
      total: 0,
      passed: 0,
      failed: 0,
      errors: 0,
      successRate: 0,
      failureRate: 0,
      errorRate: 0,
      executionTimes: { min: 0, max: 0, average: 0, total: 0 },
    });
    expect(analysis?.validationResults.overallStatus).toBe("pass");
    expect(analysis?.validationResults.crossValidationScore).toBe(1);
  });

  it("falls back when a collaborator throws a plain error", async () => {
    const executor: TestExecutor = {
      execute: vi.fn(async () => {
        throw new TypeError("Cannot read properties of undefined");
      }),
    };
    const { controller: c, sink } = controller({ executor });
    const { calls, observer } = progressLog();
    const report = await c.run({ runId: "run-6", observer });

    const execution = report.phases.execution;
    expect(execution?.status).toBe("failed");
    expect(execution?.status === "failed" ? execution.error : undefined).toBe("Cannot read properties of undefined");
    expect(execution?.payload.records).toEqual([]);
    expect(report.phases.analysis?.status).toBe("success");
    expect(report.status).toBe("completed");
    expect(report.finalVerdict).toBe("POOR");
    expect(calls.at(-1)).toEqual(["Complete", 100]);
    expect(sink.lines).toContainEqual({
      level: "warn",
      message: "Execution phase failed: Cannot read properties of undefined. Continuing with fallback.",
    });
  });

  it("falls back when the browser context cannot be opened", async () => {
    const browser = {
      newContext: vi.fn(async () => {
        throw new Error("Target page, context or browser has been closed");
      }),
      close: vi.fn(async () => {}),
    };
    const executor = new PlaywrightExecutor({
      headless: true,
      stepTimeoutMs: 1000,
      viewport: { width: 1280, height: 720 },
      recordVideo: false,
      artifactsDir: "unused",
      launch: async () => browser as unknown as Browser,
    });
    const { controller: c } = controller({ executor });
    const report = await c.run({ runId: "run-6b" });

    const execution = report.phases.execution;
    expect(execution?.status === "failed" ? execution.error : undefined).toBe(
      "Target page, context or browser has been closed",
    );
    expect(browser.close).toHaveBeenCalledTimes(1);
    expect(Object.keys(report.phases)).toEqual(["planning", "ranking", "execution", "analysis"]);
    expect(report.status).toBe("completed");
    expect(report.finalVerdict).toBe("POOR");
  });

  it("fills in missing fields of loosely shaped execution records", async () => {
    const loose: TestExecutionRecord[] = JSON.parse('[{ "testId": "TC_001", "status": "passed" }]');
    const executor: TestExecutor = { execute: vi.fn(async () => loose) };
    const { controller: c } = controller({ executor });
    const report = await c.run({ runId: "run-6c" });

    expect(report.phases.execution?.status).toBe("success");
    const [record] = report.phases.execution?.payload.records ?? [];
    expect(record).toMatchObject({
      testId: "TC_001",
      status: "passed",
      executionTimeSeconds: 0,
      steps: [],
      errors: [],
      screenshots: [],
      artifacts: [],
      consoleLogs: [],
    });
    expect(report.phases.analysis?.status).toBe("success");
    expect(report.phases.analysis?.payload.report?.summary.passed).toBe(1);
    expect(report.phases.analysis?.payload.report?.summary.executionTimes.average).toBe(0);
    expect(report.finalVerdict).toBe("EXCELLENT");
  });

  it("keeps going with a null analysis when the analyzer fails", async () => {
    const store: ReportStore = {
      saveAnalysis: vi.fn(async () => {
        throw new Error("read-only file system");
      }),
      saveFinalReport: vi.fn(async () => "reports/run-5_final_report.json"),
    };
    const analyzer = new ResultAnalyzer({ store });
    const { controller: c } = controller({ analyzer });
    const report = await c.run({ runId: "run-5" });

    expect(report.phases.analysis?.status).toBe("failed");
    expect(report.phases.analysis?.payload.report).toBeNull();
    expect(report.finalReport?.recommendations).toEqual([]);
    expect(report.finalReport?.reproducibilityStats.crossValidationPerformed).toBe(false);
    expect(report.finalVerdict).toBe("EXCELLENT");
  });
});

describe("PhaseController fatal failures", () => {
  it("refuses a run id that is still running and leaves that run untouched", async () => {
    const registry = new RunRegistry();
    registry.register("dup");
    registry.progress("dup", "Execution", 50, "Executing selected test cases");
    const store: ReportStore = {
      saveAnalysis: vi.fn(async () => "unused"),
      saveFinalReport: vi.fn(async () => "unused"),
    };
    const { controller: c } = controller({ registry, store });
    const report = await c.run({ runId: "dup" });

    expect(report.status).toBe("failed");
    expect(report.error).toBe("Run dup is already in progress");
    expect(report.phases).toEqual({});
    expect(store.saveFinalReport).not.toHaveBeenCalled();
    expect(registry.get("dup")).toMatchObject({
      status: "running",
      progress: 50,
      message: "Execution: Executing selected test cases",
    });
  });
});

describe("PhaseController side channels", () => {
  it("logs observer failures and completes the run", async () => {
    const { controller: c, sink } = controller();
    const report = await c.run({
      runId: "run-7",
      observer: {
        onProgress() {
          throw new Error("socket closed");
        },
      },
    });

    expect(report.status).toBe("completed");
    const warnings = sink.lines.filter((l) => l.message === "Progress observer failed: socket closed");
    expect(warnings).toHaveLength(6);
  });

  it("logs rejected async observers too", async () => {
    const { controller: c, sink } = controller();
    await c.run({
      runId: "run-8",
      observer: {
        async onProgress() {
          throw new Error("client gone");
        },
      },
    });

    expect(sink.lines.filter((l) => l.message === "Progress observer failed: client gone")).toHaveLength(6);
  });

  it("saves the final report and records its location", async () => {
    const store: ReportStore = {
      saveAnalysis: vi.fn(async () => "unused"),
      saveFinalReport: vi.fn(async () => "data/reports/run-9_final_report.json"),
    };
    const { controller: c } = controller({ store });
    const report = await c.run({ runId: "run-9" });

    expect(store.saveFinalReport).toHaveBeenCalledTimes(1);
    expect(report.reportsGenerated).toEqual(["data/reports/run-9_final_report.json"]);
  });

  it("does not fail the run when the final report cannot be saved", async () => {
    const store: ReportStore = {
      saveAnalysis: vi.fn(async () => "unused"),
      saveFinalReport: vi.fn(async () => {
        throw new Error("disk full");
      }),
    };
    const { controller: c, sink } = controller({ store });
    const report = await c.run({ runId: "run-10" });

    expect(report.status).toBe("completed");
    expect(report.reportsGenerated).toEqual([]);
    expect(sink.lines).toContainEqual({ level: "warn", message: "Could not save final report: disk full" });
  });

  it("publishes status to the registry", async () => {
    const registry = new RunRegistry();
    const { controller: c } = controller({ registry });
    await c.run({ runId: "run-11" });

    expect(registry.get("run-11")).toMatchObject({
      status: "completed",
      progress: 100,
      verdict: "EXCELLENT",
      message: "Run completed with verdict EXCELLENT (90.0% passed)",
    });
  });
});

describe("createRunId", () => {
  it("formats local time as test_YYYYMMDD_HHMMSS", () => {
    expect(createRunId(new Date(2026, 2, 1, 9, 5, 7))).toBe("test_20260301_090507");
  });
});
