import { GenerationError, RankingError, ExecutionError, errorMessage } from "../errors.js";
import { formatPercent } from "../analysis/recommendations.js";
import type { OutputSink } from "../output-sink.js";
import type {
  ProgressObserver,
  ReportAnalyzer,
  ReportStore,
  TestCaseGenerator,
  TestCaseRanker,
  TestExecutor,
} from "./collaborators.js";
import {
  AnalysisPayload,
  ExecutionPayload,
  PhaseName,
  PhaseResult,
  PlanningPayload,
  RankingPayload,
  analysisFallback,
  executionFallback,
  executionStatistics,
  failed,
  planningFallback,
  rankingFallback,
  succeeded,
} from "./phase-result.js";
import { RunContext } from "./run-context.js";
import type { RunRegistry } from "./run-registry.js";
import {
  GenerationRequirements,
  TestCaseDescriptor,
  TestExecutionRecord,
  normalizeRecord,
} from "./test-types.js";
import {
  RunOptions,
  WorkflowReport,
  buildFinalReport,
  executionSuccessRate,
} from "./workflow-report.js";

export interface PhaseControllerDeps {
  generator: TestCaseGenerator;
  ranker: TestCaseRanker;
  executor: TestExecutor;
  analyzer: ReportAnalyzer;
  store?: ReportStore;
  registry?: RunRegistry;
  sink?: OutputSink;
  clock?: () => Date;
}

export interface RunRequest extends Partial<RunOptions> {
  runId?: string;
  observer?: ProgressObserver;
}

const STAGES = {
  planning: { stage: "Planning", percent: 10, message: "Generating test cases" },
  ranking: { stage: "Ranking", percent: 30, message: "Ranking and selecting top test cases" },
  execution: { stage: "Execution", percent: 50, message: "Executing selected test cases" },
  analysis: { stage: "Analysis", percent: 80, message: "Analyzing results and performing validation" },
  reporting: { stage: "Reporting", percent: 95, message: "Generating final report" },
  complete: { stage: "Complete", percent: 100, message: "Workflow completed successfully" },
} as const;

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** `test_YYYYMMDD_HHMMSS` in local time. */
export function createRunId(date = new Date()): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `test_${day}_${time}`;
}

/**
 * Drives plan -> rank -> execute -> analyze -> report for one run at a time
 * per call. Each phase that fails is replaced by its fallback and the run
 * continues; only a failure of the controller itself ends the run early.
 */
export class PhaseController {
  private deps: PhaseControllerDeps;
  private defaults: RunOptions;
  private clock: () => Date;

  constructor(deps: PhaseControllerDeps, defaults: RunOptions) {
    this.deps = deps;
    this.defaults = defaults;
    this.clock = deps.clock ?? (() => new Date());
  }

  async run(request: RunRequest = {}): Promise<WorkflowReport> {
    const startedAt = this.clock();
    const options: RunOptions = {
      targetUrl: request.targetUrl ?? this.defaults.targetUrl,
      candidateCount: request.candidateCount ?? this.defaults.candidateCount,
      executeCount: request.executeCount ?? this.defaults.executeCount,
      categories: request.categories ?? this.defaults.categories,
    };
    const ctx = new RunContext(request.runId ?? createRunId(startedAt), startedAt);
    const sink = this.deps.sink;

    sink?.info(`Starting full workflow for test run: ${ctx.runId}`);

    const scope: RunScope = { ctx, observer: request.observer, tracked: false };
    let status: WorkflowReport["status"] = "failed";
    let error: string | undefined;
    let finalReport: WorkflowReport["finalReport"];

    try {
      this.deps.registry?.register(ctx.runId, startedAt);
      scope.tracked = true;

      const requirements: GenerationRequirements = {
        targetUrl: options.targetUrl,
        candidateCount: options.candidateCount,
        categories: options.categories,
      };

      this.enter(scope, "planning");
      const planning = await this.runPhase(
        "planning",
        () => this.plan(requirements),
        () => planningFallback(requirements),
      );
      ctx.phases.planning = planning;

      this.enter(scope, "ranking");
      const candidates = planning.payload.testCases;
      const ranking = await this.runPhase(
        "ranking",
        () => this.rank(candidates, options.executeCount),
        () => rankingFallback(candidates, options.executeCount),
      );
      ctx.phases.ranking = ranking;

      this.enter(scope, "execution");
      const execution = await this.runPhase(
        "execution",
        () => this.execute(ranking.payload.selected, ctx.runId),
        executionFallback,
      );
      ctx.phases.execution = execution;

      this.enter(scope, "analysis");
      const analysis = await this.runPhase(
        "analysis",
        () => this.analyze(execution.payload.records, ctx.runId),
        analysisFallback,
      );
      ctx.phases.analysis = analysis;

      this.enter(scope, "reporting");
      finalReport = buildFinalReport(ctx.phases, this.collaboratorNames(), this.clock());

      ctx.advance("completed");
      status = "completed";
      this.notify(scope, STAGES.complete);
    } catch (err) {
      error = errorMessage(err);
      sink?.error(`Workflow failed: ${error}`);
      if (!ctx.finished) ctx.advance("failed");
      this.notify(scope, { stage: "Failed", percent: ctx.progress, message: `Workflow failed: ${error}` });
    }

    const report: WorkflowReport = {
      testRunId: ctx.runId,
      workflowStart: startedAt.toISOString(),
      workflowEnd: this.clock().toISOString(),
      config: options,
      phases: ctx.phases,
      status,
      finalVerdict: finalReport?.overallVerdict ?? null,
      artifactsLocation: `artifacts/${ctx.runId}`,
      reportsGenerated: [],
    };
    if (error !== undefined) report.error = error;
    if (finalReport) report.finalReport = finalReport;

    // A refused run id belongs to a run still in flight; leave its files and status alone.
    if (scope.tracked) {
      await this.persist(report);
      this.deps.registry?.finish(ctx.runId, {
        status,
        message: status === "completed"
          ? `Run completed with verdict ${report.finalVerdict} (${formatPercent(executionSuccessRate(ctx.phases))} passed)`
          : `Run failed: ${error ?? "unknown error"}`,
        verdict: report.finalVerdict ?? undefined,
      });
    }

    return Object.freeze(report);
  }

  // ── Phases ──────────────────────────────────────────────────────

  private async plan(requirements: GenerationRequirements): Promise<PlanningPayload> {
    const testCases = await this.deps.generator.generate(requirements);
    if (!Array.isArray(testCases)) {
      throw new GenerationError("Generator did not return a list of test cases");
    }
    this.deps.sink?.info(`Planning phase completed: ${testCases.length} test cases generated`);
    return { testCases, testCasesGenerated: testCases.length, requirements };
  }

  private async rank(candidates: TestCaseDescriptor[], selectCount: number): Promise<RankingPayload> {
    const outcome = await this.deps.ranker.rank(candidates, selectCount);
    if (!Array.isArray(outcome?.selected) || !Array.isArray(outcome.rejected)) {
      throw new RankingError("Ranker did not return a selected/rejected partition");
    }
    this.deps.sink?.info(`Ranking phase completed: ${outcome.selected.length} cases selected`);
    return { selected: outcome.selected, rejected: outcome.rejected };
  }

  private async execute(cases: TestCaseDescriptor[], runId: string): Promise<ExecutionPayload> {
    const records = await this.deps.executor.execute(cases, runId);
    if (!Array.isArray(records)) {
      throw new ExecutionError("Executor did not return a list of execution records");
    }
    const frozen: TestExecutionRecord[] = records.map((r: unknown) => Object.freeze(normalizeRecord(r)));
    this.deps.sink?.info(`Execution phase completed: ${frozen.length} tests executed`);
    return { records: frozen, statistics: executionStatistics(frozen) };
  }

  private async analyze(records: TestExecutionRecord[], runId: string): Promise<AnalysisPayload> {
    const report = await this.deps.analyzer.analyze(records, runId);
    this.deps.sink?.info("Analysis phase completed");
    return { report };
  }

  /**
   * Runs one collaborator call. Whatever it throws becomes the phase's error
   * and the fallback takes its place.
   */
  private async runPhase<T>(
    name: PhaseName,
    work: () => Promise<T>,
    fallback: () => T,
  ): Promise<PhaseResult<T>> {
    const start = Date.now();
    const elapsed = () => (Date.now() - start) / 1000;
    try {
      const payload = await work();
      return succeeded(payload, elapsed());
    } catch (err) {
      const message = errorMessage(err);
      this.deps.sink?.warn(`${capitalize(name)} phase failed: ${message}. Continuing with fallback.`);
      return failed(fallback(), message, elapsed());
    }
  }

  // ── Progress and persistence ────────────────────────────────────

  private enter(scope: RunScope, state: PipelinePhase): void {
    scope.ctx.advance(state);
    this.notify(scope, STAGES[state]);
  }

  /** Advisory only: observer failures are logged and never reach the pipeline. */
  private notify(scope: RunScope, signal: { stage: string; percent: number; message: string }): void {
    const { ctx, observer } = scope;
    const percent = ctx.report(signal.percent);
    if (scope.tracked) this.deps.registry?.progress(ctx.runId, signal.stage, percent, signal.message);
    this.deps.sink?.phase(signal.stage, percent, signal.message);
    if (!observer) return;

    const onError = (err: unknown) =>
      this.deps.sink?.warn(`Progress observer failed: ${errorMessage(err)}`);
    try {
      const pending = observer.onProgress(signal.stage, percent, signal.message);
      if (pending instanceof Promise) pending.catch(onError);
    } catch (err) {
      onError(err);
    }
  }

  private async persist(report: WorkflowReport): Promise<void> {
    const store = this.deps.store;
    if (!store) return;
    try {
      const location = await store.saveFinalReport(report);
      report.reportsGenerated.push(location);
      this.deps.sink?.info(`Final report saved: ${location}`);
    } catch (err) {
      this.deps.sink?.warn(`Could not save final report: ${errorMessage(err)}`);
    }
  }

  private collaboratorNames(): string[] {
    const { generator, ranker, executor, analyzer } = this.deps;
    return [generator, ranker, executor, analyzer].map((c) => c.constructor.name);
  }
}

type PipelinePhase = "planning" | "ranking" | "execution" | "analysis" | "reporting";

/** Per-run state threaded through progress reporting. */
interface RunScope {
  ctx: RunContext;
  observer?: ProgressObserver;
  /** False when the registry refused the run id; its entry belongs to another run. */
  tracked: boolean;
}

function capitalize(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1);
}
