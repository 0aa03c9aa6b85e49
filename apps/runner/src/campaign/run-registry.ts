import type { RunState, RunStatusDTO, Verdict } from "@qa-campaign/shared";
import { ControllerError } from "../errors.js";

export interface RunEntry {
  testRunId: string;
  status: RunState;
  progress: number;
  message: string;
  startedAt: string;
  finishedAt?: string;
  verdict?: Verdict;
}

/**
 * Keyed status of every run this process has started. A run identifier can
 * only be reused once its previous run has finished.
 */
export class RunRegistry {
  private runs = new Map<string, RunEntry>();
  private order: string[] = [];

  register(testRunId: string, startedAt = new Date()): RunEntry {
    const existing = this.runs.get(testRunId);
    if (existing?.status === "running") {
      throw new ControllerError(`Run ${testRunId} is already in progress`);
    }

    const entry: RunEntry = {
      testRunId,
      status: "running",
      progress: 0,
      message: "Initializing run",
      startedAt: startedAt.toISOString(),
    };
    this.runs.set(testRunId, entry);
    this.order = this.order.filter((id) => id !== testRunId);
    this.order.push(testRunId);
    return entry;
  }

  isRunning(testRunId: string): boolean {
    return this.runs.get(testRunId)?.status === "running";
  }

  hasActiveRun(): boolean {
    return [...this.runs.values()].some((r) => r.status === "running");
  }

  progress(testRunId: string, stage: string, percent: number, message: string): void {
    const entry = this.runs.get(testRunId);
    if (!entry || entry.status !== "running") return;
    entry.progress = Math.max(entry.progress, percent);
    entry.message = `${stage}: ${message}`;
  }

  finish(testRunId: string, outcome: { status: "completed" | "failed"; message: string; verdict?: Verdict }): void {
    const entry = this.runs.get(testRunId);
    if (!entry) return;
    entry.status = outcome.status;
    entry.message = outcome.message;
    entry.finishedAt = new Date().toISOString();
    if (outcome.status === "completed") entry.progress = 100;
    if (outcome.verdict) entry.verdict = outcome.verdict;
  }

  get(testRunId: string): RunEntry | undefined {
    const entry = this.runs.get(testRunId);
    return entry ? { ...entry } : undefined;
  }

  latest(): RunEntry | undefined {
    const id = this.order[this.order.length - 1];
    return id ? this.get(id) : undefined;
  }

  list(): RunEntry[] {
    return this.order.flatMap((id) => {
      const entry = this.get(id);
      return entry ? [entry] : [];
    });
  }

  toDTO(entry: RunEntry | undefined): RunStatusDTO {
    if (!entry) {
      return { testRunId: null, status: "idle", progress: 0, message: "No runs yet" };
    }
    return { ...entry };
  }
}
