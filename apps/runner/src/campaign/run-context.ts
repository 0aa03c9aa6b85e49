import { ControllerError } from "../errors.js";
import type { PhaseResults } from "./phase-result.js";

export type PipelineState =
  | "pending"
  | "planning"
  | "ranking"
  | "execution"
  | "analysis"
  | "reporting"
  | "completed"
  | "failed";

const FORWARD: Record<PipelineState, PipelineState | null> = {
  pending: "planning",
  planning: "ranking",
  ranking: "execution",
  execution: "analysis",
  analysis: "reporting",
  reporting: "completed",
  completed: null,
  failed: null,
};

/**
 * Everything one run owns: its identifier, where it is in the pipeline, the
 * phase results gathered so far and the last progress value emitted.
 * Nothing here is shared between runs.
 */
export class RunContext {
  readonly runId: string;
  readonly startedAt: Date;
  readonly phases: PhaseResults = {};
  private _state: PipelineState = "pending";
  private _progress = 0;

  constructor(runId: string, startedAt = new Date()) {
    this.runId = runId;
    this.startedAt = startedAt;
  }

  get state(): PipelineState {
    return this._state;
  }

  get progress(): number {
    return this._progress;
  }

  get finished(): boolean {
    return this._state === "completed" || this._state === "failed";
  }

  /**
   * Moves one step forward. `failed` is reachable from any unfinished state;
   * everything else must follow the fixed phase order.
   */
  advance(next: PipelineState): void {
    if (this.finished) {
      throw new ControllerError(`Run ${this.runId} already ${this._state}; cannot enter ${next}`);
    }
    if (next !== "failed" && FORWARD[this._state] !== next) {
      throw new ControllerError(`Illegal phase transition for run ${this.runId}: ${this._state} -> ${next}`);
    }
    this._state = next;
  }

  /** Records a progress value; never lets the signal go backwards. */
  report(percent: number): number {
    this._progress = Math.max(this._progress, Math.min(100, Math.max(0, Math.round(percent))));
    return this._progress;
  }
}
