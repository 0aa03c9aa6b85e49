export type CampaignPhase = "planning" | "ranking" | "execution" | "analysis";

export class CampaignError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Failure raised by a collaborator or component while running one phase.
 * The controller recovers these with the phase's fallback.
 */
export abstract class PhaseError extends CampaignError {
  abstract readonly phase: CampaignPhase;
}

export class GenerationError extends PhaseError {
  readonly phase = "planning";

  constructor(message: string, options?: { cause?: unknown }) {
    super("GENERATION_FAILED", message, options);
  }
}

export class RankingError extends PhaseError {
  readonly phase = "ranking";

  constructor(message: string, options?: { cause?: unknown }) {
    super("RANKING_FAILED", message, options);
  }
}

export class ExecutionError extends PhaseError {
  readonly phase = "execution";

  constructor(message: string, options?: { cause?: unknown }) {
    super("EXECUTION_FAILED", message, options);
  }
}

export class AnalysisError extends PhaseError {
  readonly phase = "analysis";

  constructor(message: string, options?: { cause?: unknown }) {
    super("ANALYSIS_FAILED", message, options);
  }
}

/** A defect in the controller itself. Fatal for the run. */
export class ControllerError extends CampaignError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONTROLLER_FAILED", message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
