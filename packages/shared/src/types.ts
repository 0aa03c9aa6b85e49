// ── WebSocket Protocol ─────────────────────────────────────────────

export type WSMessageType =
  | "run_started"
  | "progress"
  | "run_completed"
  | "run_failed"
  | "error"
  | "log";

export interface WSMessage {
  type: WSMessageType;
  /** Run identifier the message belongs to, when there is one. */
  id?: string;
  payload: unknown;
}

// ── Runner -> Client Messages ──────────────────────────────────────

export interface RunStartedPayload {
  testRunId: string;
  targetUrl: string;
  startedAt: string;
}

export interface ProgressPayload {
  stage: string;
  percent: number;
  message: string;
}

export interface RunFinishedPayload {
  testRunId: string;
  status: "completed" | "failed";
  verdict: Verdict | null;
  successRate: number;
  error?: string;
}

export interface LogPayload {
  level: "info" | "success" | "warn" | "error";
  message: string;
}

export interface ErrorPayload {
  message: string;
  code?: string;
}

// ── HTTP API DTOs ──────────────────────────────────────────────────

export interface StartRunRequest {
  targetUrl?: string;
  candidateCount?: number;
  executeCount?: number;
  categories?: string[];
}

export interface StartRunResponse {
  testRunId: string;
  status: "started";
}

export type RunState = "idle" | "running" | "completed" | "failed";

export interface RunStatusDTO {
  testRunId: string | null;
  status: RunState;
  progress: number;
  message: string;
  startedAt?: string;
  finishedAt?: string;
  verdict?: Verdict;
}

export interface ReportListEntry {
  name: string;
  created: string;
  size: number;
}

export interface ArtifactEntry {
  name: string;
  path: string;
  type: string;
  size: number;
}

// ── Shared Domain Types ────────────────────────────────────────────

export type Verdict = "EXCELLENT" | "GOOD" | "FAIR" | "POOR";
