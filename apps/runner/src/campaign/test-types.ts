import { ExecutionError } from "../errors.js";

export type TestPriority = "high" | "medium" | "low";

export const TEST_CATEGORIES = [
  "basic_flow",
  "edge_cases",
  "performance",
  "ui_validation",
  "accessibility",
  "error_handling",
  "unknown",
] as const;

export type TestCategory = (typeof TEST_CATEGORIES)[number];

export const STEP_ACTIONS = [
  "navigate",
  "click",
  "type",
  "drag",
  "wait",
  "screenshot",
  "performance_start",
  "performance_end",
  "custom",
  "unknown",
] as const;

export type StepAction = (typeof STEP_ACTIONS)[number];

export interface StepDescriptor {
  action: StepAction;
  target: string;
  /** Drag origin. */
  source?: string;
  /** Text for `type` steps. */
  value?: string;
  timeoutMs?: number;
  description: string;
}

export interface TestCaseDescriptor {
  id: string;
  title: string;
  description: string;
  category: TestCategory;
  priority: TestPriority;
  complexityScore: number;
  steps: StepDescriptor[];
  expectedResults: string[];
  validationPoints: string[];
  artifactsToCapture: string[];
  metadata: {
    generatedBy: string;
    timestamp: string;
    version: string;
  };
}

export interface GenerationRequirements {
  targetUrl: string;
  candidateCount: number;
  categories: string[];
}

export interface RankingOutcome {
  selected: TestCaseDescriptor[];
  rejected: TestCaseDescriptor[];
}

export interface StepExecutionRecord {
  stepIndex: number;
  action: StepAction;
  target: string;
  description: string;
  success: boolean;
  error?: string;
  timestamp: string;
  artifacts: string[];
  performanceMetrics?: Record<string, number>;
}

export interface RecordedError {
  type: string;
  message: string;
  timestamp: string;
}

export interface ConsoleEntry {
  type: string;
  text: string;
  timestamp: string;
}

export type TestStatus = "running" | "passed" | "failed" | "error";
export type TerminalStatus = Exclude<TestStatus, "running">;

export interface TestExecutionRecord {
  testId: string;
  title: string;
  category: TestCategory;
  status: TestStatus;
  startTime: string;
  endTime: string;
  executionTimeSeconds: number;
  steps: StepExecutionRecord[];
  errors: RecordedError[];
  screenshots: string[];
  artifacts: string[];
  consoleLogs: ConsoleEntry[];
  failureReason?: string;
}

/**
 * Moves a record along `running -> passed | failed | error`. Terminal
 * statuses are final; re-applying the current status is a no-op.
 */
export function advanceStatus(current: TestStatus, next: TestStatus): TestStatus {
  if (current === next) return current;
  if (current !== "running") {
    throw new ExecutionError(`Cannot move test status from "${current}" to "${next}"`);
  }
  return next;
}

export function isTerminal(status: TestStatus): status is TerminalStatus {
  return status !== "running";
}

// ── Normalisation of loosely typed input ──────────────────────────

type Loose = Record<string, unknown>;

function isObject(value: unknown): value is Loose {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function str(value: unknown, fallback = ""): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return fallback;
}

function num(value: unknown, fallback = 0): number {
  const n = typeof value === "string" ? Number(value) : value;
  return typeof n === "number" && Number.isFinite(n) ? n : fallback;
}

function strList(value: unknown): string[] {
  return Array.isArray(value) ? value.map((v) => str(v)).filter((v) => v !== "") : [];
}

function pick(obj: Loose, ...keys: string[]): unknown {
  for (const key of keys) {
    if (obj[key] !== undefined) return obj[key];
  }
  return undefined;
}

export function toCategory(value: unknown): TestCategory {
  const s = str(value);
  return TEST_CATEGORIES.find((c) => c === s) ?? "unknown";
}

export function toAction(value: unknown): StepAction {
  const s = str(value);
  return STEP_ACTIONS.find((a) => a === s) ?? "unknown";
}

export function toPriority(value: unknown): TestPriority {
  return value === "high" || value === "low" ? value : "medium";
}

export function toStatus(value: unknown): TestStatus {
  if (value === "running" || value === "passed" || value === "failed") return value;
  return "error";
}

export function normalizeStep(raw: unknown): StepDescriptor {
  const s = isObject(raw) ? raw : {};
  const timeout = pick(s, "timeoutMs", "timeout");
  const step: StepDescriptor = {
    action: toAction(s.action),
    target: str(s.target),
    description: str(s.description, "No description provided"),
  };
  if (s.source !== undefined) step.source = str(s.source);
  if (s.value !== undefined) step.value = str(s.value);
  if (timeout !== undefined) step.timeoutMs = num(timeout, 5000);
  return step;
}

function expectedList(value: unknown): string[] {
  if (Array.isArray(value)) return strList(value);
  if (isObject(value)) {
    return Object.entries(value).map(([k, v]) =>
      `${k}: ${Array.isArray(v) ? v.map((x) => str(x)).join(", ") : str(v, JSON.stringify(v))}`,
    );
  }
  const s = str(value);
  return s ? [s] : [];
}

/**
 * Builds a descriptor from an untyped object (LLM output, JSON on disk),
 * applying a default for every missing field.
 */
export function normalizeTestCase(raw: unknown, index: number, generatedBy: string): TestCaseDescriptor {
  const c = isObject(raw) ? raw : {};
  const artifacts = strList(pick(c, "artifactsToCapture", "artifacts_to_capture"));
  return {
    id: str(c.id) || `TC_${String(index + 1).padStart(3, "0")}`,
    title: str(c.title) || `Test Case ${index + 1}`,
    description: str(c.description),
    category: toCategory(c.category),
    priority: toPriority(c.priority),
    complexityScore: num(pick(c, "complexityScore", "complexity_score"), 5.0),
    steps: Array.isArray(c.steps) ? c.steps.map(normalizeStep) : [],
    expectedResults: expectedList(pick(c, "expectedResults", "expected_results")),
    validationPoints: strList(pick(c, "validationPoints", "validation_points")),
    artifactsToCapture: artifacts.length > 0 ? artifacts : ["screenshot"],
    metadata: {
      generatedBy,
      timestamp: new Date().toISOString(),
      version: "1.0.0",
    },
  };
}

function normalizeStepRecord(raw: unknown, index: number): StepExecutionRecord {
  const s = isObject(raw) ? raw : {};
  const record: StepExecutionRecord = {
    stepIndex: num(pick(s, "stepIndex", "step_index"), index),
    action: toAction(s.action),
    target: str(s.target),
    description: str(s.description),
    success: s.success === true,
    timestamp: str(s.timestamp),
    artifacts: strList(s.artifacts),
  };
  if (s.error !== undefined) record.error = str(s.error);
  const metrics = pick(s, "performanceMetrics", "performance_metrics");
  if (isObject(metrics)) {
    record.performanceMetrics = {};
    for (const [name, value] of Object.entries(metrics)) {
      record.performanceMetrics[name] = num(value);
    }
  }
  return record;
}

function normalizeErrors(value: unknown): RecordedError[] {
  if (!Array.isArray(value)) return [];
  return value.map((e) => {
    const o = isObject(e) ? e : {};
    return {
      type: str(o.type, "unknown") || "unknown",
      message: str(o.message),
      timestamp: str(o.timestamp),
    };
  });
}

function normalizeConsole(value: unknown): ConsoleEntry[] {
  if (!Array.isArray(value)) return [];
  return value.map((e) => {
    const o = isObject(e) ? e : {};
    return { type: str(o.type, "log"), text: str(o.text), timestamp: str(o.timestamp) };
  });
}

/**
 * Reads an execution record produced outside this process. Unknown statuses
 * become `error`, absent numbers become 0 and absent lists become empty.
 */
export function normalizeRecord(raw: unknown): TestExecutionRecord {
  const r = isObject(raw) ? raw : {};
  const steps = pick(r, "steps", "steps_executed");
  const record: TestExecutionRecord = {
    testId: str(pick(r, "testId", "test_id"), "unknown") || "unknown",
    title: str(r.title),
    category: toCategory(r.category),
    status: toStatus(r.status),
    startTime: str(pick(r, "startTime", "start_time")),
    endTime: str(pick(r, "endTime", "end_time")),
    executionTimeSeconds: num(pick(r, "executionTimeSeconds", "execution_time")),
    steps: Array.isArray(steps) ? steps.map(normalizeStepRecord) : [],
    errors: normalizeErrors(r.errors),
    screenshots: strList(r.screenshots),
    artifacts: strList(r.artifacts),
    consoleLogs: normalizeConsole(pick(r, "consoleLogs", "console_logs")),
  };
  const reason = pick(r, "failureReason", "failure_reason");
  if (reason !== undefined) record.failureReason = str(reason);
  return record;
}
