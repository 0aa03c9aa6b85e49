import type { TestCaseDescriptor, TestExecutionRecord } from "../src/campaign/test-types.js";
import type { OutputSink } from "../src/output-sink.js";

export function makeRecord(testId: string, overrides: Partial<TestExecutionRecord> = {}): TestExecutionRecord {
  return {
    testId,
    title: `Test ${testId}`,
    category: "basic_flow",
    status: "passed",
    startTime: "2026-03-01T10:00:00.000Z",
    endTime: "2026-03-01T10:00:05.000Z",
    executionTimeSeconds: 5,
    steps: [],
    errors: [],
    screenshots: [`artifacts/${testId}/final_screenshot.png`],
    artifacts: [],
    consoleLogs: [],
    ...overrides,
  };
}

export function makeCase(id: string, overrides: Partial<TestCaseDescriptor> = {}): TestCaseDescriptor {
  return {
    id,
    title: `Case ${id}`,
    description: "",
    category: "basic_flow",
    priority: "medium",
    complexityScore: 5,
    steps: [{ action: "navigate", target: "https://app.test/", description: "Open app" }],
    expectedResults: [],
    validationPoints: [],
    artifactsToCapture: ["screenshot"],
    metadata: { generatedBy: "test", timestamp: "2026-03-01T10:00:00.000Z", version: "1.0.0" },
    ...overrides,
  };
}

export interface RecordingSink extends OutputSink {
  lines: { level: string; message: string }[];
}

export function recordingSink(): RecordingSink {
  const lines: { level: string; message: string }[] = [];
  const push = (level: string) => (message: string) => {
    lines.push({ level, message });
  };
  return {
    lines,
    info: push("info"),
    success: push("success"),
    warn: push("warn"),
    error: push("error"),
    phase: (stage, percent, message) => lines.push({ level: "phase", message: `${stage} ${percent} ${message}` }),
    separator: () => {},
    log: push("log"),
  };
}
