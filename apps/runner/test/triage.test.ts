import { describe, it, expect } from "vitest";
import { classifyFailures, triageTier } from "../src/analysis/triage.js";
import { makeRecord } from "./fixtures.js";

const thresholds = { maxExecutionTime: 30 };

describe("triageTier", () => {
  it("puts execution errors in the high tier", () => {
    expect(triageTier(makeRecord("A", { status: "error" }), thresholds)).toEqual({
      tier: "high",
      note: "Test execution error - fix test infrastructure",
    });
  });

  it("ranks page errors above slowness", () => {
    const record = makeRecord("A", {
      status: "failed",
      executionTimeSeconds: 60,
      errors: [{ type: "page_error", message: "m", timestamp: "t" }],
    });
    expect(triageTier(record, thresholds)?.tier).toBe("high");
  });

  it("puts slow failures in the medium tier", () => {
    expect(triageTier(makeRecord("A", { status: "failed", executionTimeSeconds: 31 }), thresholds)).toEqual({
      tier: "medium",
      note: "Performance issues - timeout or slow execution",
    });
  });

  it("ignores passed tests", () => {
    expect(triageTier(makeRecord("A"), thresholds)).toBeNull();
  });
});

describe("classifyFailures", () => {
  it("prefixes each note with the test id and keeps batch order", () => {
    const notes = classifyFailures(
      [
        makeRecord("TC_001", { status: "failed" }),
        makeRecord("TC_002"),
        makeRecord("TC_003", { status: "error" }),
        makeRecord("TC_004", { status: "failed" }),
      ],
      thresholds,
    );
    expect(notes).toEqual({
      high: ["TC_003: Test execution error - fix test infrastructure"],
      medium: [],
      low: [
        "TC_001: General test failure - review test logic",
        "TC_004: General test failure - review test logic",
      ],
    });
  });
});
