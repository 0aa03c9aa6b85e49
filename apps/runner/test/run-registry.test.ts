import { describe, it, expect } from "vitest";
import { RunRegistry } from "../src/campaign/run-registry.js";
import { ControllerError } from "../src/errors.js";

describe("RunRegistry", () => {
  it("reports idle before any run", () => {
    const registry = new RunRegistry();
    expect(registry.toDTO(registry.latest())).toEqual({
      testRunId: null,
      status: "idle",
      progress: 0,
      message: "No runs yet",
    });
  });

  it("tracks progress and outcome of a run", () => {
    const registry = new RunRegistry();
    registry.register("run-1", new Date("2026-03-01T10:00:00.000Z"));
    registry.progress("run-1", "Ranking", 30, "Ranking and selecting top test cases");
    registry.progress("run-1", "Planning", 10, "late signal");

    expect(registry.get("run-1")).toMatchObject({ status: "running", progress: 30, message: "Planning: late signal" });
    expect(registry.isRunning("run-1")).toBe(true);
    expect(registry.hasActiveRun()).toBe(true);

    registry.finish("run-1", { status: "completed", message: "done", verdict: "GOOD" });
    expect(registry.get("run-1")).toMatchObject({
      testRunId: "run-1",
      status: "completed",
      progress: 100,
      verdict: "GOOD",
      startedAt: "2026-03-01T10:00:00.000Z",
    });
    expect(registry.hasActiveRun()).toBe(false);
  });

  it("rejects a second registration while the first is running", () => {
    const registry = new RunRegistry();
    registry.register("run-1");
    expect(() => registry.register("run-1")).toThrow(ControllerError);

    registry.finish("run-1", { status: "failed", message: "boom" });
    expect(registry.register("run-1").status).toBe("running");
  });

  it("lists runs in registration order and hands out copies", () => {
    const registry = new RunRegistry();
    registry.register("a");
    registry.register("b");
    registry.finish("a", { status: "failed", message: "x" });
    registry.register("a");

    expect(registry.list().map((r) => r.testRunId)).toEqual(["b", "a"]);
    expect(registry.latest()?.testRunId).toBe("a");

    const copy = registry.get("b");
    if (copy) copy.progress = 99;
    expect(registry.get("b")?.progress).toBe(0);
  });
});
