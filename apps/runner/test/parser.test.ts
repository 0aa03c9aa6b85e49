import { describe, it, expect } from "vitest";
import { parseArgs, parseRunArgs } from "../src/cli/parser.js";

describe("parseArgs", () => {
  it("defaults to help", () => {
    expect(parseArgs([])).toEqual({ type: "help" });
    expect(parseArgs(["--help"])).toEqual({ type: "help" });
  });

  it("parses run options in both flag styles", () => {
    expect(
      parseArgs(["run", "--url", "https://shop.test/", "--candidates=12", "--execute", "4", "--categories", "performance,edge_cases", "--run-id", "nightly"]),
    ).toEqual({
      type: "run",
      args: {
        targetUrl: "https://shop.test/",
        candidateCount: 12,
        executeCount: 4,
        categories: ["performance", "edge_cases"],
        runId: "nightly",
      },
    });
  });

  it("parses report commands", () => {
    expect(parseArgs(["reports"])).toEqual({ type: "reports" });
    expect(parseArgs(["show", "run_final_report.json"])).toEqual({ type: "show", name: "run_final_report.json" });
    expect(parseArgs(["show"])).toEqual({ type: "invalid", message: "show expects a report name" });
  });

  it("reports unknown commands", () => {
    expect(parseArgs(["deploy"])).toEqual({ type: "invalid", message: "Unknown command: deploy" });
  });
});

describe("parseRunArgs", () => {
  it("rejects bad counts, unknown flags and missing values", () => {
    expect(parseRunArgs(["--execute", "three"])).toBe('--execute expects a non-negative integer, got "three"');
    expect(parseRunArgs(["--verbose"])).toBe("Unknown option: --verbose");
    expect(parseRunArgs(["--url"])).toBe("--url expects a value");
  });
});
