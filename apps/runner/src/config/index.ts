import "dotenv/config";
import { AppConfig, AnalysisThresholds } from "./types.js";

export const DEFAULT_THRESHOLDS: AnalysisThresholds = {
  maxExecutionTime: 30.0,
  minSuccessRate: 0.8,
  maxErrorRate: 0.2,
  performanceBudgetMs: 3000,
};

export const DEFAULT_CATEGORIES = ["basic_flow", "edge_cases", "performance", "ui_validation"];

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    provider: "google",
    plannerModel: env.PLANNER_MODEL || "google/gemini-2.5-flash",
    apiKey: env.GOOGLE_GENERATIVE_AI_API_KEY || undefined,
    targetUrl: env.TARGET_URL || "https://example.com/",
    candidateCount: readInt(env.NUM_CANDIDATES, 20),
    executeCount: readInt(env.NUM_EXECUTE, 10),
    categories: readList(env.TEST_CATEGORIES, DEFAULT_CATEGORIES),
    headless: env.HEADLESS !== "false",
    stepTimeoutMs: readInt(env.STEP_TIMEOUT_MS, 30000),
    recordVideo: env.RECORD_VIDEO === "true",
    chromiumPath: env.CHROMIUM_PATH || undefined,
    dataDir: env.DATA_DIR || "./data",
    port: readInt(env.RUNNER_PORT, 3100),
    viewport: { width: 1280, height: 720 },
    thresholds: {
      maxExecutionTime: readFloat(env.MAX_EXECUTION_TIME, DEFAULT_THRESHOLDS.maxExecutionTime),
      minSuccessRate: readFloat(env.MIN_SUCCESS_RATE, DEFAULT_THRESHOLDS.minSuccessRate),
      maxErrorRate: readFloat(env.MAX_ERROR_RATE, DEFAULT_THRESHOLDS.maxErrorRate),
      performanceBudgetMs: DEFAULT_THRESHOLDS.performanceBudgetMs,
    },
  };
}

function readInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  return Number.isInteger(n) && n >= 0 ? n : fallback;
}

function readFloat(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
}

function readList(raw: string | undefined, fallback: string[]): string[] {
  if (!raw) return [...fallback];
  const items = raw.split(",").map((s) => s.trim()).filter(Boolean);
  return items.length > 0 ? items : [...fallback];
}

export type { AppConfig, AnalysisThresholds } from "./types.js";
