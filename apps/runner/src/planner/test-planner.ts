import { GoogleGenerativeAI } from "@google/generative-ai";
import type { TestCaseGenerator } from "../campaign/collaborators.js";
import {
  GenerationRequirements,
  TestCaseDescriptor,
  normalizeTestCase,
} from "../campaign/test-types.js";
import { GenerationError, errorMessage } from "../errors.js";
import type { OutputSink } from "../output-sink.js";
import { generateFallbackCases } from "./fallback-templates.js";

export const MODEL_GENERATOR = "gemini_planner";

/** Sends one prompt, returns the model's raw text. */
export type CompletionFn = (prompt: string) => Promise<string>;

export interface PlannerOptions {
  apiKey?: string;
  model: string;
  sink?: OutputSink;
  /** Replaces the Gemini call; used by tests and offline runs. */
  complete?: CompletionFn;
}

function buildPrompt(requirements: GenerationRequirements): string {
  return [
    `You are a senior QA test planner analyzing the web application at ${requirements.targetUrl}.`,
    `Generate ${requirements.candidateCount} test cases covering these categories: ${requirements.categories.join(", ")}.`,
    ``,
    `Respond with EXACTLY one JSON object (no markdown, no backticks):`,
    `{`,
    `  "test_cases": [`,
    `    {`,
    `      "id": "TC_001",`,
    `      "title": "short test title",`,
    `      "description": "what the test verifies",`,
    `      "category": "one of the categories above",`,
    `      "priority": "high | medium | low",`,
    `      "complexity_score": 7.5,`,
    `      "steps": [`,
    `        { "action": "navigate", "target": "${requirements.targetUrl}", "description": "Load page" },`,
    `        { "action": "wait", "target": "main", "timeout": 5000, "description": "Wait for content" },`,
    `        { "action": "click", "target": "button:has-text('Sign in')", "description": "Open sign-in" }`,
    `      ],`,
    `      "expected_results": ["observable outcome"],`,
    `      "validation_points": ["what to check"],`,
    `      "artifacts_to_capture": ["screenshot", "console_logs"]`,
    `    }`,
    `  ]`,
    `}`,
    ``,
    `Rules:`,
    `- "action" is one of: navigate, click, type, drag, wait, screenshot, performance_start, performance_end.`,
    `- "target" is a Playwright selector, or a URL for navigate.`,
    `- "drag" steps also give a "source" selector; "type" steps give a "value".`,
    `- Cover normal flows, edge cases, UI state and error handling.`,
  ].join("\n");
}

/**
 * Extracts the list of raw test cases from a model answer. Accepts a bare
 * array, `{ test_cases: [...] }` or `{ testCases: [...] }`, optionally
 * wrapped in markdown fences or surrounded by prose.
 */
export function parseTestCaseResponse(raw: string): unknown[] | null {
  const cleaned = raw
    .trim()
    .replace(/^```(?:json)?\s*/i, "")
    .replace(/\s*```$/, "")
    .trim();

  const fromValue = (value: unknown): unknown[] | null => {
    if (Array.isArray(value)) return value;
    if (typeof value === "object" && value !== null) {
      const list = "test_cases" in value ? value.test_cases : "testCases" in value ? value.testCases : undefined;
      if (Array.isArray(list)) return list;
    }
    return null;
  };

  try {
    return fromValue(JSON.parse(cleaned));
  } catch {
    const jsonMatch = cleaned.match(/\{[\s\S]*\}/);
    if (!jsonMatch) return null;
    try {
      return fromValue(JSON.parse(jsonMatch[0]));
    } catch {
      return null;
    }
  }
}

/**
 * Generates candidates with Gemini when a key is configured, falling back to
 * the template set whenever the model is unavailable or answers with
 * something unusable.
 */
export class GeminiTestPlanner implements TestCaseGenerator {
  private complete?: CompletionFn;
  private sink?: OutputSink;

  constructor(options: PlannerOptions) {
    this.sink = options.sink;
    if (options.complete) {
      this.complete = options.complete;
    } else if (options.apiKey) {
      const genAI = new GoogleGenerativeAI(options.apiKey);
      const model = genAI.getGenerativeModel({ model: options.model.replace("google/", "") });
      this.complete = async (prompt) => {
        const result = await model.generateContent(prompt);
        return result.response.text();
      };
    }
  }

  async generate(requirements: GenerationRequirements): Promise<TestCaseDescriptor[]> {
    validateRequirements(requirements);
    if (requirements.candidateCount === 0) return [];

    if (!this.complete) {
      this.sink?.warn("No model API key configured; using fallback test case templates");
      return this.fallback(requirements);
    }

    try {
      const raw = await this.complete(buildPrompt(requirements));
      const parsed = parseTestCaseResponse(raw);
      if (!parsed || parsed.length === 0) {
        this.sink?.warn("Model response held no usable test cases; using fallback templates");
        return this.fallback(requirements);
      }
      const cases = parsed
        .slice(0, requirements.candidateCount)
        .map((c, i) => normalizeTestCase(c, i, MODEL_GENERATOR));
      this.sink?.info(`Generated ${cases.length} test cases with the model`);
      return cases;
    } catch (err) {
      this.sink?.warn(`Model generation failed: ${errorMessage(err)}; using fallback templates`);
      return this.fallback(requirements);
    }
  }

  private fallback(requirements: GenerationRequirements): TestCaseDescriptor[] {
    const cases = generateFallbackCases(requirements);
    this.sink?.info(`Generated ${cases.length} fallback test cases`);
    return cases;
  }
}

function validateRequirements(requirements: GenerationRequirements): void {
  const { targetUrl, candidateCount } = requirements;
  let url: URL;
  try {
    url = new URL(targetUrl);
  } catch (err) {
    throw new GenerationError(`Invalid target URL: ${targetUrl}`, { cause: err });
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new GenerationError(`Invalid target URL: ${targetUrl}`);
  }
  if (!Number.isInteger(candidateCount) || candidateCount < 0) {
    throw new GenerationError(`Invalid candidate count: ${candidateCount}`);
  }
}
