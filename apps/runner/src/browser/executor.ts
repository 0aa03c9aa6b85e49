import fs from "fs";
import { mkdir, writeFile } from "fs/promises";
import path from "path";
import { chromium, type Browser, type BrowserContext, type Page } from "playwright-core";
import type { TestExecutor } from "../campaign/collaborators.js";
import {
  StepDescriptor,
  StepExecutionRecord,
  TestCaseDescriptor,
  TestExecutionRecord,
  advanceStatus,
  isTerminal,
} from "../campaign/test-types.js";
import { ExecutionError, errorMessage } from "../errors.js";
import type { OutputSink } from "../output-sink.js";

export interface ExecutorOptions {
  headless: boolean;
  stepTimeoutMs: number;
  viewport: { width: number; height: number };
  recordVideo: boolean;
  chromiumPath?: string;
  /** Root under which `{runId}/{testId}/` directories are created. */
  artifactsDir: string;
  sink?: OutputSink;
  /** Overrides browser startup; tests use it to simulate launch failures. */
  launch?: () => Promise<Browser>;
}

export interface StepContext {
  artifactDir: string;
  timeoutMs: number;
  sink?: OutputSink;
}

/**
 * Chromium binary from the Playwright browser cache, if one is installed.
 * Returns undefined so that playwright-core can apply its own lookup.
 */
export function findPlaywrightChromium(explicit?: string): string | undefined {
  if (explicit) return explicit;
  const cacheDir =
    process.env.PLAYWRIGHT_BROWSERS_PATH ??
    `${process.env.HOME}/.cache/ms-playwright`;
  if (!fs.existsSync(cacheDir)) return undefined;
  const dirs = fs
    .readdirSync(cacheDir)
    .filter((d) => d.startsWith("chromium-"))
    .sort()
    .reverse();
  for (const dir of dirs) {
    const candidate = path.join(cacheDir, dir, "chrome-linux64", "chrome");
    if (fs.existsSync(candidate)) return candidate;
  }
  return undefined;
}

async function captureStepArtifacts(page: Page, artifactDir: string, stepIndex: number): Promise<string[]> {
  const screenshot = path.join(artifactDir, `step_${stepIndex}_screenshot.png`);
  const dom = path.join(artifactDir, `step_${stepIndex}_dom.html`);
  await page.screenshot({ path: screenshot });
  await writeFile(dom, await page.content(), "utf-8");
  return [screenshot, dom];
}

/**
 * Runs one step against the page. Never throws: a failing step comes back
 * with `success: false` and the error text.
 */
export async function executeStep(
  page: Page,
  step: StepDescriptor,
  stepIndex: number,
  ctx: StepContext,
): Promise<StepExecutionRecord> {
  const result: StepExecutionRecord = {
    stepIndex,
    action: step.action,
    target: step.target,
    description: step.description,
    success: false,
    timestamp: new Date().toISOString(),
    artifacts: [],
  };
  const timeout = ctx.timeoutMs;

  try {
    switch (step.action) {
      case "navigate":
        await page.goto(step.target, { waitUntil: "networkidle", timeout });
        break;
      case "click":
        await page.click(step.target, { timeout });
        break;
      case "type":
        await page.fill(step.target, step.value ?? "", { timeout });
        break;
      case "drag":
        await page.dragAndDrop(step.source ?? "", step.target, { timeout });
        break;
      case "wait":
        await page.waitForSelector(step.target, { timeout: step.timeoutMs ?? 5000 });
        break;
      case "screenshot": {
        const shot = path.join(ctx.artifactDir, `step_${stepIndex}_screenshot.png`);
        await page.screenshot({ path: shot });
        result.artifacts.push(shot);
        break;
      }
      case "performance_start":
        await page.evaluate(() => {
          performance.mark("test-start");
        });
        break;
      case "performance_end": {
        const entries = await page.evaluate(() => {
          performance.mark("test-end");
          performance.measure("test-duration", "test-start", "test-end");
          return performance
            .getEntriesByType("measure")
            .map((entry) => ({ name: entry.name, duration: entry.duration }));
        });
        result.performanceMetrics = {};
        for (const entry of entries) result.performanceMetrics[entry.name] = entry.duration;
        break;
      }
      default:
        ctx.sink?.warn(`Unknown action type: ${step.action}`);
    }

    if (step.action === "navigate" || step.action === "click" || step.action === "drag") {
      try {
        result.artifacts.push(...(await captureStepArtifacts(page, ctx.artifactDir, stepIndex)));
      } catch (err) {
        ctx.sink?.warn(`Failed to capture artifacts for step ${stepIndex}: ${errorMessage(err)}`);
      }
    }

    result.success = true;
  } catch (err) {
    result.error = errorMessage(err);
    ctx.sink?.error(`Step ${stepIndex} failed: ${result.error}`);
  }

  return result;
}

/**
 * Executes selected cases in one Chromium instance, a fresh page per case.
 * Each case's record and artifacts land in `{artifactsDir}/{runId}/{testId}/`.
 */
export class PlaywrightExecutor implements TestExecutor {
  private options: ExecutorOptions;

  constructor(options: ExecutorOptions) {
    this.options = options;
  }

  async execute(cases: readonly TestCaseDescriptor[], runId: string): Promise<TestExecutionRecord[]> {
    if (cases.length === 0) return [];

    let browser: Browser;
    try {
      browser = await this.launch();
    } catch (err) {
      throw new ExecutionError(`Browser launch failed: ${errorMessage(err)}`, { cause: err });
    }

    const records: TestExecutionRecord[] = [];
    try {
      const context = await browser.newContext({
        viewport: this.options.viewport,
        recordVideo: this.options.recordVideo
          ? { dir: path.join(this.options.artifactsDir, runId, "videos") }
          : undefined,
      });
      for (const [i, testCase] of cases.entries()) {
        this.options.sink?.info(`Executing test case ${i + 1}/${cases.length}: ${testCase.id}`);
        records.push(await this.executeCase(context, testCase, runId));
      }
      await context.close();
    } finally {
      await browser.close();
    }
    return records;
  }

  private launch(): Promise<Browser> {
    if (this.options.launch) return this.options.launch();
    return chromium.launch({
      headless: this.options.headless,
      executablePath: findPlaywrightChromium(this.options.chromiumPath),
      args: ["--disable-dev-shm-usage", "--disable-extensions"],
    });
  }

  private async executeCase(
    context: BrowserContext,
    testCase: TestCaseDescriptor,
    runId: string,
  ): Promise<TestExecutionRecord> {
    const artifactDir = path.join(this.options.artifactsDir, runId, testCase.id);
    const started = new Date();
    const record: TestExecutionRecord = {
      testId: testCase.id,
      title: testCase.title,
      category: testCase.category,
      status: "running",
      startTime: started.toISOString(),
      endTime: "",
      executionTimeSeconds: 0,
      steps: [],
      errors: [],
      screenshots: [],
      artifacts: [],
      consoleLogs: [],
    };

    let page: Page | undefined;
    try {
      await mkdir(artifactDir, { recursive: true });
      page = await context.newPage();
      page.on("console", (msg) => {
        record.consoleLogs.push({ type: msg.type(), text: msg.text(), timestamp: new Date().toISOString() });
      });
      page.on("pageerror", (error) => {
        record.errors.push({ type: "page_error", message: error.message, timestamp: new Date().toISOString() });
      });

      const ctx: StepContext = { artifactDir, timeoutMs: this.options.stepTimeoutMs, sink: this.options.sink };
      for (const [index, step] of testCase.steps.entries()) {
        const stepResult = await executeStep(page, step, index, ctx);
        record.steps.push(stepResult);
        record.artifacts.push(...stepResult.artifacts);
        if (!stepResult.success) {
          record.status = advanceStatus(record.status, "failed");
          record.failureReason = stepResult.error ?? "Step execution failed";
          break;
        }
      }

      const finalShot = path.join(artifactDir, "final_screenshot.png");
      await page.screenshot({ path: finalShot, fullPage: true });
      record.screenshots.push(finalShot);
      const finalDom = path.join(artifactDir, "page_final_dom.html");
      await writeFile(finalDom, await page.content(), "utf-8");
      record.artifacts.push(finalDom);

      if (!isTerminal(record.status)) record.status = advanceStatus(record.status, "passed");
    } catch (err) {
      const message = errorMessage(err);
      this.options.sink?.error(`Test execution failed for ${testCase.id}: ${message}`);
      if (!isTerminal(record.status)) record.status = advanceStatus(record.status, "error");
      record.errors.push({ type: "execution_error", message, timestamp: new Date().toISOString() });
      if (record.failureReason === undefined) record.failureReason = message;
    } finally {
      if (page) await page.close().catch((err: unknown) => {
        this.options.sink?.warn(`Could not close page for ${testCase.id}: ${errorMessage(err)}`);
      });
      const ended = new Date();
      record.endTime = ended.toISOString();
      record.executionTimeSeconds = (ended.getTime() - started.getTime()) / 1000;
    }

    await this.writeResult(artifactDir, record);
    return record;
  }

  private async writeResult(artifactDir: string, record: TestExecutionRecord): Promise<void> {
    try {
      await mkdir(artifactDir, { recursive: true });
      await writeFile(path.join(artifactDir, "test_result.json"), JSON.stringify(record, null, 2), "utf-8");
    } catch (err) {
      this.options.sink?.warn(`Could not write result for ${record.testId}: ${errorMessage(err)}`);
    }
  }
}
