import { loadConfig, AppConfig } from "./config/index.js";
import { ResultAnalyzer } from "./analysis/composer.js";
import { PlaywrightExecutor } from "./browser/executor.js";
import { PhaseController } from "./campaign/phase-controller.js";
import { RunRegistry } from "./campaign/run-registry.js";
import { GeminiTestPlanner } from "./planner/test-planner.js";
import { HeuristicRanker } from "./planner/ranker.js";
import { FileReportStore } from "./store/report-store.js";
import type { OutputSink } from "./output-sink.js";

export interface CampaignCore {
  config: AppConfig;
  store: FileReportStore;
  registry: RunRegistry;
  /** A controller whose collaborators all log through `sink`. */
  createController(sink: OutputSink): PhaseController;
}

export async function createCampaignCore(sink: OutputSink, config: AppConfig = loadConfig()): Promise<CampaignCore> {
  sink.info(`Provider: ${config.provider} | Planner model: ${config.plannerModel}`);
  sink.info(`Headless: ${config.headless}`);
  if (!config.apiKey) {
    sink.warn("GOOGLE_GENERATIVE_AI_API_KEY not set; test cases will come from templates");
  }

  const store = new FileReportStore(config.dataDir);
  await store.init();
  sink.success(`Report store ready at ${store.reportsDir}`);

  const registry = new RunRegistry();

  function createController(runSink: OutputSink): PhaseController {
    return new PhaseController(
      {
        generator: new GeminiTestPlanner({ apiKey: config.apiKey, model: config.plannerModel, sink: runSink }),
        ranker: new HeuristicRanker(),
        executor: new PlaywrightExecutor({
          headless: config.headless,
          stepTimeoutMs: config.stepTimeoutMs,
          viewport: config.viewport,
          recordVideo: config.recordVideo,
          chromiumPath: config.chromiumPath,
          artifactsDir: store.artifactsDir,
          sink: runSink,
        }),
        analyzer: new ResultAnalyzer({ thresholds: config.thresholds, store, sink: runSink }),
        store,
        registry,
        sink: runSink,
      },
      {
        targetUrl: config.targetUrl,
        candidateCount: config.candidateCount,
        executeCount: config.executeCount,
        categories: config.categories,
      },
    );
  }

  return { config, store, registry, createController };
}
