export type Provider = "google";

export interface AnalysisThresholds {
  /** Seconds a single test may run before it counts as slow. */
  maxExecutionTime: number;
  minSuccessRate: number;
  maxErrorRate: number;
  performanceBudgetMs: number;
}

export interface AppConfig {
  provider: Provider;
  plannerModel: string;
  apiKey?: string;
  targetUrl: string;
  candidateCount: number;
  executeCount: number;
  categories: string[];
  headless: boolean;
  stepTimeoutMs: number;
  recordVideo: boolean;
  chromiumPath?: string;
  dataDir: string;
  port: number;
  viewport: { width: number; height: number };
  thresholds: AnalysisThresholds;
}
