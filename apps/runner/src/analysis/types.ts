export interface ExecutionTimeDistribution {
  min: number;
  max: number;
  average: number;
  total: number;
}

export interface AggregateSummary {
  total: number;
  passed: number;
  failed: number;
  errors: number;
  successRate: number;
  failureRate: number;
  errorRate: number;
  executionTimes: ExecutionTimeDistribution;
}

// ── Dimensional analyses ──────────────────────────────────────────

export interface SlowTest {
  testId: string;
  executionTime: number;
  thresholdExceeded: number;
}

export interface StepMetric {
  testId: string;
  stepIndex: number;
  name: string;
  value: number;
}

export interface PerformanceAnalysis {
  summary: {
    totalTestsAnalyzed: number;
    slowTestsCount: number;
    performanceThreshold: number;
  };
  slowTests: SlowTest[];
  performanceMetrics: StepMetric[];
  recommendations: string[];
}

export interface FailurePattern {
  testId: string;
  errorType: string;
  message: string;
  timestamp: string;
}

export interface CommonError {
  errorType: string;
  count: number;
  frequency: number;
}

export interface ErrorAnalysis {
  errorSummary: Record<string, number>;
  failurePatterns: FailurePattern[];
  commonErrors: CommonError[];
  errorRateAnalysis: {
    withinThreshold: boolean;
    currentRate: number;
    threshold: number;
  };
}

export interface ArtifactQuality {
  testId: string;
  qualityScore: number;
  artifactCount: number;
}

export interface ArtifactAnalysis {
  artifactSummary: {
    screenshots: number;
    consoleLogs: number;
    artifacts: number;
  };
  artifactQuality: ArtifactQuality[];
  coverageAnalysis: {
    testsWithScreenshots: number;
    testsWithConsoleLogs: number;
    overallCoverage: number;
  };
}

export interface ReliabilityAnalysis {
  categoryReliability: Record<string, number>;
  overallReliability: number;
  flakyTests: string[];
  repeatabilityAssessment: {
    consistentCategories: number;
    inconsistentCategories: number;
  };
}

export interface DetailedAnalysis {
  performance: PerformanceAnalysis;
  errors: ErrorAnalysis;
  artifacts: ArtifactAnalysis;
  reliability: ReliabilityAnalysis;
}

// ── Validation ────────────────────────────────────────────────────

export type CheckStatus = "pass" | "warning" | "fail";

export interface ExecutionTimeOutlier {
  testId: string;
  time: number;
}

interface CheckBase {
  status: CheckStatus;
  details: string;
}

export interface ExecutionTimeCheck extends CheckBase {
  name: "execution_time_consistency";
  status: "pass" | "fail";
  outliers: ExecutionTimeOutlier[];
}

export interface ErrorPatternCheck extends CheckBase {
  name: "error_pattern_validation";
  status: "pass" | "warning";
  errorPatterns: Record<string, number>;
}

export interface ArtifactCompletenessCheck extends CheckBase {
  name: "artifact_completeness";
  status: "pass" | "warning";
  incompleteTests: string[];
}

export type ValidationCheck = ExecutionTimeCheck | ErrorPatternCheck | ArtifactCompletenessCheck;

export interface ValidationResults {
  checks: [ExecutionTimeCheck, ErrorPatternCheck, ArtifactCompletenessCheck];
  overallStatus: "pass" | "warning";
  crossValidationScore: number;
}

// ── Triage and report ─────────────────────────────────────────────

export type TriageTier = "high" | "medium" | "low";

export type TriageNotes = Record<TriageTier, string[]>;

export interface AnalysisMetadata {
  analyzedBy: string;
  timestamp: string;
  version: string;
}

export interface AnalysisReport {
  testRunId: string;
  summary: AggregateSummary;
  detailedAnalysis: DetailedAnalysis;
  validationResults: ValidationResults;
  recommendations: string[];
  triageNotes: TriageNotes;
  metadata: AnalysisMetadata;
}
