import {
  GenerationRequirements,
  StepDescriptor,
  TestCaseDescriptor,
  TestCategory,
} from "../campaign/test-types.js";

interface CaseTemplate {
  title: string;
  description: string;
  category: TestCategory;
  steps: StepDescriptor[];
}

export const FALLBACK_GENERATOR = "fallback_planner";

function templatesFor(targetUrl: string): CaseTemplate[] {
  return [
    {
      title: "Page Load Test",
      description: "Verify the page loads and displays its main content",
      category: "basic_flow",
      steps: [
        { action: "navigate", target: targetUrl, description: "Navigate to target" },
        { action: "wait", target: "body", timeoutMs: 5000, description: "Wait for page to load" },
        { action: "screenshot", target: "", description: "Capture initial state" },
      ],
    },
    {
      title: "Primary Navigation Test",
      description: "Follow the first navigation link",
      category: "basic_flow",
      steps: [
        { action: "navigate", target: targetUrl, description: "Navigate to target" },
        { action: "click", target: "nav a >> nth=0", description: "Open first navigation link" },
        { action: "screenshot", target: "", description: "Capture navigated page" },
      ],
    },
    {
      title: "Empty Form Submission Test",
      description: "Submit the first form without filling it in",
      category: "edge_cases",
      steps: [
        { action: "navigate", target: targetUrl, description: "Navigate to target" },
        { action: "click", target: "form [type=submit] >> nth=0", description: "Submit empty form" },
        { action: "screenshot", target: "", description: "Capture validation state" },
      ],
    },
    {
      title: "Oversized Input Test",
      description: "Type an oversized value into the first text input",
      category: "edge_cases",
      steps: [
        { action: "navigate", target: targetUrl, description: "Navigate to target" },
        { action: "type", target: "input[type=text] >> nth=0", value: "x".repeat(512), description: "Fill oversized value" },
        { action: "screenshot", target: "", description: "Capture input state" },
      ],
    },
    {
      title: "Load Performance Test",
      description: "Measure page load performance",
      category: "performance",
      // Navigation clears the page's marks, so timing starts once it has loaded.
      steps: [
        { action: "navigate", target: targetUrl, description: "Load page" },
        { action: "performance_start", target: "", description: "Start performance monitoring" },
        { action: "wait", target: "body", timeoutMs: 5000, description: "Wait for content to render" },
        { action: "performance_end", target: "", description: "End performance monitoring" },
      ],
    },
    {
      title: "Button State Test",
      description: "Check the first button is visible and responds",
      category: "ui_validation",
      steps: [
        { action: "navigate", target: targetUrl, description: "Navigate to target" },
        { action: "wait", target: "button >> nth=0", timeoutMs: 3000, description: "Wait for a button" },
        { action: "screenshot", target: "", description: "Capture button state" },
      ],
    },
    {
      title: "Heading Structure Test",
      description: "Verify the page exposes a top-level heading",
      category: "accessibility",
      steps: [
        { action: "navigate", target: targetUrl, description: "Navigate to target" },
        { action: "wait", target: "h1", timeoutMs: 3000, description: "Wait for main heading" },
      ],
    },
    {
      title: "Missing Page Test",
      description: "Open a path that does not exist",
      category: "error_handling",
      steps: [
        { action: "navigate", target: new URL("/__missing__", targetUrl).href, description: "Open unknown path" },
        { action: "screenshot", target: "", description: "Capture error page" },
      ],
    },
  ];
}

/**
 * Deterministic candidates used when no model is configured or the model's
 * answer cannot be used. Templates cycle in order, restricted to the requested
 * categories when any of them match.
 */
export function generateFallbackCases(
  requirements: GenerationRequirements,
  now = new Date(),
): TestCaseDescriptor[] {
  const all = templatesFor(requirements.targetUrl);
  const wanted = all.filter((t) => requirements.categories.includes(t.category));
  const templates = wanted.length > 0 ? wanted : all;
  const count = requirements.candidateCount;
  const half = Math.floor(count / 2);

  const cases: TestCaseDescriptor[] = [];
  for (let i = 0; i < count; i++) {
    const template = templates[i % templates.length];
    cases.push({
      id: `TC_${String(i + 1).padStart(3, "0")}`,
      title: `${template.title} #${i + 1}`,
      description: `${template.description} (Fallback generated)`,
      category: template.category,
      priority: i < half ? "medium" : "low",
      complexityScore: 5 + (i % 5),
      steps: template.steps.map((s) => ({ ...s })),
      expectedResults: ["status: success", "validations: Basic functionality works"],
      validationPoints: [
        "No console errors",
        "UI responds appropriately",
        "Performance within acceptable range",
      ],
      artifactsToCapture: ["screenshot", "console_logs"],
      metadata: { generatedBy: FALLBACK_GENERATOR, timestamp: now.toISOString(), version: "1.0.0" },
    });
  }
  return cases;
}
