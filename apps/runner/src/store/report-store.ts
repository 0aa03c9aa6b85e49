import type { Dirent } from "fs";
import fs from "fs/promises";
import path from "path";
import type { ArtifactEntry, ReportListEntry } from "@qa-campaign/shared";
import type { AnalysisReport } from "../analysis/types.js";
import type { ReportStore } from "../campaign/collaborators.js";
import type { WorkflowReport } from "../campaign/workflow-report.js";

/**
 * JSON documents on disk: `{dataDir}/reports/{runId}_analysis.json`,
 * `{dataDir}/reports/{runId}_final_report.json`, and per-run artifacts under
 * `{dataDir}/artifacts/{runId}/`.
 */
export class FileReportStore implements ReportStore {
  private dataDir: string;

  constructor(dataDir: string) {
    this.dataDir = dataDir;
  }

  get reportsDir(): string {
    return path.join(this.dataDir, "reports");
  }

  get artifactsDir(): string {
    return path.join(this.dataDir, "artifacts");
  }

  async init(): Promise<void> {
    await fs.mkdir(this.reportsDir, { recursive: true });
    await fs.mkdir(this.artifactsDir, { recursive: true });
  }

  async saveAnalysis(report: Readonly<AnalysisReport>): Promise<string> {
    return this.write(`${sanitizeFilename(report.testRunId)}_analysis.json`, report);
  }

  async saveFinalReport(report: WorkflowReport): Promise<string> {
    return this.write(`${sanitizeFilename(report.testRunId)}_final_report.json`, report);
  }

  /** Newest first. A missing reports directory lists as empty. */
  async listReports(): Promise<ReportListEntry[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.reportsDir);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }

    const entries: ReportListEntry[] = [];
    for (const name of names.filter((n) => n.endsWith(".json"))) {
      const stat = await fs.stat(path.join(this.reportsDir, name));
      entries.push({ name, created: stat.mtime.toISOString(), size: stat.size });
    }
    return entries.sort((a, b) => b.created.localeCompare(a.created) || a.name.localeCompare(b.name));
  }

  /**
   * Parsed contents of one report, or null when it does not exist. Only plain
   * `.json` file names inside the reports directory are served.
   */
  async readReport(name: string): Promise<unknown | null> {
    if (!isReportName(name)) return null;
    try {
      const raw = await fs.readFile(path.join(this.reportsDir, name), "utf-8");
      return JSON.parse(raw);
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  /** Every file under the run's artifact directory, depth first. */
  async listArtifacts(runId: string): Promise<ArtifactEntry[]> {
    const root = path.join(this.artifactsDir, sanitizeFilename(runId));
    const entries: ArtifactEntry[] = [];

    const walk = async (dir: string): Promise<void> => {
      let children: Dirent[];
      try {
        children = await fs.readdir(dir, { withFileTypes: true });
      } catch (err) {
        if (isNotFound(err)) return;
        throw err;
      }
      for (const child of children.sort((a, b) => a.name.localeCompare(b.name))) {
        const full = path.join(dir, child.name);
        if (child.isDirectory()) {
          await walk(full);
        } else if (child.isFile()) {
          const stat = await fs.stat(full);
          entries.push({
            name: child.name,
            path: path.relative(root, full).split(path.sep).join("/"),
            type: path.extname(child.name).slice(1).toLowerCase() || "unknown",
            size: stat.size,
          });
        }
      }
    };

    await walk(root);
    return entries;
  }

  private async write(filename: string, data: unknown): Promise<string> {
    await fs.mkdir(this.reportsDir, { recursive: true });
    const filePath = path.join(this.reportsDir, filename);
    await fs.writeFile(filePath, JSON.stringify(data, null, 2));
    return filePath;
  }
}

export function sanitizeFilename(input: string): string {
  return input.replace(/[^a-zA-Z0-9._-]/g, "_");
}

function isReportName(name: string): boolean {
  return name.endsWith(".json") && path.basename(name) === name && !name.startsWith(".");
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
