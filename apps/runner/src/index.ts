#!/usr/bin/env node
import { loadConfig } from "./config/index.js";
import { parseArgs, getHelpText, type RunArgs } from "./cli/parser.js";
import * as display from "./cli/display.js";
import { createCliSink } from "./cli-sink.js";
import { createCampaignCore } from "./core.js";
import { printWorkflowSummary } from "./campaign/workflow-report.js";
import { FileReportStore } from "./store/report-store.js";

async function runCampaign(args: RunArgs): Promise<number> {
  display.banner();
  const sink = createCliSink();
  const core = await createCampaignCore(sink);
  sink.separator();

  const controller = core.createController(sink);
  const report = await controller.run(args);

  printWorkflowSummary(report, sink);
  display.verdict(report.finalVerdict);
  for (const location of report.reportsGenerated) display.info(`Report: ${location}`);

  return report.status === "completed" ? 0 : 1;
}

async function listReports(): Promise<number> {
  const store = new FileReportStore(loadConfig().dataDir);
  const reports = await store.listReports();
  if (reports.length === 0) {
    display.info("No reports yet");
    return 0;
  }
  for (const r of reports) {
    console.log(`  ${r.created}  ${String(r.size).padStart(8)}  ${r.name}`);
  }
  return 0;
}

async function showReport(name: string): Promise<number> {
  const store = new FileReportStore(loadConfig().dataDir);
  const report = await store.readReport(name);
  if (report === null) {
    display.error(`Report not found: ${name}`);
    return 1;
  }
  console.log(JSON.stringify(report, null, 2));
  return 0;
}

async function main(argv: string[]): Promise<number> {
  const command = parseArgs(argv);

  switch (command.type) {
    case "help":
      console.log(getHelpText());
      return 0;
    case "invalid":
      display.error(command.message);
      console.log(getHelpText());
      return 1;
    case "reports":
      return listReports();
    case "show":
      return showReport(command.name);
    case "run":
      return runCampaign(command.args);
  }
}

main(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch((err) => {
    display.error(`Fatal: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  });
