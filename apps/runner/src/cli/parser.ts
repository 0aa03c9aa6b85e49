export interface RunArgs {
  targetUrl?: string;
  candidateCount?: number;
  executeCount?: number;
  categories?: string[];
  runId?: string;
}

export type CliCommand =
  | { type: "run"; args: RunArgs }
  | { type: "reports" }
  | { type: "show"; name: string }
  | { type: "help" }
  | { type: "invalid"; message: string };

const RUN_FLAGS = ["--url", "--candidates", "--execute", "--categories", "--run-id"] as const;
type RunFlag = (typeof RUN_FLAGS)[number];

function isRunFlag(value: string): value is RunFlag {
  return RUN_FLAGS.some((f) => f === value);
}

function parseCount(flag: string, raw: string): number | string {
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0) return `${flag} expects a non-negative integer, got "${raw}"`;
  return n;
}

/**
 * Parse `run` options. Accepts both `--flag value` and `--flag=value`.
 * Returns an error message instead of throwing on bad input.
 */
export function parseRunArgs(argv: string[]): RunArgs | string {
  const args: RunArgs = {};

  for (let i = 0; i < argv.length; i++) {
    let flag = argv[i];
    let value: string | undefined;
    const eq = flag.indexOf("=");
    if (flag.startsWith("--") && eq !== -1) {
      value = flag.slice(eq + 1);
      flag = flag.slice(0, eq);
    }

    if (!isRunFlag(flag)) return `Unknown option: ${flag}`;
    if (value === undefined) {
      value = argv[i + 1];
      i++;
    }
    if (value === undefined || value === "") return `${flag} expects a value`;

    switch (flag) {
      case "--url":
        args.targetUrl = value;
        break;
      case "--candidates": {
        const n = parseCount(flag, value);
        if (typeof n === "string") return n;
        args.candidateCount = n;
        break;
      }
      case "--execute": {
        const n = parseCount(flag, value);
        if (typeof n === "string") return n;
        args.executeCount = n;
        break;
      }
      case "--categories":
        args.categories = value.split(",").map((s) => s.trim()).filter(Boolean);
        break;
      case "--run-id":
        args.runId = value;
        break;
    }
  }

  return args;
}

export function parseArgs(argv: string[]): CliCommand {
  const [command = "help", ...rest] = argv;

  switch (command.toLowerCase()) {
    case "help":
    case "--help":
    case "-h":
      return { type: "help" };
    case "run": {
      const args = parseRunArgs(rest);
      return typeof args === "string" ? { type: "invalid", message: args } : { type: "run", args };
    }
    case "reports":
      return { type: "reports" };
    case "show":
      return rest[0]
        ? { type: "show", name: rest[0] }
        : { type: "invalid", message: "show expects a report name" };
    default:
      return { type: "invalid", message: `Unknown command: ${command}` };
  }
}

export function getHelpText(): string {
  return [
    "Usage: qa-campaign <command> [options]",
    "",
    "Commands:",
    "  run               Plan, rank, execute and analyze a test campaign",
    "    --url <url>         Target web application (default: TARGET_URL)",
    "    --candidates <n>    Test cases to generate (default: NUM_CANDIDATES)",
    "    --execute <n>       Test cases to execute (default: NUM_EXECUTE)",
    "    --categories <a,b>  Test categories to cover",
    "    --run-id <id>       Use this run identifier instead of a timestamp",
    "  reports           List saved reports, newest first",
    "  show <name>       Print one saved report",
    "  help              Show this help text",
  ].join("\n");
}
