import type { IncomingMessage, ServerResponse } from "http";
import type { ErrorPayload, StartRunRequest, StartRunResponse } from "@qa-campaign/shared";
import type { RunRegistry } from "../campaign/run-registry.js";
import { errorMessage } from "../errors.js";
import type { FileReportStore } from "../store/report-store.js";

export interface RouteDeps {
  store: FileReportStore;
  registry: RunRegistry;
  /** Starts a run in the background and returns its id. */
  startRun(request: StartRunRequest): string;
}

type Handler = (req: IncomingMessage, res: ServerResponse) => Promise<void>;

class HttpError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.status = status;
  }
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

async function readBody(req: IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString("utf-8");
}

function optionalCount(body: Record<string, unknown>, key: string): number | undefined {
  const value = body[key];
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new HttpError(400, `${key} must be a non-negative integer`);
  }
  return value;
}

/** Validates a start-run body. Every field is optional. */
export function parseStartRunRequest(raw: string): StartRunRequest {
  if (raw.trim() === "") return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new HttpError(400, "Invalid JSON");
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new HttpError(400, "Request body must be a JSON object");
  }
  const body: Record<string, unknown> = { ...parsed };

  const request: StartRunRequest = {};
  if (body.targetUrl !== undefined) {
    if (typeof body.targetUrl !== "string") throw new HttpError(400, "targetUrl must be a string");
    request.targetUrl = body.targetUrl;
  }
  const candidateCount = optionalCount(body, "candidateCount");
  if (candidateCount !== undefined) request.candidateCount = candidateCount;
  const executeCount = optionalCount(body, "executeCount");
  if (executeCount !== undefined) request.executeCount = executeCount;
  if (body.categories !== undefined) {
    const categories = body.categories;
    if (!Array.isArray(categories) || !categories.every((c): c is string => typeof c === "string")) {
      throw new HttpError(400, "categories must be a list of strings");
    }
    request.categories = categories;
  }
  return request;
}

/**
 * JSON API over the run registry and the report store. CORS is open so a
 * dashboard on another origin can poll it.
 */
export function createRequestHandler(deps: RouteDeps): Handler {
  return async (req, res) => {
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");

    if (req.method === "OPTIONS") {
      res.writeHead(204);
      res.end();
      return;
    }

    const { pathname } = new URL(req.url ?? "/", "http://localhost");
    const segments = pathname.split("/").filter(Boolean).map(decodeURIComponent);

    try {
      if (segments[0] !== "api") throw new HttpError(404, "Not found");
      const [, resource, param] = segments;

      if (req.method === "POST" && resource === "runs" && param === undefined) {
        if (deps.registry.hasActiveRun()) {
          throw new HttpError(409, "A test run is already in progress");
        }
        const request = parseStartRunRequest(await readBody(req));
        const testRunId = deps.startRun(request);
        sendJson(res, 202, { testRunId, status: "started" } satisfies StartRunResponse);
        return;
      }

      if (req.method === "GET" && resource === "status") {
        if (param === undefined) {
          sendJson(res, 200, deps.registry.toDTO(deps.registry.latest()));
          return;
        }
        const entry = deps.registry.get(param);
        if (!entry) throw new HttpError(404, `Unknown run: ${param}`);
        sendJson(res, 200, deps.registry.toDTO(entry));
        return;
      }

      if (req.method === "GET" && resource === "reports") {
        if (param === undefined) {
          sendJson(res, 200, { reports: await deps.store.listReports() });
          return;
        }
        const report = await deps.store.readReport(param);
        if (report === null) throw new HttpError(404, `Report not found: ${param}`);
        sendJson(res, 200, report);
        return;
      }

      if (req.method === "GET" && resource === "artifacts" && param !== undefined) {
        sendJson(res, 200, { testRunId: param, artifacts: await deps.store.listArtifacts(param) });
        return;
      }

      throw new HttpError(404, "Not found");
    } catch (err) {
      if (err instanceof HttpError) {
        sendJson(res, err.status, { message: err.message } satisfies ErrorPayload);
        return;
      }
      console.error("[runner-server] Request failed:", err);
      sendJson(res, 500, { message: errorMessage(err) } satisfies ErrorPayload);
    }
  };
}
