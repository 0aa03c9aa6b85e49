import http from "http";
import { WebSocketServer, WebSocket } from "ws";
import type {
  ProgressPayload,
  RunFinishedPayload,
  RunStartedPayload,
  StartRunRequest,
  WSMessage,
} from "@qa-campaign/shared";
import type { CampaignCore } from "../core.js";
import { createRunId } from "../campaign/phase-controller.js";
import { executionSuccessRate } from "../campaign/workflow-report.js";
import { errorMessage } from "../errors.js";
import { createBroadcast, createWsSink } from "./broadcast.js";
import { createRequestHandler } from "./routes.js";

export interface RunnerServer {
  httpServer: http.Server;
  wss: WebSocketServer;
  /** Resolves with the bound port. */
  listen(port: number): Promise<number>;
  close(): Promise<void>;
  /** Settles when every run started by this server has finished. */
  idle(): Promise<void>;
}

export function createRunnerServer(
  core: Pick<CampaignCore, "store" | "registry" | "createController">,
  defaults: { targetUrl: string },
): RunnerServer {
  const clients = new Set<WebSocket>();
  const broadcast = createBroadcast(clients);
  const active = new Set<Promise<void>>();

  function startRun(request: StartRunRequest): string {
    const testRunId = createRunId();
    const controller = core.createController(createWsSink(broadcast, testRunId));

    broadcast({
      type: "run_started",
      id: testRunId,
      payload: {
        testRunId,
        targetUrl: request.targetUrl ?? defaults.targetUrl,
        startedAt: new Date().toISOString(),
      } satisfies RunStartedPayload,
    });

    const observer = {
      onProgress(stage: string, percent: number, message: string) {
        broadcast({ type: "progress", id: testRunId, payload: { stage, percent, message } satisfies ProgressPayload });
      },
    };

    const pending = controller
      .run({ ...request, runId: testRunId, observer })
      .then((report) => {
        const payload: RunFinishedPayload = {
          testRunId,
          status: report.status,
          verdict: report.finalVerdict,
          successRate: executionSuccessRate(report.phases),
        };
        if (report.error !== undefined) payload.error = report.error;
        broadcast({ type: report.status === "completed" ? "run_completed" : "run_failed", id: testRunId, payload });
        console.log(`[runner-server] Run ${testRunId} ${report.status}`);
      })
      .catch((err: unknown) => {
        console.error(`[runner-server] Run ${testRunId} crashed:`, err);
        broadcast({ type: "error", id: testRunId, payload: { message: errorMessage(err) } });
      })
      .finally(() => {
        active.delete(pending);
      });
    active.add(pending);

    return testRunId;
  }

  const handle = createRequestHandler({ store: core.store, registry: core.registry, startRun });
  const httpServer = http.createServer((req, res) => {
    handle(req, res).catch((err: unknown) => {
      console.error("[runner-server] Unhandled request error:", err);
      if (!res.headersSent) res.writeHead(500);
      res.end();
    });
  });

  const wss = new WebSocketServer({ server: httpServer });

  wss.on("connection", (ws) => {
    clients.add(ws);
    console.log(`[runner-server] Client connected (${clients.size} total)`);

    // Late joiners get the current state straight away.
    const latest = core.registry.latest();
    if (latest) {
      ws.send(JSON.stringify({
        type: "progress",
        id: latest.testRunId,
        payload: { stage: latest.status, percent: latest.progress, message: latest.message } satisfies ProgressPayload,
      } satisfies WSMessage));
    }

    ws.on("close", () => {
      clients.delete(ws);
      console.log(`[runner-server] Client disconnected (${clients.size} total)`);
    });
  });

  return {
    httpServer,
    wss,
    listen(port) {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          httpServer.off("error", reject);
          const address = httpServer.address();
          resolve(typeof address === "object" && address !== null ? address.port : port);
        });
      });
    },
    async close() {
      for (const ws of clients) ws.terminate();
      await new Promise<void>((resolve) => wss.close(() => resolve()));
      await new Promise<void>((resolve, reject) =>
        httpServer.close((err) => (err ? reject(err) : resolve())),
      );
    },
    async idle() {
      await Promise.all([...active]);
    },
  };
}
