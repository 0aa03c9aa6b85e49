import { createCampaignCore } from "./core.js";
import { createRunnerServer } from "./server/runner-server.js";
import type { OutputSink } from "./output-sink.js";

const consoleSink: OutputSink = {
  info: (msg) => console.log(`[runner-server] ${msg}`),
  success: (msg) => console.log(`[runner-server] ${msg}`),
  warn: (msg) => console.warn(`[runner-server] ${msg}`),
  error: (msg) => console.error(`[runner-server] ${msg}`),
  phase: (stage, percent, message) => console.log(`[runner-server] [${percent}%] ${stage}: ${message}`),
  separator: () => {},
  log: (msg) => console.log(msg),
};

async function main() {
  const core = await createCampaignCore(consoleSink);
  const server = createRunnerServer(core, { targetUrl: core.config.targetUrl });

  const port = await server.listen(core.config.port);
  console.log(`[runner-server] Server listening on http://localhost:${port}`);
  console.log(`[runner-server] WebSocket: ws://localhost:${port}`);

  process.on("SIGINT", () => {
    console.log("\n[runner-server] Shutting down...");
    server
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error("[runner-server] Shutdown failed:", err);
        process.exit(1);
      });
  });
}

main().catch((err) => {
  console.error("[runner-server] Fatal error:", err);
  process.exit(1);
});
