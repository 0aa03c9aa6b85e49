import { WebSocket } from "ws";
import type { LogPayload, WSMessage } from "@qa-campaign/shared";
import type { OutputSink } from "../output-sink.js";

export type Broadcast = (msg: WSMessage) => void;

export function createBroadcast(clients: Set<WebSocket>): Broadcast {
  return (msg) => {
    const data = JSON.stringify(msg);
    for (const ws of clients) {
      if (ws.readyState === WebSocket.OPEN) ws.send(data);
    }
  };
}

/** Mirrors a run's log output to every connected client, tagged with its run id. */
export function createWsSink(broadcast: Broadcast, runId?: string): OutputSink {
  const log = (level: LogPayload["level"], message: string) =>
    broadcast({ type: "log", id: runId, payload: { level, message } satisfies LogPayload });

  return {
    info(msg: string) {
      log("info", msg);
    },
    success(msg: string) {
      log("success", msg);
    },
    warn(msg: string) {
      log("warn", msg);
    },
    error(msg: string) {
      log("error", msg);
    },
    phase(stage: string, percent: number, message: string) {
      log("info", `[${percent}%] ${stage}: ${message}`);
    },
    separator() {},
    log(msg: string) {
      log("info", msg);
    },
  };
}
