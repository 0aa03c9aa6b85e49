/**
 * Where a run's human-readable output goes. The CLI renders it with chalk;
 * the server forwards it to WebSocket clients as `log` messages.
 */
export interface OutputSink {
  info(msg: string): void;
  success(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  /** Pipeline progress: stage label, overall percent, stage message. */
  phase(stage: string, percent: number, message: string): void;
  /** Visual break between sections; sinks without one ignore it. */
  separator(): void;
  /** Unprefixed line, used for summaries. */
  log(msg: string): void;
}
