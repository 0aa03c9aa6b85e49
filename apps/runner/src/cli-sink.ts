import type { OutputSink } from "./output-sink.js";
import * as display from "./cli/display.js";

export function createCliSink(): OutputSink {
  return {
    info(msg: string) {
      display.info(msg);
    },
    success(msg: string) {
      display.success(msg);
    },
    warn(msg: string) {
      display.warn(msg);
    },
    error(msg: string) {
      display.error(msg);
    },
    phase(stage: string, percent: number, message: string) {
      display.phase(stage, percent, message);
    },
    separator() {
      display.separator();
    },
    log(msg: string) {
      console.log(msg);
    },
  };
}
