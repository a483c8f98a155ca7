import type { EventEmitter } from "node:events";
import { safeLog } from "./redact";

const SIGTERM_EXIT_CODE = 143;

export type StopHandle = {
  signal: AbortSignal;
  stop: () => void;
};

// first request aborts the signal, a second one exits
export function createStopHandle(
  target: EventEmitter = process,
  exit: (code: number) => void = (code) => process.exit(code)
): StopHandle {
  const controller = new AbortController();
  const stop = () => {
    if (controller.signal.aborted) {
      exit(SIGTERM_EXIT_CODE);
      return;
    }
    safeLog("[main] stopping", "send SIGTERM again to exit immediately");
    controller.abort();
  };
  target.on("SIGTERM", stop);
  return { signal: controller.signal, stop };
}
