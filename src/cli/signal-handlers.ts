/*
Purpose: turn the first SIGINT/SIGTERM into a graceful stop request for a running task.
Assumptions: one handler is installed per command invocation and cleaned up when it returns.
Usage: const stop = createRunStopSignalHandler({ onSignal }); ...; stop.cleanup();
*/

export type StopSignal = "SIGINT" | "SIGTERM";

export type RunStopSignalHandler = {
  signal: AbortSignal;
  cleanup: () => void;
};

const STOP_SIGNALS: StopSignal[] = ["SIGINT", "SIGTERM"];

export function createRunStopSignalHandler(options: {
  onSignal?: (signal: StopSignal) => void;
}): RunStopSignalHandler {
  const controller = new AbortController();

  const handlers = STOP_SIGNALS.map((name) => {
    const handler = (): void => {
      if (controller.signal.aborted) {
        // A second signal while draining exits immediately; state on disk stays resumable.
        process.exit(130);
      }
      options.onSignal?.(name);
      controller.abort({ signal: name });
    };
    process.on(name, handler);
    return { name, handler };
  });

  return {
    signal: controller.signal,
    cleanup: () => {
      for (const { name, handler } of handlers) {
        process.off(name, handler);
      }
    },
  };
}
