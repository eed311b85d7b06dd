/*
Purpose: turn SIGINT/SIGTERM into an abort signal for a running command.
Assumptions: the first signal stops the run gracefully (finish still removes
guests); a second one exits immediately.
Usage: const stop = createRunStopSignalHandler({ onSignal }); ... stop.cleanup();
*/

export type StopSignalHandler = {
  signal: AbortSignal;
  cleanup: () => void;
};

const STOP_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

export function createRunStopSignalHandler(opts: {
  onSignal?: (signal: NodeJS.Signals) => void;
}): StopSignalHandler {
  const controller = new AbortController();

  const handler = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    opts.onSignal?.(signal);
    controller.abort({ signal });
  };

  for (const signal of STOP_SIGNALS) process.on(signal, handler);

  return {
    signal: controller.signal,
    cleanup: () => {
      for (const signal of STOP_SIGNALS) process.off(signal, handler);
    },
  };
}
