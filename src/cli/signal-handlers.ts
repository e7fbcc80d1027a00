const STOP_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

export type RunStopSignalHandler = {
  signal: AbortSignal;
  cleanup: () => void;
  isStopped: () => boolean;
};

// The first SIGINT/SIGTERM aborts the returned signal; a second one gets Node's default handling.
export function createRunStopSignalHandler(
  opts: { onSignal?: (signal: NodeJS.Signals) => void } = {},
): RunStopSignalHandler {
  const controller = new AbortController();
  const listeners = new Map<NodeJS.Signals, () => void>();

  const cleanup = (): void => {
    for (const [name, listener] of listeners) {
      process.off(name, listener);
    }
    listeners.clear();
  };

  for (const name of STOP_SIGNALS) {
    const listener = (): void => {
      try {
        opts.onSignal?.(name);
      } finally {
        if (!controller.signal.aborted) controller.abort(name);
        cleanup();
      }
    };
    listeners.set(name, listener);
    process.once(name, listener);
  }

  return {
    signal: controller.signal,
    cleanup,
    isStopped: () => controller.signal.aborted,
  };
}
