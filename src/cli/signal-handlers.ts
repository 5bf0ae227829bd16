const STOP_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

export type PruneStopSignalHandler = {
  signal: AbortSignal;
  cleanup: () => void;
};

// In-flight cloud calls finish and the checkpoint is flushed; only new work stops.
export function createPruneStopSignalHandler(
  opts: { onSignal?: (signal: NodeJS.Signals) => void } = {},
): PruneStopSignalHandler {
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
        if (!controller.signal.aborted) {
          controller.abort(name);
        }
        cleanup();
      }
    };
    listeners.set(name, listener);
    process.once(name, listener);
  }

  return {
    signal: controller.signal,
    cleanup,
  };
}
