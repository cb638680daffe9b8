/*
Purpose: turn SIGINT/SIGTERM into an AbortSignal for the duration of a locked batch.
Assumptions: only the first signal matters; later signals are absorbed until cleanup().
Usage: const stop = createStopSignalHandler({ onSignal }); ...; stop.cleanup();
*/

export type SignalSource = {
  on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
};

export type StopSignalHandler = {
  signal: AbortSignal;
  isStopped: () => boolean;
  stoppedBy: () => NodeJS.Signals | null;
  cleanup: () => void;
};

export type StopSignalHandlerOptions = {
  signals?: NodeJS.Signals[];
  source?: SignalSource;
  onSignal?: (signal: NodeJS.Signals) => void;
};

export const DEFAULT_STOP_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

export function createStopSignalHandler(options: StopSignalHandlerOptions = {}): StopSignalHandler {
  const source = options.source ?? process;
  const signals = options.signals ?? DEFAULT_STOP_SIGNALS;
  const controller = new AbortController();
  let received: NodeJS.Signals | null = null;

  const listener = (signal: NodeJS.Signals): void => {
    if (received) return;
    received = signal;
    options.onSignal?.(signal);
    controller.abort(signal);
  };

  for (const signal of signals) {
    source.on(signal, listener);
  }

  return {
    signal: controller.signal,
    isStopped: () => received !== null,
    stoppedBy: () => received,
    cleanup: () => {
      for (const signal of signals) {
        source.off(signal, listener);
      }
    },
  };
}
