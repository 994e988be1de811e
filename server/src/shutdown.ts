import type { Logger } from './logger.js';

type SignalTarget = {
  on(signal: NodeJS.Signals, listener: () => void): unknown;
};

export type ShutdownOptions = {
  run: (signal: NodeJS.Signals) => Promise<void>;
  logger: Logger;
  signals?: readonly NodeJS.Signals[];
  target?: SignalTarget;
  exit?: (code: number) => void;
};

/**
 * Runs `run` once on the first signal and exits when it settles. Listeners stay
 * installed so repeated signals are logged and ignored instead of killing the
 * process halfway through parking.
 */
export function handleShutdownSignals(options: ShutdownOptions): void {
  const target = options.target ?? process;
  const exit = options.exit ?? ((code: number) => process.exit(code));
  let shuttingDown = false;

  for (const signal of options.signals ?? (['SIGINT', 'SIGTERM'] as const)) {
    target.on(signal, () => {
      if (shuttingDown) {
        options.logger.warn({ signal }, 'shutdown already in progress');
        return;
      }
      shuttingDown = true;
      options
        .run(signal)
        .then(() => exit(0))
        .catch((error: unknown) => {
          options.logger.error({ error }, 'shutdown failed');
          exit(1);
        });
    });
  }
}
