// pattern: Imperative Shell
import type { Logger } from "pino";

/**
 * A resource that must be released before the process exits.
 */
export type Closeable = {
  readonly name: string;
  readonly close: () => void;
};

/**
 * Dependencies for the shutdown handler.
 */
export type ShutdownDeps = {
  readonly closeables: ReadonlyArray<Closeable>;
  readonly logger: Logger;
};

const SIGNAL_EXIT_CODES = {
  SIGINT: 130,
  SIGTERM: 143,
} as const;

type HandledSignal = keyof typeof SIGNAL_EXIT_CODES;

/**
 * Registers SIGTERM and SIGINT handlers that close the open stores and exit
 * with the conventional 128 + signal code. Seen-sets are written per feed, so
 * an interrupted run keeps whatever it finished.
 *
 * - Guards against double shutdown (re-entrant signal delivery)
 * - Each close runs in its own try/catch so the rest still run
 *
 * @returns A function that removes the handlers again, for a run that ends normally
 */
export function registerShutdownHandlers(deps: ShutdownDeps): () => void {
  let shuttingDown = false;

  const shutdown = (signal: HandledSignal) => {
    if (shuttingDown) return;
    shuttingDown = true;

    deps.logger.info({ signal }, "shutdown signal received");

    for (const closeable of deps.closeables) {
      try {
        closeable.close();
        deps.logger.info({ store: closeable.name }, "store closed");
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        deps.logger.error(
          { store: closeable.name, error: message },
          "error closing store",
        );
      }
    }

    deps.logger.info("shutdown complete");
    process.exit(SIGNAL_EXIT_CODES[signal]);
  };

  const onTerm = () => shutdown("SIGTERM");
  const onInt = () => shutdown("SIGINT");

  process.on("SIGTERM", onTerm);
  process.on("SIGINT", onInt);

  return () => {
    process.off("SIGTERM", onTerm);
    process.off("SIGINT", onInt);
  };
}
