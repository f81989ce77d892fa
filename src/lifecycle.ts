// pattern: Imperative Shell
import type { Logger } from "pino";

/**
 * Represents an object that can be stopped during shutdown. A returned promise
 * is awaited, so in-flight work can finish its cleanup first.
 */
export type Stoppable = {
  readonly stop: () => void | Promise<void>;
};

/**
 * Dependencies for the shutdown handler.
 */
export type ShutdownDeps = {
  readonly schedulers: ReadonlyArray<Stoppable>;
  readonly logger: Logger;
  /** Defaults to `process.exit`. */
  readonly exit?: (code: number) => void;
};

/**
 * Registers SIGTERM and SIGINT signal handlers for graceful shutdown.
 *
 * - Guard against double-shutdown (re-entrant signal delivery)
 * - Stopping a scheduler cancels its running cycle, which kills the fetch
 *   subprocess group and removes the job's artifacts before exit
 * - Each scheduler is stopped independently; one failure does not skip the rest
 * - Exits with code 0 after cleanup
 */
export function registerShutdownHandlers(deps: ShutdownDeps): void {
  let shuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;

    deps.logger.info({ signal }, "shutdown signal received");

    for (const scheduler of deps.schedulers) {
      try {
        await scheduler.stop();
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        deps.logger.error({ error: message }, "error stopping scheduler");
      }
    }

    deps.logger.info("shutdown complete");
    (deps.exit ?? process.exit)(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}
