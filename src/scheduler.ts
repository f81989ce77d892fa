import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import type { Logger } from "pino";
import type { CycleReport } from "./pipeline/types";
import { StateStoreCorruptError } from "./state/store";

export type PollScheduler = {
  /** Stops future ticks, cancels the running cycle and resolves once it has settled. */
  readonly stop: () => Promise<void>;
};

export type RunCycleFn = (signal: AbortSignal) => Promise<CycleReport>;

/**
 * Creates and starts a scheduler that runs a pipeline cycle on the cron schedule.
 *
 * - A tick that fires while the previous cycle is still running is skipped, so
 *   two cycles never share the state file or run two fetch subprocesses.
 * - A corrupt state file stops the scheduler and hands the error to `onFatal`.
 * - Any other unexpected error is logged and the next tick runs as usual.
 *
 * @param schedule - Cron expression from `schedule.poll`
 * @param runCycle - One pipeline cycle; receives the signal aborted by `stop()`
 * @param logger - Logger instance for recording cycle events
 * @param onFatal - Called once when the run must halt
 */
export function createPollScheduler(
  schedule: string,
  runCycle: RunCycleFn,
  logger: Logger,
  onFatal: (err: Error) => void,
): PollScheduler {
  let inFlight: Promise<void> | null = null;
  let controller: AbortController | null = null;
  let stopped = false;

  const tick = async (): Promise<void> => {
    controller = new AbortController();
    logger.info("poll cycle starting");
    try {
      const report = await runCycle(controller.signal);
      logger.info(
        {
          outcome: report.outcome,
          delivered: report.delivered.length,
          skipped: report.skipped.length,
        },
        "poll cycle finished",
      );
    } catch (err) {
      if (err instanceof StateStoreCorruptError) {
        logger.fatal({ statePath: err.statePath, error: err.message }, "delivery state corrupt, halting");
        stopped = true;
        task.stop();
        onFatal(err);
        return;
      }
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ error: message }, "poll cycle failed unexpectedly");
    } finally {
      controller = null;
    }
  };

  const task: ScheduledTask = cron.schedule(schedule, () => {
    if (stopped) return;
    if (inFlight) {
      logger.warn("previous poll cycle still running, skipping tick");
      return;
    }
    inFlight = tick().finally(() => {
      inFlight = null;
    });
  });

  return {
    stop: async () => {
      stopped = true;
      task.stop();
      controller?.abort();
      if (inFlight) {
        await inFlight;
      }
    },
  };
}
