import { describe, it, expect, beforeEach, vi } from "vitest";
import type { Mock } from "vitest";
import pino from "pino";
import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import { createPollScheduler } from "./scheduler";
import type { RunCycleFn } from "./scheduler";
import { StateStoreCorruptError } from "./state/store";
import type { CycleReport } from "./pipeline/types";

vi.mock("node-cron", () => ({
  default: { schedule: vi.fn() },
}));

const completed: CycleReport = { outcome: "completed", delivered: [], skipped: [], state: null };

describe("createPollScheduler", () => {
  const logger = pino({ level: "silent" });
  let tick: (() => void) | null;
  let taskStop: Mock<() => void>;

  beforeEach(() => {
    tick = null;
    taskStop = vi.fn();
    vi.mocked(cron.schedule).mockReset();
    vi.mocked(cron.schedule).mockImplementation((_expression, callback) => {
      tick = () => {
        if (typeof callback === "function") {
          void callback(new Date());
        }
      };
      const task: Pick<ScheduledTask, "stop"> = { stop: taskStop };
      return task as ScheduledTask;
    });
  });

  function fire(): void {
    if (!tick) throw new Error("no task scheduled");
    tick();
  }

  it("should register a cron task with the configured schedule", () => {
    createPollScheduler("*/15 * * * *", vi.fn<RunCycleFn>(), logger, vi.fn());

    expect(cron.schedule).toHaveBeenCalledWith("*/15 * * * *", expect.any(Function));
  });

  it("should run a cycle on each tick", async () => {
    const runCycle = vi.fn<RunCycleFn>().mockResolvedValue(completed);
    const scheduler = createPollScheduler("* * * * *", runCycle, logger, vi.fn());

    fire();
    await scheduler.stop();

    expect(runCycle).toHaveBeenCalledTimes(1);
  });

  it("should skip a tick while the previous cycle is still running", async () => {
    let finish: (report: CycleReport) => void = () => undefined;
    const runCycle = vi.fn<RunCycleFn>().mockImplementation(
      () => new Promise<CycleReport>((resolve) => {
        finish = resolve;
      }),
    );
    createPollScheduler("* * * * *", runCycle, logger, vi.fn());

    fire();
    fire();
    expect(runCycle).toHaveBeenCalledTimes(1);

    finish(completed);
    await vi.waitFor(() => {
      fire();
      expect(runCycle).toHaveBeenCalledTimes(2);
    });
  });

  it("should keep running after an unexpected cycle error", async () => {
    const runCycle = vi
      .fn<RunCycleFn>()
      .mockRejectedValueOnce(new Error("disk unplugged"))
      .mockResolvedValue(completed);
    const onFatal = vi.fn();
    createPollScheduler("* * * * *", runCycle, logger, onFatal);

    fire();
    await vi.waitFor(() => {
      fire();
      expect(runCycle).toHaveBeenCalledTimes(2);
    });
    expect(onFatal).not.toHaveBeenCalled();
    expect(taskStop).not.toHaveBeenCalled();
  });

  it("should stop and report a corrupt state file as fatal", async () => {
    const corrupt = new StateStoreCorruptError("/data/last_seen.json", "invalid JSON");
    const runCycle = vi.fn<RunCycleFn>().mockRejectedValue(corrupt);
    const onFatal = vi.fn();
    createPollScheduler("* * * * *", runCycle, logger, onFatal);

    fire();

    await vi.waitFor(() => expect(onFatal).toHaveBeenCalledWith(corrupt));
    expect(taskStop).toHaveBeenCalled();

    fire();
    expect(runCycle).toHaveBeenCalledTimes(1);
  });

  it("should abort the running cycle on stop and wait for it to settle", async () => {
    const signals: Array<AbortSignal> = [];
    const runCycle = vi.fn<RunCycleFn>().mockImplementation(
      (signal) =>
        new Promise<CycleReport>((resolve) => {
          signals.push(signal);
          signal.addEventListener("abort", () => resolve({ ...completed, outcome: "cancelled" }));
        }),
    );
    const scheduler = createPollScheduler("* * * * *", runCycle, logger, vi.fn());

    fire();
    await scheduler.stop();

    expect(signals).toHaveLength(1);
    expect(signals[0]?.aborted).toBe(true);
    expect(taskStop).toHaveBeenCalled();
  });

  it("should not start cycles after stop", async () => {
    const runCycle = vi.fn<RunCycleFn>().mockResolvedValue(completed);
    const scheduler = createPollScheduler("* * * * *", runCycle, logger, vi.fn());

    await scheduler.stop();
    fire();

    expect(runCycle).not.toHaveBeenCalled();
  });
});
