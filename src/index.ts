import { resolve } from "node:path";
import { config as loadEnv } from "dotenv";
import { createLogger } from "./logger";
import { loadConfig } from "./config";
import type { AppConfig } from "./config";
import { createStateStore } from "./state/store";
import { pollFeed, resolveFeedSource } from "./pipeline/poller";
import { fetchMedia } from "./pipeline/fetcher";
import { runPipelineCycle } from "./pipeline/controller";
import type { PipelineDeps } from "./pipeline/controller";
import type { CycleReport } from "./pipeline/types";
import { createTelegramDeliverer } from "./delivery/telegram";
import { createPollScheduler } from "./scheduler";
import { registerShutdownHandlers } from "./lifecycle";

// Earlier files win: dotenv never overwrites a variable that is already set.
loadEnv({ path: ".env.local" });
loadEnv({ path: ".env" });

const CONFIG_PATH = process.env["CONFIG_PATH"] ?? "./config.yaml";
const RUN_ONCE = process.env["RUN_ONCE"] === "1" || process.env["RUN_ONCE"] === "true";

async function main(): Promise<void> {
  const bootLogger = createLogger();

  let config: AppConfig;
  try {
    config = loadConfig(resolve(CONFIG_PATH));
  } catch (err) {
    bootLogger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "configuration error",
    );
    process.exit(1);
  }

  const logger = config.logLevel ? createLogger(config.logLevel) : bootLogger;
  logger.info({ runOnce: RUN_ONCE }, "feed-relay starting");

  const token = process.env["TELEGRAM_BOT_TOKEN"];
  if (!token) {
    logger.fatal("TELEGRAM_BOT_TOKEN not set");
    process.exit(1);
  }

  const source = resolveFeedSource(config.feed);
  const statePath = resolve(config.state.path);
  logger.info(
    { feed: source.url, channel: config.delivery.channel, statePath },
    "config loaded",
  );

  const deps: PipelineDeps = {
    source,
    stateStore: createStateStore(statePath, logger),
    pollFeed,
    fetchMedia,
    deliver: createTelegramDeliverer(token, config.delivery),
    config,
    logger,
  };

  if (RUN_ONCE) {
    const controller = new AbortController();
    const cancel = () => controller.abort();
    process.once("SIGTERM", cancel);
    process.once("SIGINT", cancel);

    let report: CycleReport;
    try {
      report = await runPipelineCycle(deps, controller.signal);
    } catch (err) {
      logger.fatal(
        { error: err instanceof Error ? err.message : String(err) },
        "pipeline run failed",
      );
      process.exit(1);
    }
    logger.info(
      { outcome: report.outcome, delivered: report.delivered, skipped: report.skipped.length },
      "single cycle finished",
    );
    process.exit(report.outcome === "halted" ? 1 : 0);
  }

  const scheduler = createPollScheduler(
    config.schedule.poll,
    (signal) => runPipelineCycle(deps, signal),
    logger,
    () => process.exit(1),
  );
  logger.info({ schedule: config.schedule.poll }, "poll scheduler started");

  registerShutdownHandlers({ schedulers: [scheduler], logger });
}

main().catch((err) => {
  console.error("fatal startup error:", err);
  process.exit(1);
});
