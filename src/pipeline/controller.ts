// pattern: Imperative Shell
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import type { StateStore } from "../state/store";
import type { DeliverFn } from "../delivery/telegram";
import type { FetchMediaFn } from "./fetcher";
import { createDeliveryJob } from "./job";
import type { DeliveryJob } from "./job";
import { filterNewItems } from "./novelty";
import type {
  CycleReport,
  DeliveryState,
  FeedItem,
  FeedSource,
  PipelinePhase,
  PollResult,
  SkippedItem,
} from "./types";

export type PollFeedFn = (source: FeedSource, logger: Logger) => Promise<PollResult>;

export type PipelineDeps = {
  readonly source: FeedSource;
  readonly stateStore: StateStore;
  readonly pollFeed: PollFeedFn;
  readonly fetchMedia: FetchMediaFn;
  readonly deliver: DeliverFn;
  readonly config: Pick<AppConfig, "fetch" | "delivery">;
  readonly logger: Logger;
};

type ItemOutcome =
  | { readonly kind: "delivered"; readonly state: DeliveryState }
  | { readonly kind: "skipped"; readonly skipped: SkippedItem }
  | { readonly kind: "commitFailed"; readonly error: string };

/**
 * Fetch, deliver and commit one item. The job's working directory is removed
 * on every path out of this function, including thrown errors. A working
 * directory that cannot be created fails the item, not the cycle.
 */
async function processItem(
  item: FeedItem,
  state: DeliveryState | null,
  deps: PipelineDeps,
  enter: (phase: PipelinePhase, item?: FeedItem) => void,
  signal: AbortSignal | undefined,
): Promise<ItemOutcome> {
  const { config, logger } = deps;

  let job: DeliveryJob;
  try {
    job = createDeliveryJob(item, config.fetch.workRoot, logger);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return {
      kind: "skipped",
      skipped: {
        itemId: item.id,
        title: item.title,
        kind: "FetchFailed",
        reason: "toolError",
        error: `failed to create working directory: ${message}`,
      },
    };
  }

  try {
    enter("fetching", item);
    const fetched = await deps.fetchMedia(item, job.workDir, config.fetch, logger, signal);
    if (!fetched.success) {
      return {
        kind: "skipped",
        skipped: {
          itemId: item.id,
          title: item.title,
          kind: "FetchFailed",
          reason: fetched.reason,
          error: fetched.error,
        },
      };
    }

    enter("delivering", item);
    const delivered = await deps.deliver(fetched.artifact, item, config.delivery.channel, logger);
    if (!delivered.success) {
      return {
        kind: "skipped",
        skipped: {
          itemId: item.id,
          title: item.title,
          kind: "DeliveryFailed",
          reason: delivered.reason,
          error: delivered.error,
        },
      };
    }

    enter("committing", item);
    const committed = deps.stateStore.commit(item, state);
    if (!committed.success) {
      return { kind: "commitFailed", error: committed.error };
    }
    return { kind: "delivered", state: committed.state };
  } finally {
    job.dispose();
  }
}

/**
 * Runs one polling cycle: poll → filter → per item (fetch → deliver → commit).
 *
 * - Items are handled strictly one at a time, oldest first.
 * - A fetch or delivery failure skips the item without touching the state, so
 *   the item is offered again on the next poll.
 * - The state is committed after each delivered item, before the next one starts.
 * - A failed commit halts the cycle: the durable boundary no longer matches
 *   what was delivered and continuing would widen the gap.
 * - `StateStoreCorruptError` from loading the state is not caught here.
 */
export async function runPipelineCycle(
  deps: PipelineDeps,
  signal?: AbortSignal,
): Promise<CycleReport> {
  const { logger } = deps;
  const delivered: Array<string> = [];
  const skipped: Array<SkippedItem> = [];

  const enter = (phase: PipelinePhase, item?: FeedItem) => {
    logger.debug({ phase, itemId: item?.id }, "pipeline phase");
  };

  enter("polling");
  const polled = await deps.pollFeed(deps.source, logger);
  if (!polled.success) {
    logger.warn(
      { feedName: deps.source.name, kind: "FeedUnavailable", error: polled.error },
      "feed unavailable, skipping cycle",
    );
    enter("idle");
    return { outcome: "feed_unavailable", delivered, skipped, state: null };
  }

  enter("filtering");
  let state = deps.stateStore.load();
  const queue = filterNewItems(polled.items, state);

  if (queue.length === 0) {
    logger.info({ candidateCount: polled.items.length }, "no new items");
    enter("idle");
    return { outcome: "completed", delivered, skipped, state };
  }

  logger.info(
    { candidateCount: polled.items.length, newCount: queue.length, firstRun: state === null },
    "new items queued",
  );

  let passedOver: Array<string> = [];

  for (const item of queue) {
    if (signal?.aborted) {
      logger.info({ remaining: queue.length - delivered.length - skipped.length }, "cycle cancelled");
      enter("idle");
      return { outcome: "cancelled", delivered, skipped, state };
    }

    const outcome = await processItem(item, state, deps, enter, signal);

    if (outcome.kind === "commitFailed") {
      logger.error(
        { itemId: item.id, title: item.title, error: outcome.error },
        "item delivered but state commit failed, halting cycle",
      );
      delivered.push(item.id);
      enter("idle");
      return { outcome: "halted", delivered, skipped, state };
    }

    if (outcome.kind === "skipped") {
      skipped.push(outcome.skipped);
      passedOver.push(item.id);
      logger.warn(
        {
          itemId: item.id,
          title: item.title,
          kind: outcome.skipped.kind,
          reason: outcome.skipped.reason,
        },
        "item skipped, will retry next cycle",
      );
      continue;
    }

    if (passedOver.length > 0) {
      logger.warn(
        { itemId: item.id, passedOver },
        "delivery boundary moved past skipped items, they will not be offered again",
      );
      passedOver = [];
    }
    state = outcome.state;
    delivered.push(item.id);
  }

  logger.info(
    { deliveredCount: delivered.length, skippedCount: skipped.length },
    "pipeline cycle complete",
  );
  enter("idle");
  return { outcome: signal?.aborted ? "cancelled" : "completed", delivered, skipped, state };
}
