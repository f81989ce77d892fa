export { pollFeed, resolveFeedSource } from "./poller";
export { filterNewItems } from "./novelty";
export { fetchMedia } from "./fetcher";
export { createDeliveryJob } from "./job";
export { runPipelineCycle } from "./controller";
export type {
  FeedItem,
  FeedSource,
  PollResult,
  DeliveryState,
  Artifact,
  FetchResult,
  DeliveryResult,
  CycleReport,
  SkippedItem,
} from "./types";
export type { PipelineDeps, PollFeedFn } from "./controller";
export type { FetchMediaFn } from "./fetcher";
export type { DeliveryJob } from "./job";
