export type FeedItem = {
  readonly id: string;
  readonly title: string;
  /** Epoch milliseconds as supplied by the feed. */
  readonly publishedAt: number;
  readonly sourceUrl: string;
  readonly author: string | null;
};

export type FeedSource = {
  readonly name: string;
  readonly url: string;
};

export type PollResult =
  | {
      readonly success: true;
      readonly items: ReadonlyArray<FeedItem>;
      readonly droppedCount: number;
    }
  | { readonly success: false; readonly error: string };

export type DeliveryState = {
  readonly lastSeenId: string;
  readonly lastSeenPublishedAt: number;
};

export type Artifact = {
  readonly mediaPath: string;
  readonly thumbnailPath: string | null;
  readonly durationSeconds: number | null;
  readonly uploader: string | null;
};

export type FetchFailureReason = "toolError" | "timeout" | "cancelled";

export type FetchResult =
  | { readonly success: true; readonly artifact: Artifact }
  | {
      readonly success: false;
      readonly reason: FetchFailureReason;
      readonly error: string;
    };

export type DeliveryFailureReason =
  | "AuthError"
  | "RateLimited"
  | "PayloadTooLarge"
  | "NetworkError"
  | "Unknown";

export type DeliveryResult =
  | { readonly success: true; readonly messageId: string }
  | {
      readonly success: false;
      readonly reason: DeliveryFailureReason;
      readonly error: string;
    };

export type PipelinePhase =
  | "idle"
  | "polling"
  | "filtering"
  | "fetching"
  | "delivering"
  | "committing";

export type SkippedItem = {
  readonly itemId: string;
  readonly title: string;
  readonly kind: "FetchFailed" | "DeliveryFailed";
  readonly reason: FetchFailureReason | DeliveryFailureReason;
  readonly error: string;
};

export type CycleOutcome = "completed" | "feed_unavailable" | "halted" | "cancelled";

export type CycleReport = {
  readonly outcome: CycleOutcome;
  readonly delivered: ReadonlyArray<string>;
  readonly skipped: ReadonlyArray<SkippedItem>;
  readonly state: DeliveryState | null;
};
