import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { AppConfig } from "../config";
import type { FeedItem } from "../pipeline/types";

/**
 * Creates a test config with sensible defaults for all required fields.
 * @param overrides - Optional top-level sections to replace.
 */
export function createTestConfig(overrides?: Partial<AppConfig>): AppConfig {
  return {
    feed: { channelId: "UCtestchannel" },
    schedule: { poll: "*/15 * * * *" },
    fetch: {
      command: "yt-dlp",
      audioFormat: "mp3",
      targetBitrate: "192K",
      timeoutSeconds: 60,
      extraArgs: [],
    },
    delivery: {
      channel: "@test_channel",
      apiBaseUrl: "https://api.telegram.test",
      requestTimeoutSeconds: 30,
      maxAttempts: 3,
      retryBaseDelayMs: 0,
      maxUploadBytes: 1024 * 1024,
    },
    state: { path: "./data/last_seen.json" },
    ...overrides,
  };
}

/**
 * Creates a feed item; `publishedAt` defaults to 100 and the URL follows the id.
 */
export function createTestItem(overrides?: Partial<FeedItem>): FeedItem {
  const id = overrides?.id ?? "item-1";
  return {
    id,
    title: `Episode ${id}`,
    publishedAt: 100,
    sourceUrl: `https://www.youtube.com/watch?v=${id}`,
    author: "Test Channel",
    ...overrides,
  };
}

/** Creates an empty scratch directory under the OS temp directory. */
export function createTempDir(prefix: string = "feed-relay-test-"): string {
  return mkdtempSync(join(tmpdir(), prefix));
}
