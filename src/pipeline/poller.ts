import Parser from "rss-parser";
import { z } from "zod";
import type { Logger } from "pino";
import type { FeedConfig } from "../config";
import { compareOrderKeys } from "../state/ordering";
import type { FeedItem, FeedSource, PollResult } from "./types";

type CustomItem = {
  videoId?: string;
  id?: string;
  author?: string;
};

const FEED_TIMEOUT_MS = 30_000;

let parserInstance: Parser<Record<string, unknown>, CustomItem> | null = null;

export function createParser(): Parser<Record<string, unknown>, CustomItem> {
  return new Parser<Record<string, unknown>, CustomItem>({
    timeout: FEED_TIMEOUT_MS,
    customFields: {
      item: [["yt:videoId", "videoId"]],
    },
  });
}

export function getParserInstance(): Parser<Record<string, unknown>, CustomItem> {
  if (!parserInstance) {
    parserInstance = createParser();
  }
  return parserInstance;
}

export function setParserInstance(
  parser: Parser<Record<string, unknown>, CustomItem>,
): void {
  parserInstance = parser;
}

export function resetParser(): void {
  parserInstance = null;
}

/**
 * Resolves the configured feed to a fetchable source. A bare channel id maps
 * to the channel's public Atom feed.
 */
export function resolveFeedSource(feed: FeedConfig): FeedSource {
  if ("channelId" in feed) {
    return {
      name: feed.channelId,
      url: `https://www.youtube.com/feeds/videos.xml?channel_id=${encodeURIComponent(feed.channelId)}`,
    };
  }
  return { name: feed.url, url: feed.url };
}

const optionalText = z.string().trim().min(1).optional().catch(undefined);

const rawEntrySchema = z.object({
  videoId: optionalText,
  id: optionalText,
  guid: optionalText,
  link: z.string().url(),
  title: z.string().optional().catch(undefined),
  isoDate: optionalText,
  pubDate: optionalText,
  author: optionalText,
});

type EntryParse =
  | { readonly ok: true; readonly item: FeedItem }
  | { readonly ok: false; readonly reason: string };

/**
 * Narrows one loosely typed feed entry to a FeedItem. Entries without a link
 * or a parseable publish date are rejected; a missing title becomes "".
 */
export function normalizeEntry(entry: unknown): EntryParse {
  const result = rawEntrySchema.safeParse(entry);
  if (!result.success) {
    const reason = result.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    return { ok: false, reason };
  }

  const raw = result.data;
  const dateText = raw.isoDate ?? raw.pubDate;
  const publishedAt = dateText === undefined ? Number.NaN : Date.parse(dateText);
  if (!Number.isFinite(publishedAt) || publishedAt < 0) {
    return { ok: false, reason: `unparseable publish date: ${dateText ?? "missing"}` };
  }

  return {
    ok: true,
    item: {
      id: raw.videoId ?? raw.id ?? raw.guid ?? raw.link,
      title: raw.title ?? "",
      publishedAt,
      sourceUrl: raw.link,
      author: raw.author ?? null,
    },
  };
}

/**
 * Fetches the feed and returns its entries newest-first. Network and parse
 * failures come back as `{ success: false }` so the caller can skip the cycle.
 */
export async function pollFeed(source: FeedSource, logger: Logger): Promise<PollResult> {
  let rawItems: ReadonlyArray<unknown>;
  try {
    const parser = getParserInstance();
    const feed = await parser.parseURL(source.url);
    rawItems = feed.items;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ feedName: source.name, feedUrl: source.url, error: message }, "feed poll failed");
    return { success: false, error: message };
  }

  const items: Array<FeedItem> = [];
  let droppedCount = 0;

  rawItems.forEach((entry, index) => {
    const parsed = normalizeEntry(entry);
    if (parsed.ok) {
      items.push(parsed.item);
    } else {
      droppedCount++;
      logger.warn(
        { feedName: source.name, index, reason: parsed.reason },
        "dropping malformed feed entry",
      );
    }
  });

  items.sort((a, b) => compareOrderKeys(b, a));

  logger.info(
    { feedName: source.name, itemCount: items.length, droppedCount },
    "feed polled successfully",
  );
  return { success: true, items, droppedCount };
}
