// pattern: Functional Core
import type { DeliveryState, FeedItem } from "./types";
import { compareOrderKeys, isAfterBoundary } from "../state/ordering";

function uniqueById(items: ReadonlyArray<FeedItem>): Array<FeedItem> {
  const byId = new Map<string, FeedItem>();
  for (const item of items) {
    const existing = byId.get(item.id);
    // Keep the latest-published copy of a repeated id.
    if (!existing || compareOrderKeys(item, existing) > 0) {
      byId.set(item.id, item);
    }
  }
  return [...byId.values()];
}

/**
 * Selects the candidates that have not been delivered yet, oldest first.
 *
 * - With a committed state, an item is new when it sorts after the boundary
 *   (later `publishedAt`, or the same `publishedAt` and a greater `id`).
 * - Without state (first run) only the newest candidate is returned, so a
 *   fresh install does not replay the whole feed.
 * - Ties on `publishedAt` are ordered by `id` ascending.
 */
export function filterNewItems(
  candidates: ReadonlyArray<FeedItem>,
  state: DeliveryState | null,
): Array<FeedItem> {
  const ordered = uniqueById(candidates).sort(compareOrderKeys);

  if (state === null) {
    const newest = ordered[ordered.length - 1];
    return newest ? [newest] : [];
  }

  return ordered.filter((item) => isAfterBoundary(item, state));
}
