// pattern: Functional Core
import type { DeliveryState, FeedItem } from "../pipeline/types";

type OrderKey = {
  readonly publishedAt: number;
  readonly id: string;
};

function keyOf(state: DeliveryState): OrderKey {
  return { publishedAt: state.lastSeenPublishedAt, id: state.lastSeenId };
}

/**
 * Total order over feed entries: publish time first, then id. Ids compare by
 * UTF-16 code units so the result does not depend on the host locale.
 */
export function compareOrderKeys(a: OrderKey, b: OrderKey): number {
  if (a.publishedAt !== b.publishedAt) return a.publishedAt - b.publishedAt;
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

/** True when the item sorts strictly after the committed delivery boundary. */
export function isAfterBoundary(item: FeedItem, state: DeliveryState): boolean {
  return compareOrderKeys(item, keyOf(state)) > 0;
}

/**
 * Returns the delivery state after committing `item`. The boundary only moves
 * forward: committing an item at or behind it returns `current` unchanged.
 */
export function advanceState(
  current: DeliveryState | null,
  item: FeedItem,
): DeliveryState {
  if (current !== null && !isAfterBoundary(item, current)) {
    return current;
  }
  return { lastSeenId: item.id, lastSeenPublishedAt: item.publishedAt };
}
