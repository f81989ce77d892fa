// pattern: Imperative Shell
import {
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  renameSync,
  writeSync,
} from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import type { Logger } from "pino";
import type { DeliveryState, FeedItem } from "../pipeline/types";
import { advanceState } from "./ordering";

const deliveryStateSchema = z.object({
  lastSeenId: z.string().min(1),
  lastSeenPublishedAt: z.number().int().nonnegative(),
});

/**
 * Raised when the state file exists but cannot be read back as a delivery
 * record. The delivery boundary is unknown at that point, so the run halts.
 */
export class StateStoreCorruptError extends Error {
  readonly statePath: string;

  constructor(statePath: string, detail: string) {
    super(`state file at ${statePath} is corrupt: ${detail}`);
    this.name = "StateStoreCorruptError";
    this.statePath = statePath;
  }
}

export type CommitResult =
  | { readonly success: true; readonly state: DeliveryState }
  | { readonly success: false; readonly error: string };

export type StateStore = {
  readonly load: () => DeliveryState | null;
  readonly commit: (item: FeedItem, current: DeliveryState | null) => CommitResult;
};

function writeFileDurably(path: string, contents: string): void {
  const fd = openSync(path, "w", 0o644);
  try {
    writeSync(fd, contents);
    fsyncSync(fd);
  } finally {
    closeSync(fd);
  }
}

/**
 * Creates a JSON file-backed store for the delivery boundary.
 *
 * Commits write the whole record to `<statePath>.tmp`, fsync it, then rename it
 * over `<statePath>`. Rename is atomic on POSIX file systems, so a reader sees
 * either the previous record or the new one. A leftover `.tmp` file from an
 * interrupted commit is never read and is overwritten by the next commit.
 *
 * @param statePath - Location of the state file; its directory is created on first commit
 * @param logger - Logger for commit events
 */
export function createStateStore(statePath: string, logger: Logger): StateStore {
  const tempPath = `${statePath}.tmp`;

  function load(): DeliveryState | null {
    if (!existsSync(statePath)) {
      logger.info({ statePath }, "no delivery state found, treating as first run");
      return null;
    }

    let raw: string;
    try {
      raw = readFileSync(statePath, "utf-8");
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new StateStoreCorruptError(statePath, message);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new StateStoreCorruptError(statePath, `invalid JSON (${message})`);
    }

    const result = deliveryStateSchema.safeParse(parsed);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
        .join("; ");
      throw new StateStoreCorruptError(statePath, issues);
    }

    return result.data;
  }

  function commit(item: FeedItem, current: DeliveryState | null): CommitResult {
    const next = advanceState(current, item);

    try {
      mkdirSync(dirname(statePath), { recursive: true });
      writeFileDurably(tempPath, `${JSON.stringify(next, null, 2)}\n`);
      renameSync(tempPath, statePath);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error(
        { statePath, itemId: item.id, error: message },
        "delivery state commit failed",
      );
      return { success: false, error: message };
    }

    if (next !== current) {
      logger.info(
        { lastSeenId: next.lastSeenId, lastSeenPublishedAt: next.lastSeenPublishedAt },
        "delivery state committed",
      );
    } else {
      logger.warn(
        { itemId: item.id, lastSeenId: next.lastSeenId },
        "committed item is behind the delivery boundary, state unchanged",
      );
    }

    return { success: true, state: next };
  }

  return { load, commit };
}
