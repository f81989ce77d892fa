// pattern: Imperative Shell
import { mkdirSync, mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { Logger } from "pino";
import type { FeedItem } from "./types";

export type DeliveryJob = {
  readonly item: FeedItem;
  readonly workDir: string;
  /** Deletes the working directory and every artifact in it. Safe to call twice. */
  readonly dispose: () => void;
};

/**
 * Creates a job with a fresh working directory under `workRoot` (the OS temp
 * directory when unset). The directory is owned by this job alone.
 */
export function createDeliveryJob(
  item: FeedItem,
  workRoot: string | undefined,
  logger: Logger,
): DeliveryJob {
  const root = workRoot ?? tmpdir();
  mkdirSync(root, { recursive: true });
  const workDir = mkdtempSync(join(root, "feed-relay-"));
  let disposed = false;

  logger.debug({ itemId: item.id, workDir }, "job working directory created");

  return {
    item,
    workDir,
    dispose: () => {
      if (disposed) return;
      disposed = true;
      try {
        rmSync(workDir, { recursive: true, force: true, maxRetries: 3, retryDelay: 1000 });
        logger.debug({ itemId: item.id, workDir }, "job working directory removed");
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.error(
          { itemId: item.id, workDir, error: message },
          "failed to remove job working directory",
        );
      }
    },
  };
}
