// pattern: Imperative Shell
import { readFile, stat } from "node:fs/promises";
import { extname } from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import pRetry, { AbortError } from "p-retry";
import { z } from "zod";
import type { Logger } from "pino";
import type { DeliveryConfig } from "../config";
import type { Artifact, DeliveryFailureReason, DeliveryResult, FeedItem } from "../pipeline/types";
import { buildCaption, sanitizePerformer, sanitizeTitle } from "./metadata";

const MAX_RETRY_AFTER_MS = 5 * 60 * 1000;

const apiResponseSchema = z.object({
  ok: z.boolean(),
  result: z.object({ message_id: z.number() }).optional(),
  error_code: z.number().optional(),
  description: z.string().optional(),
  parameters: z.object({ retry_after: z.number().optional() }).optional(),
});

/**
 * Function signature for uploading one artifact to a channel.
 * Never throws: failures are returned with a reason.
 */
export type DeliverFn = (
  artifact: Artifact,
  item: FeedItem,
  channel: string,
  logger: Logger,
) => Promise<DeliveryResult>;

export class TelegramDeliveryError extends Error {
  readonly reason: DeliveryFailureReason;
  readonly retryAfterSeconds: number | null;

  constructor(reason: DeliveryFailureReason, message: string, retryAfterSeconds: number | null = null) {
    super(message);
    this.name = "TelegramDeliveryError";
    this.reason = reason;
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

/**
 * Maps a rejected Bot API call to a failure reason. 5xx answers count as
 * network failures: the upload may or may not have gone through.
 */
export function classifyFailure(status: number, description: string): DeliveryFailureReason {
  if (status === 401 || status === 403 || status === 404) return "AuthError";
  if (status === 413 || /too (big|large)/i.test(description)) return "PayloadTooLarge";
  if (status === 429) return "RateLimited";
  if (status >= 500) return "NetworkError";
  return "Unknown";
}

/**
 * Builds the sendAudio form. Optional fields are left out rather than sent
 * empty: an empty performer or duration means something else to the API.
 */
export async function buildAudioForm(
  artifact: Artifact,
  item: FeedItem,
  channel: string,
): Promise<FormData> {
  const title = sanitizeTitle(item.title);
  const form = new FormData();

  form.append("chat_id", channel);
  form.append(
    "audio",
    new Blob([await readFile(artifact.mediaPath)]),
    `${title}${extname(artifact.mediaPath)}`,
  );
  form.append("title", title);

  const performer = sanitizePerformer(artifact.uploader ?? item.author);
  if (performer !== null) {
    form.append("performer", performer);
  }
  if (artifact.durationSeconds !== null) {
    form.append("duration", String(artifact.durationSeconds));
  }
  if (artifact.thumbnailPath !== null) {
    form.append("thumbnail", new Blob([await readFile(artifact.thumbnailPath)]), "thumbnail.jpg");
  }

  form.append("caption", buildCaption(item.title, item.sourceUrl));
  form.append("parse_mode", "HTML");
  return form;
}

async function sendAudioOnce(url: string, form: FormData, timeoutMs: number): Promise<string> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: "POST",
      body: form,
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new TelegramDeliveryError("NetworkError", message);
  }

  let body: unknown = null;
  try {
    body = await response.json();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new TelegramDeliveryError(
      response.ok ? "Unknown" : classifyFailure(response.status, ""),
      `HTTP ${response.status}: unreadable response body (${message})`,
    );
  }

  const parsed = apiResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new TelegramDeliveryError(
      response.ok ? "Unknown" : classifyFailure(response.status, ""),
      `HTTP ${response.status}: unexpected response shape`,
    );
  }

  const payload = parsed.data;
  if (response.ok && payload.ok && payload.result) {
    return String(payload.result.message_id);
  }

  const status = payload.error_code ?? response.status;
  const description = payload.description ?? response.statusText;
  throw new TelegramDeliveryError(
    classifyFailure(status, description),
    `HTTP ${status}: ${description}`,
    payload.parameters?.retry_after ?? null,
  );
}

/**
 * Creates a Telegram Bot API deliverer bound to the bot token.
 *
 * Only `RateLimited` answers are retried: a 429 guarantees nothing was posted,
 * so repeating the upload cannot duplicate the message. Retries back off
 * exponentially from `retryBaseDelayMs`, after first waiting out any
 * `retry_after` the API asked for.
 */
export function createTelegramDeliverer(token: string, config: DeliveryConfig): DeliverFn {
  const url = `${config.apiBaseUrl.replace(/\/+$/, "")}/bot${token}/sendAudio`;
  const timeoutMs = config.requestTimeoutSeconds * 1000;

  return async function deliver(
    artifact: Artifact,
    item: FeedItem,
    channel: string,
    logger: Logger,
  ): Promise<DeliveryResult> {
    const fail = (reason: DeliveryFailureReason, error: string): DeliveryResult => {
      logger.error(
        { itemId: item.id, title: item.title, channel, kind: "DeliveryFailed", reason, error },
        "delivery failed",
      );
      return { success: false, reason, error };
    };

    let form: FormData;
    try {
      const { size } = await stat(artifact.mediaPath);
      if (size > config.maxUploadBytes) {
        return fail(
          "PayloadTooLarge",
          `media file is ${size} bytes, upload limit is ${config.maxUploadBytes}`,
        );
      }
      form = await buildAudioForm(artifact, item, channel);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return fail("Unknown", `failed to read artifact: ${message}`);
    }

    try {
      const messageId = await pRetry(
        async () => {
          try {
            return await sendAudioOnce(url, form, timeoutMs);
          } catch (err) {
            if (err instanceof TelegramDeliveryError && err.reason === "RateLimited") {
              throw err;
            }
            throw new AbortError(err instanceof Error ? err : String(err));
          }
        },
        {
          retries: config.maxAttempts - 1,
          factor: 2,
          minTimeout: config.retryBaseDelayMs,
          randomize: false,
          onFailedAttempt: async (error) => {
            logger.warn(
              { itemId: item.id, attempt: error.attemptNumber, retriesLeft: error.retriesLeft },
              "delivery rate limited",
            );
            if (
              error.retriesLeft > 0 &&
              error instanceof TelegramDeliveryError &&
              error.retryAfterSeconds !== null
            ) {
              await sleep(Math.min(error.retryAfterSeconds * 1000, MAX_RETRY_AFTER_MS));
            }
          },
        },
      );

      logger.info({ itemId: item.id, channel, messageId }, "item delivered");
      return { success: true, messageId };
    } catch (err) {
      if (err instanceof TelegramDeliveryError) {
        return fail(err.reason, err.message);
      }
      const message = err instanceof Error ? err.message : String(err);
      return fail("Unknown", message);
    }
  };
}
