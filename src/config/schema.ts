import cron from "node-cron";
import { z } from "zod";

const feedConfigSchema = z.union([
  z.object({ channelId: z.string().min(1) }).strict(),
  z.object({ url: z.string().url() }).strict(),
]);

/** Formats yt-dlp's `--audio-format` accepts, minus `best` (extension unknown up front). */
export const AUDIO_FORMATS = ["mp3", "m4a", "aac", "alac", "opus", "vorbis", "flac", "wav"] as const;

const fetchConfigSchema = z.object({
  command: z.string().min(1).default("yt-dlp"),
  audioFormat: z.enum(AUDIO_FORMATS).default("mp3"),
  targetBitrate: z.string().min(1).default("192K"),
  timeoutSeconds: z.number().int().positive().default(900),
  workRoot: z.string().min(1).optional(),
  extraArgs: z.array(z.string()).default([]),
});

const deliveryConfigSchema = z.object({
  channel: z.string().min(1),
  apiBaseUrl: z.string().url().default("https://api.telegram.org"),
  requestTimeoutSeconds: z.number().int().positive().default(300),
  maxAttempts: z.number().int().min(1).max(10).default(3),
  retryBaseDelayMs: z.number().int().nonnegative().default(1000),
  maxUploadBytes: z
    .number()
    .int()
    .positive()
    .default(50 * 1024 * 1024),
});

export const appConfigSchema = z.object({
  feed: feedConfigSchema,
  schedule: z
    .object({
      poll: z
        .string()
        .min(1)
        .refine((expr) => cron.validate(expr), { message: "invalid cron expression" })
        .default("*/15 * * * *"),
    })
    .default({}),
  fetch: fetchConfigSchema.default({}),
  delivery: deliveryConfigSchema,
  state: z
    .object({
      path: z.string().min(1).default("./data/last_seen.json"),
    })
    .default({}),
  logLevel: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .optional(),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type FeedConfig = AppConfig["feed"];
export type FetchConfig = AppConfig["fetch"];
export type AudioFormat = FetchConfig["audioFormat"];
export type DeliveryConfig = AppConfig["delivery"];
