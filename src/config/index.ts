import { readFileSync } from "node:fs";
import { parse } from "yaml";
import { appConfigSchema } from "./schema";
import type { AppConfig, AudioFormat, FeedConfig, FetchConfig, DeliveryConfig } from "./schema";

type Env = Readonly<Record<string, string | undefined>>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function withSection(
  root: Record<string, unknown>,
  section: string,
  key: string,
  value: string | undefined,
): Record<string, unknown> {
  if (value === undefined || value === "") return root;
  const existing = root[section];
  const current = isRecord(existing) ? existing : {};
  return { ...root, [section]: { ...current, [key]: value } };
}

/**
 * Applies the `.env`-style overrides on top of the parsed YAML document.
 * A channel id from the environment replaces any feed URL from the file.
 */
export function applyEnvOverrides(parsed: unknown, env: Env): unknown {
  let root: Record<string, unknown> = isRecord(parsed) ? parsed : {};

  const channelId = env["YOUTUBE_CHANNEL_ID"];
  if (channelId) {
    root = { ...root, feed: { channelId } };
  }

  root = withSection(root, "delivery", "channel", env["TELEGRAM_CHANNEL_ID"]);
  return root;
}

export function loadConfig(configPath: string, env: Env = process.env): AppConfig {
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to read config file at ${configPath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to parse YAML in ${configPath}: ${message}`);
  }

  const result = appConfigSchema.safeParse(applyEnvOverrides(parsed, env));
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`invalid configuration in ${configPath}:\n${issues}`);
  }

  return result.data;
}

export { AUDIO_FORMATS } from "./schema";
export type { AppConfig, AudioFormat, FeedConfig, FetchConfig, DeliveryConfig };
