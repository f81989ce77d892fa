// pattern: Imperative Shell
import { existsSync, readFileSync, readdirSync, rmSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import type { Logger } from "pino";
import type { AudioFormat, FetchConfig } from "../config";
import { runTool } from "./subprocess";
import type { Artifact, FeedItem, FetchResult } from "./types";

const OUTPUT_STEM = "media";

/** File extension yt-dlp gives the extracted audio for each `--audio-format`. */
const AUDIO_EXTENSIONS: Record<AudioFormat, string> = {
  mp3: "mp3",
  m4a: "m4a",
  aac: "m4a",
  alac: "m4a",
  opus: "opus",
  vorbis: "ogg",
  flac: "flac",
  wav: "wav",
};

const toolInfoSchema = z.object({
  duration: z.number().nonnegative().optional().catch(undefined),
  uploader: z.string().optional().catch(undefined),
  channel: z.string().optional().catch(undefined),
});

export type ArtifactPaths = {
  readonly outputTemplate: string;
  readonly mediaPath: string;
  readonly thumbnailPath: string;
  readonly infoPath: string;
};

export function artifactPaths(workDir: string, audioFormat: AudioFormat): ArtifactPaths {
  return {
    outputTemplate: join(workDir, `${OUTPUT_STEM}.%(ext)s`),
    mediaPath: join(workDir, `${OUTPUT_STEM}.${AUDIO_EXTENSIONS[audioFormat]}`),
    thumbnailPath: join(workDir, `${OUTPUT_STEM}.jpg`),
    infoPath: join(workDir, `${OUTPUT_STEM}.info.json`),
  };
}

/**
 * Builds the download-and-transcode command line: audio only, converted to
 * the configured format and quality, plus a jpg thumbnail and the tool's
 * metadata file, all named after a fixed stem inside the working directory.
 */
export function buildToolArgs(
  sourceUrl: string,
  paths: ArtifactPaths,
  config: FetchConfig,
): Array<string> {
  return [
    "--no-playlist",
    "--no-progress",
    "-x",
    "--audio-format",
    config.audioFormat,
    "--audio-quality",
    config.targetBitrate,
    "--write-thumbnail",
    "--convert-thumbnails",
    "jpg",
    "--write-info-json",
    "-o",
    paths.outputTemplate,
    ...config.extraArgs,
    sourceUrl,
  ];
}

function clearDirectory(dir: string): void {
  if (!existsSync(dir)) return;
  for (const entry of readdirSync(dir)) {
    rmSync(join(dir, entry), { recursive: true, force: true });
  }
}

function readToolInfo(
  infoPath: string,
  logger: Logger,
): { durationSeconds: number | null; uploader: string | null } {
  if (!existsSync(infoPath)) {
    return { durationSeconds: null, uploader: null };
  }

  try {
    const result = toolInfoSchema.safeParse(JSON.parse(readFileSync(infoPath, "utf-8")));
    if (!result.success) {
      return { durationSeconds: null, uploader: null };
    }
    const { duration, uploader, channel } = result.data;
    return {
      durationSeconds: duration === undefined ? null : Math.round(duration),
      uploader: uploader ?? channel ?? null,
    };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn({ infoPath, error: message }, "tool metadata unreadable, continuing without it");
    return { durationSeconds: null, uploader: null };
  }
}

/**
 * Downloads and transcodes one item's media in an isolated subprocess.
 *
 * Any failure (nonzero exit, timeout, cancellation, missing output) leaves the
 * working directory empty. Failures are returned, never thrown.
 */
export async function fetchMedia(
  item: FeedItem,
  workDir: string,
  config: FetchConfig,
  logger: Logger,
  signal?: AbortSignal,
): Promise<FetchResult> {
  const paths = artifactPaths(workDir, config.audioFormat);
  const args = buildToolArgs(item.sourceUrl, paths, config);
  const timeoutMs = config.timeoutSeconds * 1000;

  logger.info(
    { itemId: item.id, command: config.command, timeoutMs },
    "starting media fetch",
  );
  logger.debug({ itemId: item.id, args }, "fetch tool arguments");

  const run = await runTool(config.command, args, { cwd: workDir, timeoutMs, signal });

  const fail = (reason: "toolError" | "timeout" | "cancelled", error: string): FetchResult => {
    clearDirectory(workDir);
    logger.warn(
      { itemId: item.id, title: item.title, kind: "FetchFailed", reason, error },
      "media fetch failed",
    );
    return { success: false, reason, error };
  };

  if (run.cancelled) {
    return fail("cancelled", "fetch cancelled");
  }
  if (run.timedOut) {
    return fail("timeout", `fetch tool exceeded ${config.timeoutSeconds}s and was killed`);
  }
  if (run.spawnError !== null) {
    return fail("toolError", `failed to start ${config.command}: ${run.spawnError}`);
  }
  if (run.exitCode !== 0) {
    const status = run.exitCode === null ? `signal ${run.signal ?? "unknown"}` : `code ${run.exitCode}`;
    const detail = run.stderr === "" ? "" : `: ${run.stderr}`;
    return fail("toolError", `${config.command} exited with ${status}${detail}`);
  }
  if (!existsSync(paths.mediaPath)) {
    return fail("toolError", `expected output file missing: ${paths.mediaPath}`);
  }

  const info = readToolInfo(paths.infoPath, logger);
  const artifact: Artifact = {
    mediaPath: paths.mediaPath,
    thumbnailPath: existsSync(paths.thumbnailPath) ? paths.thumbnailPath : null,
    durationSeconds: info.durationSeconds,
    uploader: info.uploader,
  };

  logger.info(
    { itemId: item.id, mediaPath: artifact.mediaPath, hasThumbnail: artifact.thumbnailPath !== null },
    "media fetch complete",
  );
  return { success: true, artifact };
}

export type FetchMediaFn = typeof fetchMedia;
