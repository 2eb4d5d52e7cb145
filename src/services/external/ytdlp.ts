/**
 * yt-dlp Download Engine
 * Runs the yt-dlp binary through execa and turns its machine-readable
 * progress output into engine events.
 */

import { execa } from "execa";
import { once } from "events";
import { createInterface } from "readline";
import { z } from "zod";
import { getYtDlpConfig, type YtDlpConfig } from "../../config/ytdlp.js";
import { toErrorMessage } from "../../utils/errorMessages.js";
import type {
  DownloadEngine,
  DownloadPlan,
  EngineProgressEvent,
  ProgressSink,
  VideoMetadata,
} from "./downloadEngine.js";

/** Marks the lines written by our --progress-template */
export const PROGRESS_LINE_PREFIX = "[progress]";

const progressLineSchema = z.object({
  status: z.string(),
  downloaded_bytes: z.number().nullish(),
  total_bytes: z.number().nullish(),
  speed: z.number().nullish(),
  _percent_str: z.string().nullish(),
  filename: z.string().nullish(),
});

const metadataSchema = z.object({
  title: z.string().nullish(),
  duration: z.number().nullish(),
  uploader: z.string().nullish(),
  view_count: z.number().nullish(),
});

/**
 * Parses one stdout line. Returns null for anything that is not a
 * well-formed progress line.
 */
export function parseProgressLine(line: string): EngineProgressEvent | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith(PROGRESS_LINE_PREFIX)) {
    return null;
  }

  let json: unknown;
  try {
    json = JSON.parse(trimmed.slice(PROGRESS_LINE_PREFIX.length));
  } catch {
    return null;
  }

  const parsed = progressLineSchema.safeParse(json);
  if (!parsed.success) {
    return null;
  }

  const data = parsed.data;
  return {
    status: data.status,
    downloadedBytes: data.downloaded_bytes ?? undefined,
    totalBytes: data.total_bytes ?? undefined,
    speed: data.speed,
    percentText: data._percent_str ?? undefined,
    filename: data.filename ?? undefined,
  };
}

/**
 * Parses the output of `yt-dlp --dump-single-json`.
 */
export function parseVideoMetadata(raw: string): VideoMetadata {
  const json: unknown = JSON.parse(raw);
  const data = metadataSchema.parse(json);

  return {
    title: data.title || "Unknown Title",
    durationSeconds: data.duration || 0,
    uploader: data.uploader || "Unknown Uploader",
    viewCount: data.view_count || 0,
  };
}

/**
 * Command-line arguments for one transfer.
 */
export function buildDownloadArgs(url: string, plan: DownloadPlan, config: YtDlpConfig): string[] {
  const args = [
    "--no-playlist",
    "--quiet",
    "--no-warnings",
    "--progress",
    "--newline",
    "--progress-template",
    `download:${PROGRESS_LINE_PREFIX}%(progress)j`,
    "--format",
    plan.format,
    "--output",
    plan.outputTemplate,
  ];

  if (plan.restrictFilenames) {
    args.push("--restrict-filenames");
  }

  if (plan.extractAudio) {
    args.push(
      "--extract-audio",
      "--audio-format",
      plan.extractAudio.codec,
      "--audio-quality",
      `${plan.extractAudio.bitrateKbps}K`
    );
  }

  if (config.cookiesPath) {
    args.push("--cookies", config.cookiesPath);
  }

  args.push(url);
  return args;
}

/**
 * Extracts a readable message from a failed yt-dlp run: the last
 * `ERROR:` line of stderr when there is one, else the error's message.
 */
export function describeYtDlpError(error: unknown): string {
  const stderr =
    typeof error === "object" && error !== null && "stderr" in error && typeof error.stderr === "string"
      ? error.stderr
      : "";

  const errorLine = stderr
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.startsWith("ERROR:"))
    .pop();

  if (errorLine) {
    return errorLine.slice("ERROR:".length).trim();
  }
  return toErrorMessage(error);
}

export class YtDlpEngine implements DownloadEngine {
  constructor(private readonly config: YtDlpConfig = getYtDlpConfig()) {}

  async fetchMetadata(url: string): Promise<VideoMetadata> {
    console.log(`[yt-dlp] Fetching metadata: ${url}`);

    const args = ["--dump-single-json", "--no-playlist", "--no-warnings"];
    if (this.config.cookiesPath) {
      args.push("--cookies", this.config.cookiesPath);
    }
    args.push(url);

    try {
      const { stdout } = await execa(this.config.binaryPath, args);
      return parseVideoMetadata(stdout);
    } catch (error) {
      const message = describeYtDlpError(error);
      console.error(`[yt-dlp] Metadata fetch failed: ${message}`);
      throw new Error(message);
    }
  }

  async download(url: string, plan: DownloadPlan, sink?: ProgressSink): Promise<void> {
    console.log(`[yt-dlp] Downloading ${url} (format: ${plan.format})`);

    const subprocess = execa(this.config.binaryPath, buildDownloadArgs(url, plan, this.config));
    const pending: Promise<unknown>[] = [subprocess];

    if (subprocess.stdout) {
      const lines = createInterface({ input: subprocess.stdout, crlfDelay: Infinity });
      lines.on("line", (line: string) => {
        const event = parseProgressLine(line);
        if (!event || !sink) {
          return;
        }
        try {
          sink.accept(event);
        } catch (error) {
          console.warn("[yt-dlp] Progress sink rejected event:", error);
        }
      });
      pending.push(once(lines, "close"));
    }

    try {
      await Promise.all(pending);
    } catch (error) {
      const message = describeYtDlpError(error);
      console.error(`[yt-dlp] Download failed: ${message}`);
      throw new Error(message);
    }

    console.log(`[yt-dlp] Download completed: ${url}`);
  }
}
