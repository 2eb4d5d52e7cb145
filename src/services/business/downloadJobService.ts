/**
 * Download Job Service
 * Runs a download job against the engine and tracks submitted jobs.
 */

import path from "path";
import { randomUUID } from "crypto";
import type { DownloadEngine, DownloadPlan, ProgressSink, VideoMetadata } from "../external/downloadEngine.js";
import type { JobProgressRepository } from "../../repositories/jobProgressRepository.js";
import { createRegistrySink } from "./progressTranslator.js";
import { isValidYouTubeUrl } from "../../utils/youtubeUrl.js";
import { toErrorMessage } from "../../utils/errorMessages.js";

export const QUALITY_FORMATS = {
  "720p": "best[height<=720]",
  "480p": "best[height<=480]",
  "360p": "best[height<=360]",
} as const;

export type Quality = keyof typeof QUALITY_FORMATS;

export const DEFAULT_QUALITY: Quality = "720p";

export const AUDIO_FORMAT = "bestaudio/best";
export const AUDIO_BITRATE_KBPS = 192;

export interface DownloadRequest {
  url: string;
  /** Unrecognized labels fall back to 720p */
  quality?: string;
  audioOnly?: boolean;
}

export type DownloadFailureKind = "validation" | "metadata" | "transfer";

export type DownloadJobResult =
  | { ok: true; metadata: VideoMetadata }
  | { ok: false; kind: DownloadFailureKind; message: string };

export interface RunDownloadOptions {
  downloadDir: string;
  sink?: ProgressSink;
  /** Called once metadata is known, before the transfer starts */
  onMetadata?: (metadata: VideoMetadata) => void;
}

export function isQuality(label: string): label is Quality {
  return Object.prototype.hasOwnProperty.call(QUALITY_FORMATS, label);
}

/**
 * Format selection expression for a quality label.
 */
export function selectFormat(quality: string | undefined): string {
  return quality !== undefined && isQuality(quality) ? QUALITY_FORMATS[quality] : QUALITY_FORMATS[DEFAULT_QUALITY];
}

/**
 * Describes the transfer for a request. Audio-only overrides quality.
 */
export function buildDownloadPlan(request: DownloadRequest, downloadDir: string): DownloadPlan {
  const plan: DownloadPlan = {
    format: selectFormat(request.quality),
    outputTemplate: path.join(downloadDir, "%(title)s.%(ext)s"),
    restrictFilenames: true,
  };

  if (request.audioOnly) {
    plan.format = AUDIO_FORMAT;
    plan.extractAudio = { codec: "mp3", bitrateKbps: AUDIO_BITRATE_KBPS };
  }

  return plan;
}

/**
 * Validates the URL, resolves metadata and performs the transfer.
 * Never throws: every failure comes back as a result variant.
 */
export async function runDownloadJob(
  engine: DownloadEngine,
  request: DownloadRequest,
  options: RunDownloadOptions
): Promise<DownloadJobResult> {
  if (!isValidYouTubeUrl(request.url)) {
    return { ok: false, kind: "validation", message: "Invalid YouTube URL" };
  }

  let metadata: VideoMetadata;
  try {
    metadata = await engine.fetchMetadata(request.url);
  } catch (error) {
    return { ok: false, kind: "metadata", message: toErrorMessage(error) };
  }

  options.onMetadata?.(metadata);

  try {
    await engine.download(request.url, buildDownloadPlan(request, options.downloadDir), options.sink);
  } catch (error) {
    return { ok: false, kind: "transfer", message: toErrorMessage(error) };
  }

  return { ok: true, metadata };
}

/**
 * Launches download jobs in the background and records their progress
 * in the registry. Submitting never waits for the transfer.
 */
export class DownloadJobRunner {
  private readonly tasks = new Map<string, Promise<DownloadJobResult>>();

  constructor(
    private readonly registry: JobProgressRepository,
    private readonly engine: DownloadEngine,
    private readonly downloadDir: string,
    private readonly generateId: () => string = randomUUID
  ) {}

  /**
   * Registers a job and starts it. Returns the job id immediately.
   */
  submit(request: DownloadRequest): string {
    const jobId = this.generateId();
    this.registry.create(jobId);

    console.log(`[download] Job ${jobId} accepted: ${request.url}`);

    const task = this.execute(jobId, request)
      .catch((error: unknown): DownloadJobResult => {
        const message = toErrorMessage(error);
        console.error(`[download] Job ${jobId} crashed:`, error);
        this.registry.update(jobId, { status: "error", error: message });
        return { ok: false, kind: "transfer", message };
      })
      .finally(() => {
        this.tasks.delete(jobId);
      });

    this.tasks.set(jobId, task);
    return jobId;
  }

  /**
   * The running task for a job, or undefined once it has settled.
   */
  settled(jobId: string): Promise<DownloadJobResult> | undefined {
    return this.tasks.get(jobId);
  }

  activeCount(): number {
    return this.tasks.size;
  }

  /** Waits for every running job to settle. */
  async drain(): Promise<void> {
    await Promise.all(this.tasks.values());
  }

  private async execute(jobId: string, request: DownloadRequest): Promise<DownloadJobResult> {
    const result = await runDownloadJob(this.engine, request, {
      downloadDir: this.downloadDir,
      sink: createRegistrySink(this.registry, jobId, { finishOnEvent: false }),
    });

    if (result.ok) {
      this.registry.update(jobId, { status: "finished", percent: 100 });
      console.log(`[download] ✓ Job ${jobId} finished: ${result.metadata.title}`);
      return result;
    }

    console.error(`[download] ✗ Job ${jobId} failed (${result.kind}): ${result.message}`);

    if (result.kind === "validation") {
      // Rejected before starting: status stays "starting"
      this.registry.update(jobId, { error: result.message });
    } else {
      this.registry.update(jobId, { status: "error", error: result.message });
    }

    return result;
  }
}
