/**
 * Progress Translator
 * Converts engine progress events into job progress updates.
 */

import path from "path";
import type { EngineProgressEvent, ProgressSink } from "../external/downloadEngine.js";
import type { JobProgressPatch, JobProgressRepository } from "../../repositories/jobProgressRepository.js";
import { formatSpeed, roundToTenth } from "../../utils/format.js";

/**
 * Parses a pre-formatted percentage such as `" 45.2%"`.
 * Returns null when the text is not a plain number.
 */
export function parsePercentText(text: string): number | null {
  const cleaned = text.trim().replace(/%$/, "").trim();
  if (cleaned === "") {
    return null;
  }
  const value = Number(cleaned);
  return Number.isFinite(value) ? value : null;
}

function baseName(filename: string | undefined): string {
  return filename ? path.basename(filename) : "";
}

/**
 * Maps one engine event to the fields it changes.
 * Returns null for events that carry nothing to apply.
 */
export function translateEvent(event: EngineProgressEvent): JobProgressPatch | null {
  if (event.status === "downloading") {
    const { downloadedBytes, totalBytes } = event;

    if (downloadedBytes !== undefined && totalBytes !== undefined && totalBytes > 0) {
      return {
        status: "downloading",
        percent: roundToTenth((downloadedBytes / totalBytes) * 100),
        speedDisplay: formatSpeed(event.speed),
        fileName: baseName(event.filename),
      };
    }

    if (event.percentText !== undefined) {
      const percent = parsePercentText(event.percentText);
      if (percent === null) {
        return null;
      }
      return {
        status: "downloading",
        percent,
        fileName: baseName(event.filename),
      };
    }

    return null;
  }

  if (event.status === "finished") {
    return {
      status: "finished",
      percent: 100,
      fileName: baseName(event.filename),
    };
  }

  return null;
}

export interface RegistrySinkOptions {
  /**
   * When false, a "finished" event only records 100% and the file name;
   * the caller marks the job finished once the engine call has succeeded.
   */
  finishOnEvent?: boolean;
}

/**
 * Sink that writes translated events into one job's registry entry.
 * A malformed event is logged and dropped; it never fails the job.
 */
export function createRegistrySink(
  registry: JobProgressRepository,
  jobId: string,
  options: RegistrySinkOptions = {}
): ProgressSink {
  const finishOnEvent = options.finishOnEvent ?? true;

  return {
    accept(event) {
      try {
        const patch = translateEvent(event);
        if (patch?.status === "finished" && !finishOnEvent) {
          // yt-dlp reports "finished" per file, before post-processing runs
          registry.update(jobId, { status: "downloading", percent: patch.percent, fileName: patch.fileName });
        } else if (patch) {
          registry.update(jobId, patch);
        }
      } catch (error) {
        console.warn(`[download] Skipped malformed progress event for job ${jobId}:`, error);
      }
    },
  };
}

/**
 * Sink that renders progress as a single carriage-return-updated line.
 */
export function createConsoleSink(write: (text: string) => void): ProgressSink {
  return {
    accept(event) {
      try {
        if (event.status === "downloading") {
          const patch = translateEvent(event);
          if (patch?.speedDisplay !== undefined && patch.percent !== undefined) {
            write(`\rDownloading: ${patch.percent.toFixed(1)}% | Speed: ${patch.speedDisplay}`);
          } else if (event.percentText !== undefined) {
            write(`\rDownloading: ${event.percentText.trim()}`);
          }
        } else if (event.status === "finished") {
          write(`\nDownload completed: ${event.filename ?? ""}\n`);
        }
      } catch (error) {
        console.warn("[download] Skipped malformed progress event:", error);
      }
    },
  };
}
