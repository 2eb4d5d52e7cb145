/**
 * Video Info Service
 * Looks up video metadata without downloading.
 */

import type { DownloadEngine } from "../external/downloadEngine.js";
import { BadRequestError } from "../../utils/errors.js";
import { isValidYouTubeUrl } from "../../utils/youtubeUrl.js";
import { formatDuration } from "../../utils/format.js";
import { toErrorMessage } from "../../utils/errorMessages.js";

export interface VideoInfo {
  title: string;
  duration: number;
  uploader: string;
  view_count: number;
  duration_formatted: string;
}

export async function getVideoInfo(engine: DownloadEngine, url: string): Promise<VideoInfo> {
  if (!isValidYouTubeUrl(url)) {
    throw new BadRequestError("Invalid YouTube URL");
  }

  try {
    const metadata = await engine.fetchMetadata(url);

    return {
      title: metadata.title,
      duration: metadata.durationSeconds,
      uploader: metadata.uploader,
      view_count: metadata.viewCount,
      duration_formatted: formatDuration(metadata.durationSeconds),
    };
  } catch (error) {
    console.error(`[video-info] Failed to fetch ${url}: ${toErrorMessage(error)}`);
    throw new BadRequestError("Could not fetch video information");
  }
}
