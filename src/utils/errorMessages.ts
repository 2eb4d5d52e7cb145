/**
 * Error Message Utility
 * Converts raw errors into strings for job records and user-facing summaries.
 */

/**
 * String form of any thrown value, as stored in a job's `error` field.
 */
export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}

/**
 * Converts a raw downloader error into a short user-friendly summary.
 */
export function getGenericErrorMessage(error: unknown): string {
  const errorStr = toErrorMessage(error).toLowerCase();

  if (errorStr.includes("invalid youtube url")) {
    return "Invalid URL";
  }
  if (errorStr.includes("requested format")) {
    return "Requested quality not available";
  }
  if (errorStr.includes("private") || errorStr.includes("403")) {
    return "Video is private";
  }
  if (errorStr.includes("unavailable") || errorStr.includes("not available") || errorStr.includes("404")) {
    return "Video unavailable";
  }
  if (errorStr.includes("copyright") || errorStr.includes("blocked")) {
    return "Video blocked";
  }
  if (errorStr.includes("ffmpeg") || errorStr.includes("postprocessing")) {
    return "Audio conversion failed";
  }
  if (errorStr.includes("timeout") || errorStr.includes("timed out")) {
    return "Network timeout";
  }
  if (errorStr.includes("enoent")) {
    return "yt-dlp not found";
  }

  return "Download failed";
}
