/**
 * YouTube URL Validation
 */

/**
 * Recognized video URL shapes. Scheme and "www." are optional; each pattern
 * matches from the start of the string and ignores anything after the id.
 */
const YOUTUBE_URL_PATTERNS: readonly RegExp[] = [
  /^(?:https?:\/\/)?(?:www\.)?youtube\.com\/watch\?v=[\w-]+/,
  /^(?:https?:\/\/)?(?:www\.)?youtu\.be\/[\w-]+/,
  /^(?:https?:\/\/)?(?:www\.)?youtube\.com\/embed\/[\w-]+/,
  /^(?:https?:\/\/)?(?:www\.)?youtube\.com\/v\/[\w-]+/,
];

/** Examples printed by the CLI when a URL is rejected. */
export const SUPPORTED_URL_FORMATS = [
  "https://www.youtube.com/watch?v=VIDEO_ID",
  "https://youtu.be/VIDEO_ID",
  "https://www.youtube.com/embed/VIDEO_ID",
] as const;

export function isValidYouTubeUrl(url: string): boolean {
  return YOUTUBE_URL_PATTERNS.some((pattern) => pattern.test(url));
}
