/**
 * Environment Configuration
 * Exports type-safe environment variables with defaults.
 */

/** Server configuration */
export const PORT = parseInt(process.env.PORT || "3000", 10);
export const NODE_ENV = process.env.NODE_ENV || "development";

/** Directory where downloaded media is written */
export const DOWNLOAD_DIR = process.env.DOWNLOAD_DIR || "downloads";

/**
 * yt-dlp binary. Looked up in PATH unless overridden
 * (e.g. /usr/local/bin/yt-dlp in Docker images).
 */
export const YTDLP_PATH = process.env.YTDLP_PATH || "yt-dlp";

/** Optional Netscape-format cookies for YouTube authentication */
export const YOUTUBE_COOKIES = process.env.YOUTUBE_COOKIES;
