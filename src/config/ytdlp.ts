/**
 * yt-dlp Configuration
 * Resolves the binary and the cookie file passed to every yt-dlp run.
 */

import fs from "fs";
import path from "path";
import os from "os";
import { YOUTUBE_COOKIES, YTDLP_PATH } from "./env.js";

/** Cookie file path for YouTube authentication */
export const COOKIES_PATH = path.join(os.tmpdir(), "youtube-cookies.txt");

export interface YtDlpConfig {
  binaryPath: string;
  cookiesPath?: string;
}

/**
 * Writes cookies from YOUTUBE_COOKIES to the cookie file.
 * Returns false when no cookies are configured.
 */
export function initializeCookies(cookies: string | undefined = YOUTUBE_COOKIES): boolean {
  if (!cookies) {
    console.log("[yt-dlp] No YOUTUBE_COOKIES env var found - running without authentication");
    return false;
  }

  fs.writeFileSync(COOKIES_PATH, cookies, "utf-8");
  console.log(`[yt-dlp] ✓ YouTube cookies initialized at ${COOKIES_PATH}`);
  return true;
}

export function getYtDlpConfig(): YtDlpConfig {
  return {
    binaryPath: YTDLP_PATH,
    cookiesPath: fs.existsSync(COOKIES_PATH) ? COOKIES_PATH : undefined,
  };
}
