/**
 * Application Initialization
 * Ensures the download directory exists and yt-dlp cookies are in place.
 */

import { ensureDownloadDir } from "./storage.js";
import { initializeCookies } from "./ytdlp.js";
import { DOWNLOAD_DIR } from "./env.js";

/**
 * Initializes application dependencies on startup.
 */
export async function initializeApp(downloadDir: string = DOWNLOAD_DIR): Promise<void> {
  console.log("Initializing application...");

  try {
    await ensureDownloadDir(downloadDir);

    try {
      initializeCookies();
    } catch (error) {
      // Downloads still work for public videos without cookies
      console.error("[yt-dlp] Failed to write cookies file:", error);
    }

    console.log("✓ Application initialized successfully\n");
  } catch (error) {
    console.error("✗ Application initialization failed:", error);
    throw error;
  }
}
