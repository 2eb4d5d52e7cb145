/**
 * Storage Setup
 * Handles creation of the local download directory.
 */

import { mkdir } from "fs/promises";

/**
 * Creates the download directory if it doesn't already exist.
 * Idempotent operation - safe to call multiple times.
 */
export async function ensureDownloadDir(downloadDir: string): Promise<void> {
  await mkdir(downloadDir, { recursive: true });
  console.log(`✓ Download directory ready: ${downloadDir}`);
}
