/**
 * Downloads Listing Service
 * Lists media files already present in the download directory.
 */

import { readdir, stat } from "fs/promises";
import type { Dirent, Stats } from "fs";
import path from "path";

export interface DownloadedFile {
  name: string;
  sizeBytes: number;
  path: string;
}

/**
 * Regular files in `downloadDir`, sorted by name.
 * A missing directory yields an empty list.
 */
export async function listDownloadedFiles(downloadDir: string): Promise<DownloadedFile[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(downloadDir, { withFileTypes: true });
  } catch (error) {
    if (isNotFound(error)) {
      return [];
    }
    throw error;
  }

  const files: DownloadedFile[] = [];
  for (const entry of entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))) {
    if (entry.isDirectory()) {
      continue;
    }

    const filePath = path.join(downloadDir, entry.name);
    let stats: Stats;
    try {
      // Follows symlinks; a dangling link or a file removed mid-scan is skipped
      stats = await stat(filePath);
    } catch (error) {
      if (isNotFound(error)) {
        continue;
      }
      throw error;
    }

    if (stats.isFile()) {
      files.push({ name: entry.name, sizeBytes: stats.size, path: filePath });
    }
  }

  return files;
}

function isNotFound(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}
