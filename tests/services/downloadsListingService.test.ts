import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, rm, symlink, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { listDownloadedFiles } from "../../src/services/business/downloadsListingService.js";

describe("listDownloadedFiles", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "tube-downloader-list-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("lists regular files sorted by name", async () => {
    await writeFile(path.join(dir, "b.mp4"), Buffer.alloc(2));
    await writeFile(path.join(dir, "a.mp3"), Buffer.alloc(1572864));
    await mkdir(path.join(dir, "nested"));

    await expect(listDownloadedFiles(dir)).resolves.toEqual([
      { name: "a.mp3", sizeBytes: 1572864, path: path.join(dir, "a.mp3") },
      { name: "b.mp4", sizeBytes: 2, path: path.join(dir, "b.mp4") },
    ]);
  });

  it("skips dangling symlinks", async () => {
    await writeFile(path.join(dir, "kept.mp4"), Buffer.alloc(3));
    await symlink(path.join(dir, "gone.mp4"), path.join(dir, "broken.mp4"));

    await expect(listDownloadedFiles(dir)).resolves.toEqual([
      { name: "kept.mp4", sizeBytes: 3, path: path.join(dir, "kept.mp4") },
    ]);
  });

  it("lists files reached through a symlink", async () => {
    await writeFile(path.join(dir, "target.mp4"), Buffer.alloc(5));
    await symlink(path.join(dir, "target.mp4"), path.join(dir, "link.mp4"));

    await expect(listDownloadedFiles(dir)).resolves.toEqual([
      { name: "link.mp4", sizeBytes: 5, path: path.join(dir, "link.mp4") },
      { name: "target.mp4", sizeBytes: 5, path: path.join(dir, "target.mp4") },
    ]);
  });

  it("returns an empty list for a missing directory", async () => {
    await expect(listDownloadedFiles(path.join(dir, "absent"))).resolves.toEqual([]);
  });
});
