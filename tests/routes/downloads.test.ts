import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { createAppContext, type AppContext } from "../../src/context.js";
import { FakeEngine, transferEvents } from "../helpers/fakeEngine.js";
import { postJson, startTestServer, type TestServer } from "../helpers/testServer.js";

const VIDEO_URL = "https://www.youtube.com/watch?v=dQw4w9WgXcQ";

describe("download API", () => {
  let downloadDir: string;
  let engine: FakeEngine;
  let context: AppContext;
  let server: TestServer;
  let counter: number;

  beforeEach(async () => {
    downloadDir = await mkdtemp(path.join(os.tmpdir(), "tube-downloader-api-"));
    engine = new FakeEngine();
    counter = 0;
    context = createAppContext({ engine, downloadDir, generateId: () => `job-${++counter}` });
    server = await startTestServer(context);
  });

  afterEach(async () => {
    await server.close();
    await context.runner.drain();
    await rm(downloadDir, { recursive: true, force: true });
  });

  describe("POST /api/download", () => {
    it("accepts a job and tracks it to completion", async () => {
      engine.events = transferEvents(path.join(downloadDir, "Test_Clip.mp4"));

      const res = await postJson(`${server.baseUrl}/api/download`, { url: VIDEO_URL, quality: "480p" });

      expect(res.status).toBe(202);
      await expect(res.json()).resolves.toEqual({ download_id: "job-1" });

      await context.runner.drain();
      const progress = await fetch(`${server.baseUrl}/api/progress/job-1`);

      expect(progress.status).toBe(200);
      await expect(progress.json()).resolves.toEqual({
        status: "finished",
        percent: 100,
        speedDisplay: "1.0 MB/s",
        fileName: "Test_Clip.mp4",
        error: null,
      });
      expect(engine.downloads[0].plan.format).toBe("best[height<=480]");
    });

    it("passes audio-only through to the plan", async () => {
      await postJson(`${server.baseUrl}/api/download`, { url: VIDEO_URL, audio_only: true });
      await context.runner.drain();

      expect(engine.downloads[0].plan).toMatchObject({
        format: "bestaudio/best",
        extractAudio: { codec: "mp3", bitrateKbps: 192 },
      });
    });

    it("treats loosely typed options the way a form would send them", async () => {
      const audio = await postJson(`${server.baseUrl}/api/download`, { url: VIDEO_URL, quality: null, audio_only: "true" });
      const video = await postJson(`${server.baseUrl}/api/download`, { url: VIDEO_URL, quality: 1080, audio_only: 0 });

      expect(audio.status).toBe(202);
      expect(video.status).toBe(202);
      await context.runner.drain();

      expect(engine.downloads.map((download) => download.plan.format)).toEqual([
        "bestaudio/best",
        "best[height<=720]",
      ]);
    });

    it("requires a URL", async () => {
      const blank = await postJson(`${server.baseUrl}/api/download`, { url: "   " });
      expect(blank.status).toBe(400);
      await expect(blank.json()).resolves.toMatchObject({ error: "URL is required" });

      const missing = await postJson(`${server.baseUrl}/api/download`, {});
      expect(missing.status).toBe(400);
      await expect(missing.json()).resolves.toMatchObject({ error: "URL is required" });

      expect(context.registry.size()).toBe(0);
    });

    it("rejects malformed JSON", async () => {
      const res = await fetch(`${server.baseUrl}/api/download`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{not json",
      });

      expect(res.status).toBe(400);
    });

    it("reports invalid URLs through the job record", async () => {
      const res = await postJson(`${server.baseUrl}/api/download`, { url: "https://vimeo.com/12345" });
      expect(res.status).toBe(202);

      await context.runner.drain();
      const progress = await fetch(`${server.baseUrl}/api/progress/job-1`);

      await expect(progress.json()).resolves.toEqual({
        status: "starting",
        percent: 0,
        speedDisplay: "",
        fileName: "",
        error: "Invalid YouTube URL",
      });
    });
  });

  describe("GET /api/progress/:downloadId", () => {
    it("returns the not_found record for unknown ids", async () => {
      const res = await fetch(`${server.baseUrl}/api/progress/nope`);

      expect(res.status).toBe(200);
      await expect(res.json()).resolves.toEqual({
        status: "not_found",
        percent: 0,
        speedDisplay: "",
        fileName: "",
        error: "Download not found",
      });
    });

    it("is not throttled by the general request limit", async () => {
      context.registry.create("job-x");

      let last: Response | undefined;
      for (let i = 0; i < 610; i++) {
        last = await fetch(`${server.baseUrl}/api/progress/job-x`);
        expect(last.status).toBe(200);
        await last.arrayBuffer();
      }

      expect(last?.headers.get("ratelimit-limit")).toBeNull();
    }, 30_000);
  });

  describe("GET /api/downloads", () => {
    it("lists downloaded files with sizes", async () => {
      await writeFile(path.join(downloadDir, "Clip.mp3"), Buffer.alloc(1572864));

      const res = await fetch(`${server.baseUrl}/api/downloads`);

      await expect(res.json()).resolves.toEqual({
        files: [{ name: "Clip.mp3", size: "1.5 MB", path: path.join(downloadDir, "Clip.mp3") }],
      });
    });
  });

  describe("POST /api/video-info", () => {
    it("returns video metadata", async () => {
      const res = await postJson(`${server.baseUrl}/api/video-info`, { url: VIDEO_URL });

      expect(res.status).toBe(200);
      await expect(res.json()).resolves.toEqual({
        title: "Test Clip",
        duration: 125,
        uploader: "Test Channel",
        view_count: 42,
        duration_formatted: "2:05",
      });
    });

    it("rejects invalid URLs", async () => {
      const res = await postJson(`${server.baseUrl}/api/video-info`, { url: "https://vimeo.com/12345" });

      expect(res.status).toBe(400);
      await expect(res.json()).resolves.toMatchObject({ error: "Invalid YouTube URL" });
    });

    it("reports fetch failures", async () => {
      engine.metadataError = new Error("Video unavailable");

      const res = await postJson(`${server.baseUrl}/api/video-info`, { url: VIDEO_URL });

      expect(res.status).toBe(400);
      await expect(res.json()).resolves.toMatchObject({ error: "Could not fetch video information" });
    });
  });

  describe("GET /health", () => {
    it("reports job counters", async () => {
      await postJson(`${server.baseUrl}/api/download`, { url: VIDEO_URL });
      await context.runner.drain();

      const res = await fetch(`${server.baseUrl}/health`);

      await expect(res.json()).resolves.toEqual({ ok: true, jobs: 1, active: 0 });
    });
  });
});
