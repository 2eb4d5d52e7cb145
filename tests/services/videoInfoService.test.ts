import { describe, it, expect } from "vitest";
import { getVideoInfo } from "../../src/services/business/videoInfoService.js";
import { BadRequestError } from "../../src/utils/errors.js";
import { FakeEngine } from "../helpers/fakeEngine.js";

describe("getVideoInfo", () => {
  it("returns metadata with a formatted duration", async () => {
    const engine = new FakeEngine();

    await expect(getVideoInfo(engine, "https://youtu.be/dQw4w9WgXcQ")).resolves.toEqual({
      title: "Test Clip",
      duration: 125,
      uploader: "Test Channel",
      view_count: 42,
      duration_formatted: "2:05",
    });
  });

  it("formats durations under a minute", async () => {
    const engine = new FakeEngine();
    engine.metadata = { ...engine.metadata, durationSeconds: 59 };

    const info = await getVideoInfo(engine, "https://youtu.be/dQw4w9WgXcQ");

    expect(info.duration_formatted).toBe("0:59");
  });

  it("rejects unsupported URLs as bad requests", async () => {
    const engine = new FakeEngine();

    const error = await getVideoInfo(engine, "https://vimeo.com/12345").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BadRequestError);
    expect(error).toMatchObject({ message: "Invalid YouTube URL", statusCode: 400 });
    expect(engine.metadataCalls).toEqual([]);
  });

  it("hides engine failures behind a generic message", async () => {
    const engine = new FakeEngine();
    engine.metadataError = new Error("Sign in to confirm your age");

    await expect(getVideoInfo(engine, "https://youtu.be/dQw4w9WgXcQ")).rejects.toMatchObject({
      message: "Could not fetch video information",
      statusCode: 400,
    });
  });
});
