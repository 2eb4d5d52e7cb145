#!/usr/bin/env node
/**
 * CLI Entry Point
 * Usage: tube-downloader <url> [--quality 480p] [--audio-only] [--download-dir dir] [--list]
 */
import "dotenv/config";
import { runCli } from "./cli/runCli.js";
import { initializeCookies } from "./config/ytdlp.js";
import { YOUTUBE_COOKIES } from "./config/env.js";
import { YtDlpEngine } from "./services/external/ytdlp.js";

process.on("SIGINT", () => {
  console.log("\n\nDownload interrupted by user.");
  process.exit(1);
});

if (YOUTUBE_COOKIES) {
  initializeCookies(YOUTUBE_COOKIES);
}

runCli(process.argv.slice(2), new YtDlpEngine())
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error(`\nUnexpected error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  });
