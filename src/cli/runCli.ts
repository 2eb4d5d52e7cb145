/**
 * Command-Line Front End
 * Downloads one video synchronously, printing progress as it goes.
 */

import { mkdir } from "fs/promises";
import { parseArgs } from "util";
import type { DownloadEngine } from "../services/external/downloadEngine.js";
import {
  DEFAULT_QUALITY,
  QUALITY_FORMATS,
  isQuality,
  runDownloadJob,
} from "../services/business/downloadJobService.js";
import { createConsoleSink } from "../services/business/progressTranslator.js";
import { listDownloadedFiles } from "../services/business/downloadsListingService.js";
import { SUPPORTED_URL_FORMATS, isValidYouTubeUrl } from "../utils/youtubeUrl.js";
import { formatDuration, formatMegabytes } from "../utils/format.js";
import { getGenericErrorMessage } from "../utils/errorMessages.js";

export const CLI_NAME = "tube-downloader";
export const CLI_VERSION = "Tube Downloader 1.0.0";

export interface CliIO {
  /** Writes raw text to standard output (no newline added) */
  out: (text: string) => void;
  /** Writes raw text to standard error (no newline added) */
  err: (text: string) => void;
}

export const processIO: CliIO = {
  out: (text) => {
    process.stdout.write(text);
  },
  err: (text) => {
    process.stderr.write(text);
  },
};

export const USAGE = `Usage: ${CLI_NAME} [url] [options]

Download YouTube videos with quality options and progress tracking

Options:
  -q, --quality <quality>    Video quality to download: ${Object.keys(QUALITY_FORMATS).join(", ")} (default: ${DEFAULT_QUALITY})
  -a, --audio-only           Download audio only (MP3 format)
  -d, --download-dir <dir>   Directory to save downloads (default: downloads)
  -l, --list                 List all downloaded files
  -v, --version              Show version number
  -h, --help                 Show this help

Examples:
  ${CLI_NAME} https://www.youtube.com/watch?v=VIDEO_ID
  ${CLI_NAME} https://youtu.be/VIDEO_ID --quality 480p
  ${CLI_NAME} https://www.youtube.com/watch?v=VIDEO_ID --audio-only
  ${CLI_NAME} --list
`;

async function printDownloads(downloadDir: string, io: CliIO): Promise<void> {
  const files = await listDownloadedFiles(downloadDir);
  if (files.length === 0) {
    io.out(`No downloads found in ${downloadDir}\n`);
    return;
  }

  io.out(`Downloaded files in ${downloadDir}:\n`);
  files.forEach((file, index) => {
    io.out(`${String(index + 1).padStart(2)}. ${file.name} (${formatMegabytes(file.sizeBytes)})\n`);
  });
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      quality: { type: "string", short: "q" },
      "audio-only": { type: "boolean", short: "a" },
      "download-dir": { type: "string", short: "d" },
      list: { type: "boolean", short: "l" },
      version: { type: "boolean", short: "v" },
      help: { type: "boolean", short: "h" },
    },
  });
}

/**
 * Runs the CLI and resolves with the process exit code.
 */
export async function runCli(argv: string[], engine: DownloadEngine, io: CliIO = processIO): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    io.err(`error: ${error instanceof Error ? error.message : String(error)}\n\n${USAGE}`);
    return 1;
  }

  const { values, positionals } = parsed;

  if (values.version) {
    io.out(`${CLI_VERSION}\n`);
    return 0;
  }
  if (values.help) {
    io.out(USAGE);
    return 0;
  }

  const downloadDir = values["download-dir"] ?? "downloads";
  await mkdir(downloadDir, { recursive: true });

  if (values.list) {
    await printDownloads(downloadDir, io);
    return 0;
  }

  const url = positionals[0];
  if (!url) {
    io.err(`error: URL is required unless using --list option\n\n${USAGE}`);
    return 1;
  }

  const quality = values.quality ?? DEFAULT_QUALITY;
  if (!isQuality(quality)) {
    io.err(`error: invalid quality '${quality}' (choose from ${Object.keys(QUALITY_FORMATS).join(", ")})\n`);
    return 1;
  }

  if (!isValidYouTubeUrl(url)) {
    io.out("Error: Please provide a valid YouTube URL\n");
    io.out("Supported formats:\n");
    for (const format of SUPPORTED_URL_FORMATS) {
      io.out(`  - ${format}\n`);
    }
    return 1;
  }

  const audioOnly = values["audio-only"] ?? false;

  io.out(`Processing URL: ${url}\n`);
  io.out(`Download directory: ${downloadDir}\n`);
  io.out(`${"-".repeat(50)}\n`);
  io.out("Fetching video information...\n");

  const result = await runDownloadJob(
    engine,
    { url, quality, audioOnly },
    {
      downloadDir,
      sink: createConsoleSink(io.out),
      onMetadata: (metadata) => {
        io.out(`Title: ${metadata.title}\n`);
        io.out(`Uploader: ${metadata.uploader}\n`);
        io.out(`Duration: ${formatDuration(metadata.durationSeconds)}\n\n`);
        io.out(audioOnly ? "Downloading audio-only version...\n" : `Downloading video in ${quality} quality...\n`);
      },
    }
  );

  if (result.ok) {
    io.out(`\nSuccessfully downloaded to: ${downloadDir}\n`);
    io.out("\nDownload completed successfully!\n");
    return 0;
  }

  if (result.kind === "metadata") {
    io.out(`Error getting video info: ${result.message}\n`);
  } else {
    io.out(`\nDownload error: ${result.message}\n`);
  }
  io.out(
    `\nDownload failed (${getGenericErrorMessage(result.message)}). Please check the URL and your internet connection.\n`
  );
  return 1;
}
