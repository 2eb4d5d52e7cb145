/**
 * HTTP Server Entry Point
 * Initializes and starts the Express application on a specified port.
 * Handles graceful shutdown on SIGTERM signal.
 */
import "dotenv/config";
import { createServer } from "http";
import { createApp } from "./app.js";
import { createAppContext } from "./context.js";
import { initializeApp } from "./config/init.js";
import { DOWNLOAD_DIR, PORT } from "./config/env.js";
import { YtDlpEngine } from "./services/external/ytdlp.js";

async function start(): Promise<void> {
  // Cookies must be written before the engine resolves its config
  await initializeApp(DOWNLOAD_DIR);

  const context = createAppContext({
    engine: new YtDlpEngine(),
    downloadDir: DOWNLOAD_DIR,
  });

  /** HTTP server instance wrapping the Express application. */
  const server = createServer(createApp(context));

  server.listen(PORT, "0.0.0.0", () => {
    console.log(`Server running on 0.0.0.0:${PORT}`);
    console.log("✓ Server ready to accept requests\n");
  });

  /**
   * Handles graceful shutdown on SIGTERM signal.
   * Running jobs are not cancelled; the yt-dlp children exit with the process.
   */
  process.on("SIGTERM", () => {
    console.log(`Shutting down (${context.runner.activeCount()} active downloads)`);
    server.close(() => process.exit(0));
  });
}

start().catch((error) => {
  console.error("✗ Initialization failed:", error);
  process.exit(1);
});
