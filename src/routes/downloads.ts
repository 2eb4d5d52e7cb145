/**
 * Download Routes
 * JSON API for starting downloads, polling progress and listing files.
 */

import { Router } from "express";
import type { AppContext } from "../context.js";
import { createDownloadController } from "../controllers/downloadController.js";
import { createVideoInfoController } from "../controllers/videoInfoController.js";
import { validateBody } from "../middlewares/validation.js";
import { createStrictLimiter } from "../middlewares/rateLimiting.js";
import { startDownloadSchema, videoInfoSchema } from "../middlewares/schemas/downloadSchemas.js";

export function createDownloadsRouter(context: AppContext): Router {
  const router = Router();
  const downloads = createDownloadController(context);
  const videoInfo = createVideoInfoController(context);

  router.post("/download", createStrictLimiter(), validateBody(startDownloadSchema), downloads.startDownload);
  router.get("/progress/:downloadId", downloads.getProgress);
  router.get("/downloads", downloads.listDownloads);
  router.post("/video-info", validateBody(videoInfoSchema), videoInfo.getInfo);

  return router;
}
