/**
 * Download Controller
 * Handles HTTP requests for starting downloads and polling their progress.
 */

import type { Request, Response, NextFunction } from "express";
import type { AppContext } from "../context.js";
import type { StartDownloadBody } from "../middlewares/schemas/downloadSchemas.js";
import { listDownloadedFiles } from "../services/business/downloadsListingService.js";
import { formatMegabytes } from "../utils/format.js";

export function createDownloadController(context: AppContext) {
  return {
    /**
     * POST /api/download
     * Starts a background download job and returns its id.
     */
    startDownload(
      req: Request<Record<string, string>, unknown, StartDownloadBody>,
      res: Response,
      next: NextFunction
    ): void {
      try {
        const { url, quality, audio_only } = req.body;

        const downloadId = context.runner.submit({
          url,
          quality,
          audioOnly: audio_only,
        });

        res.status(202).json({ download_id: downloadId });
      } catch (error) {
        next(error);
      }
    },

    /**
     * GET /api/progress/:downloadId
     * Unknown ids return the not_found record, not an HTTP error.
     */
    getProgress(req: Request<{ downloadId: string }>, res: Response): void {
      res.json(context.registry.get(req.params.downloadId));
    },

    /**
     * GET /api/downloads
     * Lists files in the download directory.
     */
    async listDownloads(_req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const files = await listDownloadedFiles(context.downloadDir);

        res.json({
          files: files.map((file) => ({
            name: file.name,
            size: formatMegabytes(file.sizeBytes),
            path: file.path,
          })),
        });
      } catch (error) {
        next(error);
      }
    },
  };
}
