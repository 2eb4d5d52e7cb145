/**
 * Video Info Controller
 * Handles metadata lookups for a video URL.
 */

import type { Request, Response, NextFunction } from "express";
import type { AppContext } from "../context.js";
import type { VideoInfoBody } from "../middlewares/schemas/downloadSchemas.js";
import { getVideoInfo } from "../services/business/videoInfoService.js";

export function createVideoInfoController(context: AppContext) {
  return {
    /**
     * POST /api/video-info
     */
    async getInfo(
      req: Request<Record<string, string>, unknown, VideoInfoBody>,
      res: Response,
      next: NextFunction
    ): Promise<void> {
      try {
        const info = await getVideoInfo(context.engine, req.body.url);
        res.json(info);
      } catch (error) {
        next(error);
      }
    },
  };
}
