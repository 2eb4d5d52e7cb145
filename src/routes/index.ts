/**
 * Route Aggregator
 * Combines all routers into a single router.
 */

import { Router } from "express";
import type { AppContext } from "../context.js";
import { createHealthRouter } from "./health.js";
import { createDownloadsRouter } from "./downloads.js";

export function createRouter(context: AppContext): Router {
  const router = Router();

  /** Register all route modules */
  router.use(createHealthRouter(context));
  router.use("/api", createDownloadsRouter(context));

  return router;
}
