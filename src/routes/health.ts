/**
 * Health Check Routes
 * Infrastructure endpoints for monitoring and orchestration.
 */

import { Router } from "express";
import type { AppContext } from "../context.js";

export function createHealthRouter(context: AppContext): Router {
  const healthRouter = Router();

  /** Simple health check endpoint with job counters. */
  healthRouter.get("/health", (_req, res) => {
    res.json({
      ok: true,
      jobs: context.registry.size(),
      active: context.runner.activeCount(),
    });
  });

  /** Readiness check endpoint for container orchestration. */
  healthRouter.get("/ready", (_req, res) => {
    res.json({ ready: true });
  });

  return healthRouter;
}
