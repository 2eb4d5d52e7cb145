import express from "express";
import helmet from "helmet";
import cors from "cors";
import type { AppContext } from "./context.js";
import { createRouter } from "./routes/index.js";
import { createApiLimiter } from "./middlewares/rateLimiting.js";
import { errorHandler } from "./middlewares/errorHandler.js";

/**
 * Creates the Express application for a given context.
 * Configures global middleware and routes.
 */
export function createApp(context: AppContext) {
  const app = express();

  /** Disable the X-Powered-By header to reduce fingerprinting. */
  app.disable("x-powered-by");

  /** Adds standard security headers. */
  app.use(helmet());
  /** Enables CORS for cross-origin requests. */
  app.use(cors());
  /** Parses JSON request bodies. */
  app.use(express.json({ limit: "100kb" }));

  /** Rate limiting for all routes. */
  app.use(createApiLimiter());

  /** Application routes. */
  app.use(createRouter(context));

  /** Global error handler - MUST be last. */
  app.use(errorHandler);

  return app;
}
