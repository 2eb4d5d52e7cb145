/**
 * Error Handler Middleware
 * Centralized error handling for Express application.
 */

import type { Request, Response, NextFunction } from "express";
import { AppError } from "../utils/errors.js";
import { NODE_ENV } from "../config/env.js";

interface ErrorResponse {
  error: string;
  stack?: string;
}

/**
 * Status carried by errors from Express's own middleware,
 * e.g. 400 from the JSON body parser on malformed input.
 */
function getHttpStatus(error: Error): number | undefined {
  if ("status" in error && typeof error.status === "number" && error.status >= 400 && error.status < 600) {
    return error.status;
  }
  return undefined;
}

/**
 * Global error handler middleware.
 * MUST be registered last in middleware chain.
 */
export function errorHandler(
  error: Error | AppError,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const statusCode = error instanceof AppError ? error.statusCode : getHttpStatus(error) ?? 500;
  const message = error.message || "Internal server error";

  console.error(`[Error] ${statusCode} - ${message}`, {
    error: error.name,
    path: req.path,
    method: req.method,
  });

  const response: ErrorResponse = {
    error: message,
  };

  // Include stack trace in development
  if (NODE_ENV !== "production") {
    response.stack = error.stack;
  }

  res.status(statusCode).json(response);
}
