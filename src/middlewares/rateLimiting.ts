/**
 * Rate Limiting Middleware
 * Prevents API abuse by limiting request rates.
 *
 * Exposed as factories so each app instance gets its own counters.
 */

import rateLimit from "express-rate-limit";

/**
 * General API rate limiter.
 * Limits: 600 requests per 15 minutes per IP. Progress polls are not counted,
 * clients poll them for as long as a transfer runs.
 */
export function createApiLimiter() {
  return rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    max: 600,
    skip: (req) => req.path.startsWith("/api/progress/"),
    message: { error: "Too many requests from this IP, please try again later." },
    standardHeaders: true, // Return rate limit info in `RateLimit-*` headers
    legacyHeaders: false, // Disable `X-RateLimit-*` headers
  });
}

/**
 * Strict rate limiter for starting downloads.
 * Limits: 30 requests per 15 minutes per IP.
 */
export function createStrictLimiter() {
  return rateLimit({
    windowMs: 15 * 60 * 1000,
    max: 30,
    message: { error: "Too many downloads started, please slow down." },
    standardHeaders: true,
    legacyHeaders: false,
  });
}
