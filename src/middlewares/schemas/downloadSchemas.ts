/**
 * Download Validation Schemas
 * Zod schemas for download and video-info requests.
 */

import { z } from "zod";

const urlField = z
  .string({ required_error: "URL is required", invalid_type_error: "URL must be a string" })
  .trim()
  .min(1, "URL is required");

export const startDownloadSchema = z.object({
  url: urlField,
  // Any value is accepted; non-string or unknown labels fall back to 720p
  quality: z.unknown().transform((value) => (typeof value === "string" ? value : undefined)),
  // Truthiness: "true", 1 and true enable it; missing, null, 0 and "" do not
  audio_only: z.coerce.boolean(),
});

export const videoInfoSchema = z.object({
  url: urlField,
});

export type StartDownloadBody = z.infer<typeof startDownloadSchema>;
export type VideoInfoBody = z.infer<typeof videoInfoSchema>;
