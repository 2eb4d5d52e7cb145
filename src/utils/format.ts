/**
 * Display formatting helpers shared by the API and the CLI.
 */

const BYTES_PER_MB = 1024 * 1024;

/** Rounds to one decimal place. */
export function roundToTenth(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Formats a transfer rate in bytes/second, e.g. `"1.5 MB/s"`.
 * Missing or zero rates render as `"N/A"`.
 */
export function formatSpeed(bytesPerSecond: number | null | undefined): string {
  if (!bytesPerSecond) {
    return "N/A";
  }
  return `${(bytesPerSecond / BYTES_PER_MB).toFixed(1)} MB/s`;
}

/** Formats a byte count as megabytes, e.g. `"12.3 MB"`. */
export function formatMegabytes(bytes: number): string {
  return `${(bytes / BYTES_PER_MB).toFixed(1)} MB`;
}

/** Formats seconds as `m:ss`, e.g. 125 → `"2:05"`. */
export function formatDuration(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  const minutes = Math.floor(seconds / 60);
  const remainder = seconds % 60;
  return `${minutes}:${String(remainder).padStart(2, "0")}`;
}
