/**
 * Download Engine Contract
 * The capability the job runner needs from an external downloader.
 */

export interface VideoMetadata {
  title: string;
  durationSeconds: number;
  uploader: string;
  viewCount: number;
}

/**
 * Progress event as reported by the engine. Which fields are present
 * depends on the engine and on what the remote server tells it.
 */
export interface EngineProgressEvent {
  status: string;
  downloadedBytes?: number;
  totalBytes?: number;
  /** Bytes per second */
  speed?: number | null;
  /** Pre-formatted percentage, e.g. `" 45.2%"` */
  percentText?: string;
  filename?: string;
}

/** Receives progress events while a transfer runs. */
export interface ProgressSink {
  accept(event: EngineProgressEvent): void;
}

export interface AudioExtraction {
  codec: "mp3";
  bitrateKbps: number;
}

/** Engine-independent description of one transfer. */
export interface DownloadPlan {
  /** Format selection expression, e.g. `best[height<=720]` */
  format: string;
  /** Output path template, e.g. `downloads/%(title)s.%(ext)s` */
  outputTemplate: string;
  restrictFilenames: boolean;
  extractAudio?: AudioExtraction;
}

export interface DownloadEngine {
  fetchMetadata(url: string): Promise<VideoMetadata>;
  download(url: string, plan: DownloadPlan, sink?: ProgressSink): Promise<void>;
}
