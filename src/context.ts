/**
 * Application Context
 * Wires the registry, engine and runner shared by the HTTP routes.
 */

import { JobProgressRepository } from "./repositories/jobProgressRepository.js";
import { DownloadJobRunner } from "./services/business/downloadJobService.js";
import type { DownloadEngine } from "./services/external/downloadEngine.js";

export interface AppContext {
  registry: JobProgressRepository;
  runner: DownloadJobRunner;
  engine: DownloadEngine;
  downloadDir: string;
}

export interface AppContextOptions {
  engine: DownloadEngine;
  downloadDir: string;
  registry?: JobProgressRepository;
  generateId?: () => string;
}

export function createAppContext(options: AppContextOptions): AppContext {
  const registry = options.registry ?? new JobProgressRepository();
  const runner = new DownloadJobRunner(registry, options.engine, options.downloadDir, options.generateId);

  return {
    registry,
    runner,
    engine: options.engine,
    downloadDir: options.downloadDir,
  };
}
