/**
 * Job Progress Repository
 * In-memory store of download job progress, keyed by job id.
 *
 * One instance is created per process and injected into both the job runner
 * (writer) and the progress routes (readers). Entries live until the process
 * exits; there is no eviction.
 */

export type JobStatus = "starting" | "downloading" | "finished" | "error" | "not_found";

export interface JobProgress {
  status: JobStatus;
  percent: number;
  speedDisplay: string;
  fileName: string;
  error: string | null;
}

export type JobProgressPatch = Partial<Omit<JobProgress, "status">> & {
  status?: Exclude<JobStatus, "not_found">;
};

/** Statuses only ever move to a higher rank. */
const STATUS_ORDER: Record<JobStatus, number> = {
  not_found: -1,
  starting: 0,
  downloading: 1,
  finished: 2,
  error: 3,
};

export const NOT_FOUND_PROGRESS: Readonly<JobProgress> = Object.freeze({
  status: "not_found",
  percent: 0,
  speedDisplay: "",
  fileName: "",
  error: "Download not found",
});

function isTerminal(progress: JobProgress): boolean {
  return progress.status === "finished" || progress.status === "error" || progress.error !== null;
}

export class JobProgressRepository {
  private readonly jobs = new Map<string, JobProgress>();

  /**
   * Registers a fresh progress record.
   * Throws if the id is already taken.
   */
  create(id: string): JobProgress {
    if (this.jobs.has(id)) {
      throw new Error(`Job ${id} already exists`);
    }

    const progress: JobProgress = {
      status: "starting",
      percent: 0,
      speedDisplay: "",
      fileName: "",
      error: null,
    };
    this.jobs.set(id, progress);

    return { ...progress };
  }

  /**
   * Returns a snapshot of the job's progress, or the not-found sentinel.
   */
  get(id: string): JobProgress {
    const progress = this.jobs.get(id);
    return progress ? { ...progress } : { ...NOT_FOUND_PROGRESS };
  }

  size(): number {
    return this.jobs.size;
  }

  /**
   * Merges the fields present in `patch` into the job's record as one unit.
   *
   * Terminal records are left untouched, status never moves backwards,
   * percent never drops while downloading and the first error wins.
   * Returns whether the patch was applied.
   */
  update(id: string, patch: JobProgressPatch): boolean {
    const current = this.jobs.get(id);
    if (!current || isTerminal(current)) {
      return false;
    }

    const next: JobProgress = { ...current };

    if (patch.status !== undefined && STATUS_ORDER[patch.status] > STATUS_ORDER[current.status]) {
      next.status = patch.status;
    }

    if (patch.percent !== undefined) {
      const percent = Math.min(100, Math.max(0, patch.percent));
      next.percent = next.status === "downloading" ? Math.max(current.percent, percent) : percent;
    }
    if (patch.speedDisplay !== undefined) {
      next.speedDisplay = patch.speedDisplay;
    }
    if (patch.fileName !== undefined) {
      next.fileName = patch.fileName;
    }
    if (patch.error !== undefined && patch.error !== null) {
      next.error = patch.error;
    }

    this.jobs.set(id, next);
    return true;
  }
}
