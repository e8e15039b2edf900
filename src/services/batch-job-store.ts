import { v4 as uuidv4 } from "uuid";
import logger from "../utils/logger";
import {
  BatchAnalysisResult,
  BatchScrapeResult,
  ProgressCallback,
} from "../types/opposition-interface";

export type BatchJobKind = "url" | "party" | "analysis";

export type BatchJobStatus = "pending" | "processing" | "completed" | "failed";

export type BatchJobOutcome =
  | { kind: "scrape"; result: BatchScrapeResult }
  | { kind: "analysis"; result: BatchAnalysisResult };

export interface BatchJob {
  id: string;
  kind: BatchJobKind;
  status: BatchJobStatus;
  progress: number;
  message: string;
  createdAt: Date;
  completedAt: Date | null;
  errorMessage: string | null;
  outcome: BatchJobOutcome | null;
}

export interface StartedJob {
  job: BatchJob;
  /** Settles when the job finishes either way; never rejects. */
  completion: Promise<void>;
}

export interface JobRetention {
  /** Finished jobs of each outcome kept for polling; older ones are dropped. */
  completed: number;
  failed: number;
}

const DEFAULT_RETENTION: JobRetention = { completed: 10, failed: 50 };

/**
 * In-process batch jobs keyed by uuid. Jobs run one at a time in the order
 * they were started; jobs do not survive a restart.
 */
export class BatchJobStore {
  private static instance: BatchJobStore;
  private jobs: Map<string, BatchJob> = new Map();
  private queueTail: Promise<void> = Promise.resolve();

  constructor(private retention: JobRetention = DEFAULT_RETENTION) {}

  public static getInstance(): BatchJobStore {
    if (!BatchJobStore.instance) {
      BatchJobStore.instance = new BatchJobStore();
    }
    return BatchJobStore.instance;
  }

  public start(
    kind: BatchJobKind,
    run: (onProgress: ProgressCallback) => Promise<BatchJobOutcome>
  ): StartedJob {
    const job: BatchJob = {
      id: uuidv4(),
      kind,
      status: "pending",
      progress: 0,
      message: "Queued",
      createdAt: new Date(),
      completedAt: null,
      errorMessage: null,
      outcome: null,
    };
    this.jobs.set(job.id, job);
    logger.info("Batch job created", { action: "batch_job_created", jobId: job.id, jobKind: kind });

    const onProgress: ProgressCallback = (progress, message) => {
      job.progress = progress;
      job.message = message;
      logger.batchProgress(job.id, progress, message);
    };

    const completion = this.queueTail
      .then(() => {
        job.status = "processing";
        job.message = "Processing";
        return run(onProgress);
      })
      .then((outcome) => {
        job.status = "completed";
        job.progress = 1;
        job.message = "Complete";
        job.outcome = outcome;
        job.completedAt = new Date();
        logger.info("Batch job completed", { action: "batch_job_completed", jobId: job.id });
      })
      .catch((error: unknown) => {
        job.status = "failed";
        job.errorMessage = error instanceof Error ? error.message : String(error);
        job.completedAt = new Date();
        logger.error(
          "Batch job failed",
          error instanceof Error ? error : undefined,
          { jobId: job.id, jobKind: kind }
        );
      })
      .finally(() => this.prune());
    this.queueTail = completion;

    return { job, completion };
  }

  private prune(): void {
    const finished: Record<"completed" | "failed", string[]> = { completed: [], failed: [] };
    for (const job of this.jobs.values()) {
      if (job.status === "completed" || job.status === "failed") {
        finished[job.status].push(job.id);
      }
    }

    for (const status of ["completed", "failed"] as const) {
      const excess = finished[status].length - this.retention[status];
      for (const jobId of finished[status].slice(0, Math.max(excess, 0))) {
        this.jobs.delete(jobId);
      }
    }
  }

  public get(jobId: string): BatchJob | undefined {
    return this.jobs.get(jobId);
  }

  public size(): number {
    return this.jobs.size;
  }
}

export default BatchJobStore;
