import { randomUUID } from "node:crypto";
import { TransientStorageError, errorMessage } from "../errors.js";

export interface JobQueueOptions {
  /** Jobs running at once */
  concurrency: number;
  /** Retries after the first attempt, transient storage failures only */
  maxRetries: number;
  /** Delay before the first retry; doubles each attempt */
  baseDelayMs: number;
}

export const DEFAULT_JOB_QUEUE_OPTIONS: JobQueueOptions = {
  concurrency: 4,
  maxRetries: 2,
  baseDelayMs: 500,
};

export interface JobContext {
  tournamentId: string;
  stage: string;
}

export type JobState = "queued" | "running" | "succeeded" | "failed";

export interface JobRecord {
  id: string;
  key: string;
  context: JobContext;
  state: JobState;
  attempts: number;
  error: string | null;
  createdAt: Date;
  finishedAt: Date | null;
}

export type JobOutcome<T> =
  | { status: "succeeded"; value: T; attempts: number }
  | { status: "failed"; error: Error; attempts: number };

export interface JobHandle<T> {
  id: string;
  key: string;
  /** Settles once the job finishes. Never rejects. */
  done: Promise<JobOutcome<T>>;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * In-process worker pool. One in-flight job per key; failures are logged with
 * their tournament, stage and attempt and never escape into the process.
 */
export class JobQueue<T> {
  private readonly options: JobQueueOptions;
  private readonly jobs = new Map<string, JobRecord>();
  private readonly inFlight = new Map<string, JobHandle<T>>();
  private readonly waiting: Array<() => void> = [];
  private idleWaiters: Array<() => void> = [];
  private active = 0;

  constructor(options: Partial<JobQueueOptions> = {}) {
    this.options = { ...DEFAULT_JOB_QUEUE_OPTIONS, ...options };
  }

  /**
   * Queue `run` under `key`. While a job with the same key is queued or
   * running, its handle is returned instead of starting another.
   */
  enqueue(
    key: string,
    run: (attempt: number) => Promise<T>,
    context: JobContext,
  ): JobHandle<T> {
    const existing = this.inFlight.get(key);
    if (existing) {
      console.warn(
        `[Job ${existing.id}] ${context.stage} for tournament ${context.tournamentId} already queued`,
      );
      return existing;
    }

    const record: JobRecord = {
      id: randomUUID(),
      key,
      context,
      state: "queued",
      attempts: 0,
      error: null,
      createdAt: new Date(),
      finishedAt: null,
    };
    this.jobs.set(record.id, record);

    const done = this.acquire()
      .then(() => this.execute(record, run))
      .finally(() => {
        this.inFlight.delete(key);
        this.release();
      });

    const handle: JobHandle<T> = { id: record.id, key, done };
    this.inFlight.set(key, handle);
    return handle;
  }

  getJob(id: string): JobRecord | null {
    const record = this.jobs.get(id);
    return record ? { ...record } : null;
  }

  /** Resolves once nothing is queued or running. */
  onIdle(): Promise<void> {
    if (this.active === 0 && this.waiting.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private acquire(): Promise<void> {
    if (this.active < this.options.concurrency) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiting.push(() => {
        this.active++;
        resolve();
      });
    });
  }

  private release(): void {
    this.active--;
    const next = this.waiting.shift();
    if (next) {
      next();
      return;
    }
    if (this.active === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      waiters.forEach((resolve) => resolve());
    }
  }

  private async execute(
    record: JobRecord,
    run: (attempt: number) => Promise<T>,
  ): Promise<JobOutcome<T>> {
    record.state = "running";
    const maxAttempts = this.options.maxRetries + 1;

    for (let attempt = 1; ; attempt++) {
      record.attempts = attempt;
      try {
        const value = await run(attempt);
        record.state = "succeeded";
        record.finishedAt = new Date();
        return { status: "succeeded", value, attempts: attempt };
      } catch (error) {
        const { tournamentId, stage } = record.context;
        console.error(
          `[Job ${record.id}] ${stage} failed for tournament ${tournamentId} (attempt ${attempt}/${maxAttempts}): ${errorMessage(error)}`,
        );

        if (!(error instanceof TransientStorageError) || attempt >= maxAttempts) {
          record.state = "failed";
          record.error = errorMessage(error);
          record.finishedAt = new Date();
          return {
            status: "failed",
            error: error instanceof Error ? error : new Error(String(error)),
            attempts: attempt,
          };
        }

        await sleep(this.options.baseDelayMs * 2 ** (attempt - 1));
      }
    }
  }
}
