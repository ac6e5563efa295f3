import type { PipelineSettings, RunRecord, RunRequest, RunState } from "@/lib/pipeline/core/schemas";
import { executeRun } from "@/lib/pipeline/runner/orchestrator";
import { validateRunRequest } from "@/lib/pipeline/runner/request";
import { createCallbackProgress, type PipelineDeps } from "@/lib/pipeline/runner/types";

// --- Types ---

export type JobStatus = "queued" | "running" | "completed" | "failed";

export interface RunJob {
  id: string;
  sourceUrl: string;
  request: Readonly<RunRequest>;
  status: JobStatus;
  /** Assigned once the run's workspace exists */
  runId?: string;
  state?: RunState;
  progress?: string;
  error?: string;
  createdAt: number;
  startedAt?: number;
  completedAt?: number;
}

export type RunExecutor = (
  job: RunJob,
  update: (patch: Partial<RunJob>) => void
) => Promise<RunRecord>;

export interface RunQueueOptions {
  concurrency: number;
  execute: RunExecutor;
  /** Finished jobs older than this are forgotten */
  retentionMs?: number;
}

// --- Queue ---

/**
 * Runs many pipeline submissions with bounded concurrency. Each job is
 * an independent run with its own workspace; the queue only tracks them.
 */
export class RunQueue {
  private jobs = new Map<string, RunJob>();
  private pending: string[] = [];
  private running = 0;
  private listeners = new Set<(job: RunJob) => void>();
  private waiters = new Map<string, Array<(job: RunJob) => void>>();
  private nextId = 1;
  private readonly concurrency: number;
  private readonly execute: RunExecutor;
  private readonly retentionMs: number;

  constructor(options: RunQueueOptions) {
    this.concurrency = Math.max(1, options.concurrency);
    this.execute = options.execute;
    this.retentionMs = options.retentionMs ?? 60 * 60 * 1000;
  }

  /**
   * Validate and enqueue a run submission.
   * @throws ConfigurationError before anything is queued
   */
  submit(input: unknown): string {
    const request = validateRunRequest(input);
    const id = `job_${this.nextId++}`;
    const job: RunJob = {
      id,
      sourceUrl: request.source_url,
      request,
      status: "queued",
      createdAt: Date.now(),
    };
    this.jobs.set(id, job);
    this.pending.push(id);
    this.notify(job);
    this.drain();
    return id;
  }

  /** Resolves with the job once it has completed or failed. */
  waitFor(id: string): Promise<RunJob> {
    const job = this.jobs.get(id);
    if (!job) return Promise.reject(new Error(`Unknown job: ${id}`));
    if (job.status === "completed" || job.status === "failed") return Promise.resolve(job);
    return new Promise((resolve) => {
      const list = this.waiters.get(id) ?? [];
      list.push(resolve);
      this.waiters.set(id, list);
    });
  }

  private drain(): void {
    while (this.running < this.concurrency) {
      const jobId = this.pending.shift();
      if (jobId === undefined) return;
      const job = this.jobs.get(jobId);
      if (!job) continue;

      this.running++;
      this.updateJob(job, { status: "running", startedAt: Date.now() });
      void this.runJob(job);
    }
  }

  private async runJob(job: RunJob): Promise<void> {
    try {
      const record = await this.execute(job, (patch) => this.updateJob(job, patch));
      this.updateJob(job, {
        runId: record.run_id,
        state: record.state,
        status: record.state === "COMPLETE" ? "completed" : "failed",
        error: record.failure?.error,
        completedAt: Date.now(),
      });
    } catch (err) {
      this.updateJob(job, {
        status: "failed",
        error: err instanceof Error ? err.message : String(err),
        completedAt: Date.now(),
      });
    } finally {
      this.running--;
      this.settle(job);
      this.prune();
      this.drain();
    }
  }

  private settle(job: RunJob): void {
    const list = this.waiters.get(job.id) ?? [];
    this.waiters.delete(job.id);
    for (const resolve of list) resolve(job);
  }

  private updateJob(job: RunJob, patch: Partial<RunJob>) {
    Object.assign(job, patch);
    this.notify(job);
  }

  subscribe(fn: (job: RunJob) => void) {
    this.listeners.add(fn);
  }

  unsubscribe(fn: (job: RunJob) => void) {
    this.listeners.delete(fn);
  }

  private notify(job: RunJob) {
    for (const fn of this.listeners) {
      try {
        fn(job);
      } catch (err) {
        console.warn(
          `Queue listener failed on ${job.id}: ${err instanceof Error ? err.message : String(err)}`
        );
      }
    }
  }

  getStats(): { queued: number; running: number; completed: number; failed: number } {
    const stats = { queued: 0, running: 0, completed: 0, failed: 0 };
    for (const job of this.jobs.values()) stats[job.status]++;
    return stats;
  }

  getActiveJobs(): RunJob[] {
    return [...this.jobs.values()].filter(
      (j) => j.status === "queued" || j.status === "running"
    );
  }

  getJob(id: string): RunJob | undefined {
    return this.jobs.get(id);
  }

  private prune() {
    const cutoff = Date.now() - this.retentionMs;
    for (const [id, job] of this.jobs) {
      if (
        (job.status === "completed" || job.status === "failed") &&
        job.completedAt !== undefined &&
        job.completedAt < cutoff
      ) {
        this.jobs.delete(id);
      }
    }
  }
}

// --- Pipeline executor ---

export interface PipelineQueueOptions {
  runsRoot: string;
  settings: PipelineSettings;
  deps: PipelineDeps;
  concurrency: number;
}

/**
 * A queue whose jobs are full pipeline runs.
 */
export function createRunQueue(options: PipelineQueueOptions): RunQueue {
  return new RunQueue({
    concurrency: options.concurrency,
    execute: (job, update) =>
      executeRun({
        runsRoot: options.runsRoot,
        request: job.request,
        settings: options.settings,
        deps: options.deps,
        progress: createCallbackProgress((message) => update({ progress: message })),
        onCreated: (runId) => update({ runId }),
      }),
  });
}
