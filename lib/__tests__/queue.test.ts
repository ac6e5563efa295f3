import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { ConfigurationError } from "@/lib/pipeline/core/errors";
import { pipelineSettingsSchema, type RunRecord } from "@/lib/pipeline/core/schemas";
import { cleanPages } from "@/lib/pipeline/cleaning/cleaner";
import { sliceDocument } from "@/lib/pipeline/slicing/slicer";
import { tagBlock } from "@/lib/pipeline/tagging/role-classifier";
import { createRunQueue, RunQueue, type RunJob } from "@/lib/queue";

const settings = pipelineSettingsSchema.parse({});

function request(url: string) {
  return {
    source_url: url,
    max_pages: 1,
    delay_seconds: 0,
    max_block_chars: 200,
    min_block_chars: 10,
  };
}

function fakeRecord(job: RunJob, state: "COMPLETE" | "FAILED"): RunRecord {
  return {
    run_id: `run_2024-03-01_12-00-00_${job.id === "job_1" ? "aaaaaa" : "bbbbbb"}`,
    state,
    request: { ...job.request },
    settings,
    created_at: "2024-03-01T12:00:00.000Z",
    stages: [],
    warnings: [],
    failure:
      state === "FAILED"
        ? { stage: "fetch", state: "FETCHING", kind: "StageError", error: "offline" }
        : undefined,
  };
}

/** An executor whose runs finish only when the test says so. */
function controllableExecutor() {
  const release = new Map<string, (state: "COMPLETE" | "FAILED") => void>();
  const started: string[] = [];
  const execute = (job: RunJob) =>
    new Promise<RunRecord>((resolve) => {
      started.push(job.id);
      release.set(job.id, (state) => resolve(fakeRecord(job, state)));
    });
  const finish = (id: string, state: "COMPLETE" | "FAILED" = "COMPLETE") => {
    const fn = release.get(id);
    if (!fn) throw new Error(`${id} has not started`);
    fn(state);
  };
  return { execute, started, finish };
}

describe("RunQueue", () => {
  it("runs at most `concurrency` jobs at once", async () => {
    const exec = controllableExecutor();
    const queue = new RunQueue({ concurrency: 1, execute: exec.execute });

    const first = queue.submit(request("https://example.com/a"));
    const second = queue.submit(request("https://example.com/b"));

    expect(exec.started).toEqual([first]);
    expect(queue.getStats()).toEqual({ queued: 1, running: 1, completed: 0, failed: 0 });
    expect(queue.getActiveJobs().map((j) => j.id)).toEqual([first, second]);

    exec.finish(first);
    const done = await queue.waitFor(first);
    expect(done.status).toBe("completed");
    expect(done.runId).toBe("run_2024-03-01_12-00-00_aaaaaa");
    expect(exec.started).toEqual([first, second]);

    exec.finish(second, "FAILED");
    const failed = await queue.waitFor(second);
    expect(failed.status).toBe("failed");
    expect(failed.state).toBe("FAILED");
    expect(failed.error).toBe("offline");
    expect(queue.getActiveJobs()).toEqual([]);
  });

  it("rejects an invalid submission without queueing it", () => {
    const exec = controllableExecutor();
    const queue = new RunQueue({ concurrency: 2, execute: exec.execute });

    expect(() => queue.submit(request("mailto:someone@example.com"))).toThrow(ConfigurationError);
    expect(queue.getStats()).toEqual({ queued: 0, running: 0, completed: 0, failed: 0 });
    expect(exec.started).toEqual([]);
  });

  it("marks a job failed when the executor throws", async () => {
    const queue = new RunQueue({
      concurrency: 2,
      execute: async () => {
        throw new Error("disk full");
      },
    });

    const id = queue.submit(request("https://example.com/a"));
    const job = await queue.waitFor(id);
    expect(job.status).toBe("failed");
    expect(job.error).toBe("disk full");
  });

  it("notifies listeners of every status change", async () => {
    const exec = controllableExecutor();
    const queue = new RunQueue({ concurrency: 1, execute: exec.execute });
    const seen: string[] = [];
    const listener = (job: RunJob) => seen.push(`${job.id}:${job.status}`);
    queue.subscribe(listener);

    const id = queue.submit(request("https://example.com/a"));
    exec.finish(id);
    await queue.waitFor(id);
    queue.unsubscribe(listener);

    expect(seen).toEqual(["job_1:queued", "job_1:running", "job_1:completed"]);
  });

  it("rejects waiting on an unknown job", async () => {
    const queue = new RunQueue({ concurrency: 1, execute: controllableExecutor().execute });
    await expect(queue.waitFor("job_99")).rejects.toThrow("Unknown job: job_99");
  });
});

describe("createRunQueue", () => {
  let runsRoot: string;

  beforeEach(() => {
    runsRoot = fs.mkdtempSync(path.join(os.tmpdir(), "queue-test-"));
  });

  afterEach(() => {
    fs.rmSync(runsRoot, { recursive: true, force: true });
  });

  it("executes each submission as its own run", async () => {
    const queue = createRunQueue({
      runsRoot,
      settings,
      concurrency: 2,
      deps: {
        fetchPages: async (url) => ({
          pages: [
            {
              source_url: url,
              page_type: "general",
              segments: [{ kind: "paragraph", text: "Appointments can be booked online seven days a week." }],
              fetched_at: "2024-03-01T12:00:00.000Z",
            },
          ],
          warnings: [],
          requested: 1,
        }),
        cleanPages,
        sliceDocument,
        tagBlock: (block) => tagBlock(block),
        createGenerator: () => ({ generate: async () => [] }),
      },
    });

    const ids = [
      queue.submit(request("https://example.com/a")),
      queue.submit(request("https://example.com/b")),
    ];
    const jobs = await Promise.all(ids.map((id) => queue.waitFor(id)));

    expect(jobs.map((j) => j.status)).toEqual(["completed", "completed"]);
    expect(jobs[0].runId).not.toBe(jobs[1].runId);
    expect(jobs[1].progress).toBe("Run complete");
    expect(fs.readdirSync(runsRoot)).toHaveLength(2);
  });
});
