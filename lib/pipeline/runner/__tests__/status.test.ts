import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { lastValueFrom, toArray } from "rxjs";
import { pipelineSettingsSchema, type RunRecord } from "../../core/schemas";
import { getRunStatus, listRuns, toRunStatus, watchRun } from "../status";
import { createWorkspace, writeRunRecord } from "../workspace";

const settings = pipelineSettingsSchema.parse({});

function makeRecord(runId: string, overrides: Partial<RunRecord> = {}): RunRecord {
  return {
    run_id: runId,
    state: "CREATED",
    request: {
      source_url: "https://example.com/",
      max_pages: 5,
      delay_seconds: 0,
      max_block_chars: 1200,
      min_block_chars: 80,
    },
    settings,
    created_at: "2024-03-01T12:00:00.000Z",
    stages: [],
    warnings: [],
    ...overrides,
  };
}

describe("toRunStatus", () => {
  it("reports the running stage and completed stages", () => {
    const record = makeRecord("run_2024-03-01_12-00-00_aaaaaa", {
      state: "SLICING",
      started_at: "2024-03-01T12:00:01.000Z",
      stages: [
        {
          name: "fetch",
          state: "FETCHING",
          status: "succeeded",
          started_at: "2024-03-01T12:00:01.000Z",
          duration_ms: 4000,
          artifact: "raw",
          records: 3,
          skipped: 0,
        },
        {
          name: "clean",
          state: "CLEANING",
          status: "succeeded",
          started_at: "2024-03-01T12:00:05.000Z",
          duration_ms: 20,
          artifact: "clean",
          records: 3,
          skipped: 0,
        },
      ],
    });

    const status = toRunStatus(record, new Date("2024-03-01T12:00:11.000Z"));

    expect(status).toEqual({
      run_id: "run_2024-03-01_12-00-00_aaaaaa",
      state: "SLICING",
      current_stage: "slice",
      stages: {
        fetch: { complete: true, status: "succeeded", duration_ms: 4000 },
        clean: { complete: true, status: "succeeded", duration_ms: 20 },
        slice: { complete: false },
        tag: { complete: false },
        generate: { complete: false },
      },
      elapsed_ms: 10_000,
    });
  });

  it("stops the clock at finished_at and carries the failure", () => {
    const failure = { stage: "fetch" as const, state: "FETCHING" as const, kind: "StageError", error: "boom" };
    const record = makeRecord("run_2024-03-01_12-00-00_bbbbbb", {
      state: "FAILED",
      started_at: "2024-03-01T12:00:00.000Z",
      finished_at: "2024-03-01T12:00:02.500Z",
      failure,
    });

    const status = toRunStatus(record, new Date("2024-03-02T00:00:00.000Z"));
    expect(status.elapsed_ms).toBe(2500);
    expect(status.current_stage).toBeNull();
    expect(status.failure).toEqual(failure);
  });
});

describe("run lookup", () => {
  let runsRoot: string;

  beforeEach(() => {
    runsRoot = fs.mkdtempSync(path.join(os.tmpdir(), "status-test-"));
  });

  afterEach(() => {
    fs.rmSync(runsRoot, { recursive: true, force: true });
  });

  function persist(suffix: string, overrides: Partial<RunRecord> = {}): string {
    const { runId, runDir } = createWorkspace(runsRoot, {
      now: new Date(2024, 2, 1, 12, 0, 0),
      suffix: () => suffix,
    });
    writeRunRecord(runDir, makeRecord(runId, overrides));
    return runId;
  }

  it("returns null for unknown or malformed ids", () => {
    expect(getRunStatus(runsRoot, "run_2024-03-01_12-00-00_ffffff")).toBeNull();
    expect(getRunStatus(runsRoot, "../etc")).toBeNull();
  });

  it("lists runs sorted by id, skipping stray directories", () => {
    const second = persist("bbbbbb", { state: "COMPLETE", finished_at: "2024-03-01T12:05:00.000Z" });
    const first = persist("aaaaaa");
    fs.mkdirSync(path.join(runsRoot, "scratch"));
    createWorkspace(runsRoot, { now: new Date(2024, 2, 1, 12, 0, 0), suffix: () => "cccccc" });

    expect(listRuns(runsRoot)).toEqual([
      {
        run_id: first,
        state: "CREATED",
        source_url: "https://example.com/",
        created_at: "2024-03-01T12:00:00.000Z",
        finished_at: undefined,
      },
      {
        run_id: second,
        state: "COMPLETE",
        source_url: "https://example.com/",
        created_at: "2024-03-01T12:00:00.000Z",
        finished_at: "2024-03-01T12:05:00.000Z",
      },
    ]);
  });

  it("returns no runs for a missing root", () => {
    expect(listRuns(path.join(runsRoot, "nope"))).toEqual([]);
  });

  it("watchRun completes once the run is terminal", async () => {
    const runId = persist("dddddd", { state: "COMPLETE", finished_at: "2024-03-01T12:00:03.000Z" });

    const statuses = await lastValueFrom(watchRun(runsRoot, runId, 10).pipe(toArray()));

    expect(statuses).toHaveLength(1);
    expect(statuses[0].state).toBe("COMPLETE");
  });

  it("watchRun errors for an unknown run", async () => {
    await expect(
      lastValueFrom(watchRun(runsRoot, "run_2024-03-01_12-00-00_eeeeee", 10))
    ).rejects.toThrow("Run not found: run_2024-03-01_12-00-00_eeeeee");
  });
});
