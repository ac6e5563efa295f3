/**
 * Run status
 *
 * Read-only views over run.json. Status is derived entirely from what
 * the orchestrator persisted, so any process can observe any run.
 */

import fs from "node:fs";
import path from "node:path";
import { distinctUntilChanged, map, timer, takeWhile, type Observable } from "rxjs";
import {
  STAGE_NAMES,
  type RunFailure,
  type RunRecord,
  type RunState,
  type RunStats,
  type StageName,
} from "../core/schemas";
import { isRunId } from "./run-id";
import { isTerminal, stageForState } from "./state-machine";
import { readRunRecord } from "./workspace";

export interface StageStatus {
  complete: boolean;
  status?: "succeeded" | "failed";
  duration_ms?: number;
}

export interface RunStatus {
  run_id: string;
  state: RunState;
  current_stage: StageName | null;
  stages: Record<StageName, StageStatus>;
  elapsed_ms: number;
  failure?: RunFailure;
  stats?: RunStats;
}

export interface RunSummary {
  run_id: string;
  state: RunState;
  source_url: string;
  created_at: string;
  finished_at?: string;
}

export function toRunStatus(record: RunRecord, now: Date = new Date()): RunStatus {
  const stages: Record<StageName, StageStatus> = {
    fetch: { complete: false },
    clean: { complete: false },
    slice: { complete: false },
    tag: { complete: false },
    generate: { complete: false },
  };
  for (const result of record.stages) {
    stages[result.name] = {
      complete: result.status === "succeeded",
      status: result.status,
      duration_ms: result.duration_ms,
    };
  }

  const start = Date.parse(record.started_at ?? record.created_at);
  const end = record.finished_at ? Date.parse(record.finished_at) : now.getTime();

  const status: RunStatus = {
    run_id: record.run_id,
    state: record.state,
    current_stage: stageForState(record.state),
    stages,
    elapsed_ms: Math.max(0, end - start),
  };
  if (record.failure) status.failure = record.failure;
  if (record.stats) status.stats = record.stats;
  return status;
}

/**
 * Current status of a run, or null when no such run exists.
 */
export function getRunStatus(
  runsRoot: string,
  runId: string,
  now: Date = new Date()
): RunStatus | null {
  if (!isRunId(runId)) return null;
  const record = readRunRecord(path.join(runsRoot, runId));
  return record ? toRunStatus(record, now) : null;
}

/**
 * Every run under `runsRoot`, oldest first (run ids sort chronologically).
 */
export function listRuns(runsRoot: string): RunSummary[] {
  if (!fs.existsSync(runsRoot)) return [];

  const ids = fs
    .readdirSync(runsRoot, { withFileTypes: true })
    .filter((entry) => entry.isDirectory() && isRunId(entry.name))
    .map((entry) => entry.name)
    .sort();

  const runs: RunSummary[] = [];
  for (const id of ids) {
    const record = readRunRecord(path.join(runsRoot, id));
    if (!record) continue;
    runs.push({
      run_id: record.run_id,
      state: record.state,
      source_url: record.request.source_url,
      created_at: record.created_at,
      finished_at: record.finished_at,
    });
  }
  return runs;
}

/**
 * Poll a run's status until it reaches COMPLETE or FAILED. Emits only
 * when the state or a stage result changed; the terminal status is the
 * last value. Errors if the run does not exist.
 */
export function watchRun(
  runsRoot: string,
  runId: string,
  intervalMs = 1000
): Observable<RunStatus> {
  return timer(0, intervalMs).pipe(
    map(() => {
      const status = getRunStatus(runsRoot, runId);
      if (!status) throw new Error(`Run not found: ${runId}`);
      return status;
    }),
    distinctUntilChanged((prev, next) => statusKey(prev) === statusKey(next)),
    takeWhile((status) => !isTerminal(status.state), true)
  );
}

function statusKey(status: RunStatus): string {
  const stages = STAGE_NAMES.map((name) => status.stages[name].status ?? "-").join(",");
  return `${status.state}|${stages}`;
}
