/**
 * Run Orchestrator
 *
 * Drives one run through the fixed stage sequence:
 * CREATED → FETCHING → CLEANING → SLICING → TAGGING → GENERATING → COMPLETE
 *
 * Every transition is persisted to run.json before the next stage starts.
 * A stage failure moves the run to FAILED, keeps the artifacts already
 * written, and no later stage runs.
 */

import type {
  PipelineSettings,
  RunRecord,
  RunState,
  RunStats,
  StageName,
  StageResult,
} from "../core/schemas";
import { toPipelineError, type PipelineError } from "../core/errors";
import { STAGES, type StageContext } from "./stages";
import { transition } from "./state-machine";
import { computeStats } from "./stats";
import { nullProgress, type PipelineDeps, type Progress } from "./types";
import { validateRunRequest } from "./request";
import { createWorkspace, writeRunRecord, writeStats } from "./workspace";

export interface ExecuteRunOptions {
  runsRoot: string;
  /** Unvalidated submission; checked before anything is created on disk */
  request: unknown;
  settings: PipelineSettings;
  deps: PipelineDeps;
  progress?: Progress;
  now?: () => Date;
  /** Called once the workspace exists, before the first stage */
  onCreated?: (runId: string, runDir: string) => void;
}

/**
 * Execute a run end to end and return its final record.
 *
 * Stage failures are recorded on the run (state FAILED) rather than
 * thrown; only an invalid submission throws.
 *
 * @throws ConfigurationError
 */
export async function executeRun(options: ExecuteRunOptions): Promise<RunRecord> {
  const { deps, settings, progress = nullProgress } = options;
  const now = options.now ?? (() => new Date());

  const request = validateRunRequest(options.request);
  const createdAt = now();
  const { runId, runDir } = createWorkspace(options.runsRoot, { now: createdAt });

  const frozen = deepFreeze(structuredClone(settings));
  const record: RunRecord = {
    run_id: runId,
    state: "CREATED",
    request: { ...request },
    settings: frozen,
    created_at: createdAt.toISOString(),
    stages: [],
    warnings: [],
  };
  writeRunRecord(runDir, record);
  options.onCreated?.(runId, runDir);

  const moveTo = (state: RunState) => {
    record.state = transition(record.state, state);
    writeRunRecord(runDir, record);
  };

  const fail = (stage: StageName, error: PipelineError): RunRecord => {
    record.failure = {
      stage,
      state: record.state,
      kind: error.kind,
      error: error.message,
    };
    record.finished_at = now().toISOString();
    record.state = transition(record.state, "FAILED");
    try {
      writeRunRecord(runDir, record);
    } catch (err) {
      record.warnings.push(
        `run.json not updated to FAILED: ${err instanceof Error ? err.message : String(err)}`
      );
    }

    progress.emit({ type: "stage-error", runId, stage, error: error.message });
    progress.emit({ type: "run-failed", runId, stage, error: error.message });
    return record;
  };

  progress.emit({ type: "run-start", runId, sourceUrl: request.source_url });

  const ctx: StageContext = { runId, runDir, request, settings: frozen, deps, progress };

  for (const stage of STAGES) {
    const started = now();
    const result: StageResult = {
      name: stage.name,
      state: stage.state,
      status: "succeeded",
      started_at: started.toISOString(),
      duration_ms: 0,
      artifact: stage.output,
      records: 0,
      skipped: 0,
    };

    try {
      if (record.started_at === undefined) record.started_at = started.toISOString();
      moveTo(stage.state);
      progress.emit({ type: "stage-start", runId, stage: stage.name });

      const summary = await stage.run(ctx);
      result.duration_ms = now().getTime() - started.getTime();
      result.records = summary.records;
      result.skipped = summary.skipped;
      record.stages.push(result);
      record.warnings.push(...summary.warnings);
      writeRunRecord(runDir, record);
    } catch (err) {
      const error = toPipelineError(stage.name, err);
      result.status = "failed";
      result.duration_ms = now().getTime() - started.getTime();
      result.artifact = null;
      result.error = error.message;
      if (!record.stages.includes(result)) record.stages.push(result);
      return fail(stage.name, error);
    }

    progress.emit({
      type: "stage-complete",
      runId,
      stage: stage.name,
      records: result.records,
      durationMs: result.duration_ms,
    });
  }

  // Stats and the COMPLETE write belong to the last stage: if either
  // fails the run ends FAILED there, never COMPLETE on disk without stats
  let stats: RunStats;
  try {
    stats = computeStats(runDir);
    writeStats(runDir, stats);
    const completed: RunRecord = {
      ...record,
      state: transition(record.state, "COMPLETE"),
      stats,
      finished_at: now().toISOString(),
    };
    writeRunRecord(runDir, completed);
    Object.assign(record, completed);
  } catch (err) {
    return fail("generate", toPipelineError("generate", err));
  }

  progress.emit({ type: "run-complete", runId, stats });
  return record;
}

/** Recursively freeze `value` in place. */
function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object") {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}
