/**
 * Run workspace
 *
 * Each run owns `<runs_root>/<run-id>/`. Artifacts are JSONL files written
 * once, atomically (temp file, fsync, hard link into place); readers
 * validate every line and skip the ones that don't parse.
 */

import fs from "node:fs";
import path from "node:path";
import type { z } from "zod/v4";
import { ArtifactExistsError, UpstreamArtifactMissing } from "../core/errors";
import {
  runRecordSchema,
  type ArtifactName,
  type RunRecord,
  type RunStats,
} from "../core/schemas";
import { createRunId, randomSuffix } from "./run-id";

export const ARTIFACT_FILES: Record<ArtifactName, string> = {
  raw: "raw.jsonl",
  clean: "clean.jsonl",
  sliced: "sliced.jsonl",
  tagged: "tagged.jsonl",
  qa: "qa.jsonl",
  qa_failures: "qa_failures.jsonl",
};

export const RUN_FILE = "run.json";
export const STATS_FILE = "stats.json";

const MAX_ID_ATTEMPTS = 5;

export interface Workspace {
  runId: string;
  runDir: string;
}

export interface CreateWorkspaceOptions {
  now?: Date;
  suffix?: () => string;
}

/**
 * Allocate a fresh run directory. The directory is created with an
 * exclusive mkdir; on collision a new suffix is drawn.
 */
export function createWorkspace(
  runsRoot: string,
  options: CreateWorkspaceOptions = {}
): Workspace {
  const now = options.now ?? new Date();
  const suffix = options.suffix ?? randomSuffix;
  fs.mkdirSync(runsRoot, { recursive: true });

  for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt++) {
    const runId = createRunId(now, suffix());
    const runDir = path.join(runsRoot, runId);
    try {
      fs.mkdirSync(runDir);
      return { runId, runDir };
    } catch (err) {
      if (!isErrnoCode(err, "EEXIST")) throw err;
    }
  }
  throw new Error(`Could not allocate a unique run directory in ${runsRoot}`);
}

export function artifactPath(runDir: string, artifact: ArtifactName): string {
  return path.join(runDir, ARTIFACT_FILES[artifact]);
}

export function hasArtifact(runDir: string, artifact: ArtifactName): boolean {
  return fs.existsSync(artifactPath(runDir, artifact));
}

/**
 * Write an artifact as JSONL. Never replaces an existing artifact.
 * @throws ArtifactExistsError
 */
export function writeArtifact(
  runDir: string,
  artifact: ArtifactName,
  records: readonly unknown[]
): number {
  const target = artifactPath(runDir, artifact);
  if (fs.existsSync(target)) throw new ArtifactExistsError(artifact, target);

  const body = records.map((r) => JSON.stringify(r) + "\n").join("");
  const tmp = writeTemp(target, body);
  try {
    // link() fails if the target appeared meanwhile; rename() would clobber it
    fs.linkSync(tmp, target);
  } catch (err) {
    if (isErrnoCode(err, "EEXIST")) throw new ArtifactExistsError(artifact, target);
    throw err;
  } finally {
    fs.rmSync(tmp, { force: true });
  }
  return records.length;
}

export interface ArtifactRead<T> {
  records: T[];
  /** Lines that were not valid JSON or failed schema validation */
  skipped: number;
}

/**
 * Read and validate an artifact.
 * @throws UpstreamArtifactMissing when the file is absent, or has lines but none are valid
 */
export function readArtifact<T>(
  runDir: string,
  artifact: ArtifactName,
  schema: z.ZodType<T>
): ArtifactRead<T> {
  const file = artifactPath(runDir, artifact);
  if (!fs.existsSync(file)) {
    throw new UpstreamArtifactMissing(artifact, `${ARTIFACT_FILES[artifact]} not found`);
  }

  const result = parseJsonl(fs.readFileSync(file, "utf-8"), schema);
  if (result.records.length === 0 && result.skipped > 0) {
    throw new UpstreamArtifactMissing(
      artifact,
      `none of ${result.skipped} lines in ${ARTIFACT_FILES[artifact]} is a valid record`
    );
  }
  return result;
}

export function parseJsonl<T>(content: string, schema: z.ZodType<T>): ArtifactRead<T> {
  const records: T[] = [];
  let skipped = 0;
  for (const line of content.split("\n")) {
    if (!line.trim()) continue;
    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch {
      skipped++;
      continue;
    }
    const parsed = schema.safeParse(value);
    if (parsed.success) records.push(parsed.data);
    else skipped++;
  }
  return { records, skipped };
}

// ============================================================================
// Run record and stats
// ============================================================================

export function writeRunRecord(runDir: string, record: RunRecord): void {
  writeJsonAtomic(path.join(runDir, RUN_FILE), record);
}

export function writeStats(runDir: string, stats: RunStats): void {
  writeJsonAtomic(path.join(runDir, STATS_FILE), stats);
}

export function readRunRecord(runDir: string): RunRecord | null {
  const file = path.join(runDir, RUN_FILE);
  if (!fs.existsSync(file)) return null;
  return runRecordSchema.parse(JSON.parse(fs.readFileSync(file, "utf-8")));
}

/** Replace a JSON file atomically (temp file, fsync, rename). */
export function writeJsonAtomic(file: string, data: unknown): void {
  const tmp = writeTemp(file, JSON.stringify(data, null, 2) + "\n");
  try {
    fs.renameSync(tmp, file);
  } catch (err) {
    fs.rmSync(tmp, { force: true });
    throw err;
  }
}

function writeTemp(target: string, body: string): string {
  const tmp = `${target}.${process.pid}.${randomSuffix()}.tmp`;
  const fd = fs.openSync(tmp, "wx");
  try {
    fs.writeSync(fd, body);
    fs.fsyncSync(fd);
  } finally {
    fs.closeSync(fd);
  }
  return tmp;
}

function isErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}
