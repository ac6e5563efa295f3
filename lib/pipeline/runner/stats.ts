import fs from "node:fs";
import type { z } from "zod/v4";
import {
  ARTIFACT_NAMES,
  blockSchema,
  generationFailureSchema,
  cleanedDocumentSchema,
  pageRecordSchema,
  qaRecordSchema,
  taggedBlockSchema,
  type ArtifactName,
  type Role,
  type RunStats,
} from "../core/schemas";
import { artifactPath, parseJsonl, type ArtifactRead } from "./workspace";

const ARTIFACT_SCHEMAS: Record<ArtifactName, z.ZodType<unknown>> = {
  raw: pageRecordSchema,
  clean: cleanedDocumentSchema,
  sliced: blockSchema,
  tagged: taggedBlockSchema,
  qa: qaRecordSchema,
  qa_failures: generationFailureSchema,
};

/**
 * Derive run statistics from the artifacts on disk. Missing artifacts
 * count as empty.
 */
export function computeStats(runDir: string): RunStats {
  const artifacts: Record<ArtifactName, number> = {
    raw: 0,
    clean: 0,
    sliced: 0,
    tagged: 0,
    qa: 0,
    qa_failures: 0,
  };
  let skippedRecords = 0;
  for (const name of ARTIFACT_NAMES) {
    const { records, skipped } = read(runDir, name, ARTIFACT_SCHEMAS[name]);
    artifacts[name] = records.length;
    skippedRecords += skipped;
  }

  const stats: RunStats = {
    artifacts,
    roles: countRoles(read(runDir, "tagged", taggedBlockSchema).records.map((b) => b.role)),
    flags: { price: 0, measurement: 0, temporal: 0, warning: 0 },
    overflow_blocks: 0,
    degenerate_blocks: 0,
    review_blocks: 0,
    generation_failures: artifacts.qa_failures,
    skipped_records: skippedRecords,
  };

  for (const block of read(runDir, "sliced", blockSchema).records) {
    if (block.flags.price) stats.flags.price++;
    if (block.flags.measurement) stats.flags.measurement++;
    if (block.flags.temporal) stats.flags.temporal++;
    if (block.flags.warning) stats.flags.warning++;
    if (block.warnings?.includes("atomic_span_overflow")) stats.overflow_blocks++;
    if (block.warnings?.includes("classification_degenerate")) stats.degenerate_blocks++;
    if (block.review) stats.review_blocks++;
  }

  return stats;
}

function read<T>(runDir: string, artifact: ArtifactName, schema: z.ZodType<T>): ArtifactRead<T> {
  const file = artifactPath(runDir, artifact);
  if (!fs.existsSync(file)) return { records: [], skipped: 0 };
  return parseJsonl(fs.readFileSync(file, "utf-8"), schema);
}

function countRoles(roles: readonly Role[]): Record<Role, number> {
  const counts: Record<Role, number> = {
    TRANSACTIONAL: 0,
    TEMPORAL: 0,
    PROCEDURAL: 0,
    PROMOTIONAL: 0,
    DESCRIPTIVE: 0,
    POLICY_LEGAL: 0,
    CONTACT: 0,
    GENERAL: 0,
  };
  for (const role of roles) counts[role]++;
  return counts;
}
