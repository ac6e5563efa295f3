/**
 * Zod schemas for pipeline artifacts and run records.
 *
 * These schemas define the contracts between stages and are used for:
 * - Validating every JSONL line read back from a run workspace
 * - TypeScript type inference
 * - Constraining the LLM response in QA generation
 */

import { z } from "zod/v4";

// ============================================================================
// Roles
// ============================================================================

export const ROLES = [
  "TRANSACTIONAL",
  "TEMPORAL",
  "PROCEDURAL",
  "PROMOTIONAL",
  "DESCRIPTIVE",
  "POLICY_LEGAL",
  "CONTACT",
  "GENERAL",
] as const;

export const roleSchema = z.enum(ROLES);

export type Role = z.infer<typeof roleSchema>;

// ============================================================================
// Page Record (raw.jsonl)
// ============================================================================

export const pageSegmentSchema = z.object({
  kind: z.enum(["heading", "paragraph", "list_item"]),
  text: z.string(),
  level: z.number().int().min(1).max(6).optional(),
});

export const pageRecordSchema = z.object({
  source_url: z.string(),
  page_type: z.string(),
  title: z.string().optional(),
  meta_description: z.string().optional(),
  segments: z.array(pageSegmentSchema),
  fetched_at: z.string(),
});

export type PageSegment = z.infer<typeof pageSegmentSchema>;
export type PageRecord = z.infer<typeof pageRecordSchema>;

// ============================================================================
// Cleaned Document (clean.jsonl)
// ============================================================================

export const cleanedDocumentSchema = z.object({
  source_url: z.string(),
  page_type: z.string(),
  segments: z.array(z.string()),
});

export type CleanedDocument = z.infer<typeof cleanedDocumentSchema>;

// ============================================================================
// Block (sliced.jsonl) and Tagged Block (tagged.jsonl)
// ============================================================================

export const spanFlagsSchema = z.object({
  price: z.boolean(),
  measurement: z.boolean(),
  temporal: z.boolean(),
  warning: z.boolean(),
});

export const blockWarningSchema = z.enum([
  "atomic_span_overflow",
  "classification_degenerate",
]);

export const blockSchema = z.object({
  source_url: z.string(),
  page_type: z.string(),
  ordinal: z.number().int().min(0),
  text: z.string(),
  flags: spanFlagsSchema,
  char_count: z.number().int().min(0),
  word_count: z.number().int().min(0),
  warnings: z.array(blockWarningSchema).optional(),
  review: z.boolean().optional(),
});

export const taggedBlockSchema = blockSchema.extend({
  role: roleSchema,
  matched_rule: z.string(),
  confidence: z.number().min(0).max(1),
});

export type SpanFlags = z.infer<typeof spanFlagsSchema>;
export type BlockWarning = z.infer<typeof blockWarningSchema>;
export type Block = z.infer<typeof blockSchema>;
export type TaggedBlock = z.infer<typeof taggedBlockSchema>;

// ============================================================================
// QA generation (qa.jsonl, qa_failures.jsonl)
// ============================================================================

export const qaRecordSchema = z.object({
  source_url: z.string(),
  page_type: z.string(),
  question: z.string(),
  answer: z.string(),
});

export const generationFailureSchema = z.object({
  source_url: z.string(),
  page_type: z.string(),
  ordinals: z.array(z.number().int().min(0)),
  error: z.enum(["GenerationTimeout", "GenerationError"]),
  message: z.string(),
});

/** Shape the LLM is asked to return for one batch of blocks. */
export const qaResponseSchema = z.object({
  pairs: z.array(
    z.object({
      question: z.string(),
      answer: z.string(),
    })
  ),
});

export type QaRecord = z.infer<typeof qaRecordSchema>;
export type GenerationFailure = z.infer<typeof generationFailureSchema>;
export type QaResponse = z.infer<typeof qaResponseSchema>;

// ============================================================================
// Run states, stages and artifacts
// ============================================================================

export const RUN_STATES = [
  "CREATED",
  "FETCHING",
  "CLEANING",
  "SLICING",
  "TAGGING",
  "GENERATING",
  "COMPLETE",
  "FAILED",
] as const;

export const runStateSchema = z.enum(RUN_STATES);

export const STAGE_NAMES = ["fetch", "clean", "slice", "tag", "generate"] as const;

export const stageNameSchema = z.enum(STAGE_NAMES);

export const ARTIFACT_NAMES = [
  "raw",
  "clean",
  "sliced",
  "tagged",
  "qa",
  "qa_failures",
] as const;

export const artifactNameSchema = z.enum(ARTIFACT_NAMES);

// ============================================================================
// Stage settings (config.yaml sections, snapshotted into run.json)
// ============================================================================

export const crawlSettingsSchema = z.object({
  max_pages: z.number().int().min(1).default(100),
  delay_seconds: z.number().min(0).default(1),
  timeout_ms: z.number().int().min(1).default(10_000),
  user_agent: z.string().default("Mozilla/5.0 (compatible; crawl-qa-pipeline/0.1)"),
  skip_keywords: z.array(z.string()).default([]),
  skip_extensions: z.array(z.string()).default([]),
});

export const cleaningSettingsSchema = z.object({
  min_paragraph_chars: z.number().int().min(0).default(40),
  max_heading_level: z.number().int().min(1).max(6).default(2),
  nav_keywords: z.array(z.string()).default([]),
});

export const degeneratePolicySchema = z.enum(["annotate", "review"]);

export const slicingSettingsSchema = z.object({
  max_block_chars: z.number().int().min(1).default(1200),
  min_block_chars: z.number().int().min(0).default(80),
  hard_limit_chars: z.number().int().min(1).optional(),
  degenerate_policy: degeneratePolicySchema.default("annotate"),
});

export const llmProviderSchema = z.enum(["openai", "anthropic", "google", "groq"]);

export const generationSettingsSchema = z.object({
  provider: llmProviderSchema.default("groq"),
  model: z.string().optional(),
  prompt: z.string().default("qa_generation"),
  roles: z
    .array(roleSchema)
    .default(["DESCRIPTIVE", "PROCEDURAL", "TEMPORAL", "TRANSACTIONAL"]),
  max_tokens_per_batch: z.number().int().min(1).default(6000),
  token_multiplier: z.number().positive().default(1.3),
  timeout_ms: z.number().int().min(1).default(120_000),
  concurrency: z.number().int().min(1).default(4),
  max_retries: z.number().int().min(0).default(3),
  temperature: z.number().min(0).max(2).default(0.2),
});

export const pipelineSettingsSchema = z.object({
  crawl: crawlSettingsSchema.prefault({}),
  cleaning: cleaningSettingsSchema.prefault({}),
  slicing: slicingSettingsSchema.prefault({}),
  generation: generationSettingsSchema.prefault({}),
});

export type CrawlSettings = z.infer<typeof crawlSettingsSchema>;
export type CleaningSettings = z.infer<typeof cleaningSettingsSchema>;
export type DegeneratePolicy = z.infer<typeof degeneratePolicySchema>;
export type SlicingSettings = z.infer<typeof slicingSettingsSchema>;
export type LLMProvider = z.infer<typeof llmProviderSchema>;
export type GenerationSettings = z.infer<typeof generationSettingsSchema>;
export type PipelineSettings = z.infer<typeof pipelineSettingsSchema>;

// ============================================================================
// Run record (run.json, stats.json)
// ============================================================================

export const runRequestSchema = z.object({
  source_url: z.string(),
  max_pages: z.number(),
  delay_seconds: z.number(),
  max_block_chars: z.number(),
  min_block_chars: z.number(),
});

export const stageResultSchema = z.object({
  name: stageNameSchema,
  state: runStateSchema,
  status: z.enum(["succeeded", "failed"]),
  started_at: z.string(),
  duration_ms: z.number().min(0),
  artifact: artifactNameSchema.nullable(),
  records: z.number().int().min(0),
  skipped: z.number().int().min(0),
  error: z.string().optional(),
});

export const spanFlagCountsSchema = z.object({
  price: z.number().int().min(0),
  measurement: z.number().int().min(0),
  temporal: z.number().int().min(0),
  warning: z.number().int().min(0),
});

export const runStatsSchema = z.object({
  artifacts: z.record(artifactNameSchema, z.number().int().min(0)),
  roles: z.record(roleSchema, z.number().int().min(0)),
  flags: spanFlagCountsSchema,
  overflow_blocks: z.number().int().min(0),
  degenerate_blocks: z.number().int().min(0),
  review_blocks: z.number().int().min(0),
  generation_failures: z.number().int().min(0),
  skipped_records: z.number().int().min(0),
});

export const runFailureSchema = z.object({
  stage: stageNameSchema,
  state: runStateSchema,
  kind: z.string(),
  error: z.string(),
});

export const runRecordSchema = z.object({
  run_id: z.string(),
  state: runStateSchema,
  request: runRequestSchema,
  settings: pipelineSettingsSchema,
  created_at: z.string(),
  started_at: z.string().optional(),
  finished_at: z.string().optional(),
  stages: z.array(stageResultSchema),
  failure: runFailureSchema.optional(),
  warnings: z.array(z.string()),
  stats: runStatsSchema.optional(),
});

export type RunState = z.infer<typeof runStateSchema>;
export type StageName = z.infer<typeof stageNameSchema>;
export type ArtifactName = z.infer<typeof artifactNameSchema>;
export type RunRequest = z.infer<typeof runRequestSchema>;
export type StageResult = z.infer<typeof stageResultSchema>;
export type SpanFlagCounts = z.infer<typeof spanFlagCountsSchema>;
export type RunStats = z.infer<typeof runStatsSchema>;
export type RunFailure = z.infer<typeof runFailureSchema>;
export type RunRecord = z.infer<typeof runRecordSchema>;
