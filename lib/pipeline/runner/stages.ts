/**
 * Stage definitions
 *
 * Each stage reads its input artifact from the run directory, calls its
 * collaborator and writes its output artifact. Nothing is handed from one
 * stage to the next in memory: the files on disk are the hand-off.
 */

import {
  blockSchema,
  cleanedDocumentSchema,
  pageRecordSchema,
  taggedBlockSchema,
  type ArtifactName,
  type Block,
  type PipelineSettings,
  type RunRequest,
  type RunState,
  type StageName,
} from "../core/schemas";
import { generateQa } from "../generation/generate-qa";
import { STAGE_STATE } from "./state-machine";
import type { PipelineDeps, Progress } from "./types";
import { readArtifact, writeArtifact } from "./workspace";

export interface StageContext {
  runId: string;
  runDir: string;
  request: RunRequest;
  settings: PipelineSettings;
  deps: PipelineDeps;
  progress: Progress;
}

export interface StageSummary {
  records: number;
  /** Input lines that failed validation */
  skipped: number;
  warnings: string[];
}

export interface StageDefinition {
  name: StageName;
  state: RunState;
  input: ArtifactName | null;
  output: ArtifactName;
  run(ctx: StageContext): Promise<StageSummary>;
}

const fetchStage: StageDefinition = {
  name: "fetch",
  state: STAGE_STATE.fetch,
  input: null,
  output: "raw",
  async run(ctx) {
    const { crawl } = ctx.settings;
    const result = await ctx.deps.fetchPages(ctx.request.source_url, {
      maxPages: ctx.request.max_pages,
      delaySeconds: ctx.request.delay_seconds,
      timeoutMs: crawl.timeout_ms,
      userAgent: crawl.user_agent,
      skipKeywords: crawl.skip_keywords,
      skipExtensions: crawl.skip_extensions,
      onPage: (url, fetched) =>
        ctx.progress.emit({
          type: "stage-progress",
          runId: ctx.runId,
          stage: "fetch",
          message: url,
          current: fetched,
          total: ctx.request.max_pages,
        }),
    });

    if (result.pages.length === 0) {
      const reason = result.warnings[0] ? `: ${result.warnings[0]}` : "";
      throw new Error(`No pages fetched from ${ctx.request.source_url}${reason}`);
    }

    const records = writeArtifact(ctx.runDir, "raw", result.pages);
    return { records, skipped: 0, warnings: result.warnings };
  },
};

const cleanStage: StageDefinition = {
  name: "clean",
  state: STAGE_STATE.clean,
  input: "raw",
  output: "clean",
  async run(ctx) {
    const { cleaning } = ctx.settings;
    const raw = readArtifact(ctx.runDir, "raw", pageRecordSchema);
    const result = ctx.deps.cleanPages(raw.records, {
      minParagraphChars: cleaning.min_paragraph_chars,
      maxHeadingLevel: cleaning.max_heading_level,
      navKeywords: cleaning.nav_keywords,
    });

    ctx.progress.emit({
      type: "stage-progress",
      runId: ctx.runId,
      stage: "clean",
      message: `Kept ${result.documents.length} of ${raw.records.length} pages (${result.empty} empty, ${result.duplicates} duplicate)`,
    });

    const records = writeArtifact(ctx.runDir, "clean", result.documents);
    return { records, skipped: raw.skipped, warnings: [] };
  },
};

const sliceStage: StageDefinition = {
  name: "slice",
  state: STAGE_STATE.slice,
  input: "clean",
  output: "sliced",
  async run(ctx) {
    const { slicing } = ctx.settings;
    const clean = readArtifact(ctx.runDir, "clean", cleanedDocumentSchema);
    const blocks: Block[] = [];
    const warnings: string[] = [];

    for (const doc of clean.records) {
      const result = ctx.deps.sliceDocument(doc, {
        maxBlockChars: ctx.request.max_block_chars,
        minBlockChars: ctx.request.min_block_chars,
        hardLimitChars: slicing.hard_limit_chars,
        degeneratePolicy: slicing.degenerate_policy,
      });
      if (result.degenerate) {
        warnings.push(`${doc.source_url}: no boundary within the block limit, hard cut applied`);
      }
      blocks.push(...result.blocks);
    }

    const records = writeArtifact(ctx.runDir, "sliced", blocks);
    return { records, skipped: clean.skipped, warnings };
  },
};

const tagStage: StageDefinition = {
  name: "tag",
  state: STAGE_STATE.tag,
  input: "sliced",
  output: "tagged",
  async run(ctx) {
    const sliced = readArtifact(ctx.runDir, "sliced", blockSchema);
    const tagged = sliced.records.map((block) => ctx.deps.tagBlock(block));
    const records = writeArtifact(ctx.runDir, "tagged", tagged);
    return { records, skipped: sliced.skipped, warnings: [] };
  },
};

const generateStage: StageDefinition = {
  name: "generate",
  state: STAGE_STATE.generate,
  input: "tagged",
  output: "qa",
  async run(ctx) {
    const { generation } = ctx.settings;
    const tagged = readArtifact(ctx.runDir, "tagged", taggedBlockSchema);
    const generator = ctx.deps.createGenerator({
      runId: ctx.runId,
      runDir: ctx.runDir,
      settings: ctx.settings,
    });

    const result = await generateQa(tagged.records, generator, {
      roles: generation.roles,
      maxTokensPerBatch: generation.max_tokens_per_batch,
      tokenMultiplier: generation.token_multiplier,
      timeoutMs: generation.timeout_ms,
      concurrency: generation.concurrency,
      onBatch: (completed, total) =>
        ctx.progress.emit({
          type: "stage-progress",
          runId: ctx.runId,
          stage: "generate",
          message: "Generated batch",
          current: completed,
          total,
        }),
    });

    const records = writeArtifact(ctx.runDir, "qa", result.records);
    writeArtifact(ctx.runDir, "qa_failures", result.failures);

    const warnings =
      result.failures.length > 0
        ? [`${result.failures.length} of ${result.batches} generation batches failed`]
        : [];
    return { records, skipped: tagged.skipped, warnings };
  },
};

/** All stages, in execution order. */
export const STAGES: readonly StageDefinition[] = [
  fetchStage,
  cleanStage,
  sliceStage,
  tagStage,
  generateStage,
];
