/**
 * Runner layer types.
 *
 * These interfaces define the contracts between the pure pipeline
 * functions and the infrastructure around a run (workspace, progress
 * emission, LLM access).
 */

import type {
  Block,
  CleanedDocument,
  PageRecord,
  PipelineSettings,
  RunRequest,
  RunStats,
  StageName,
  TaggedBlock,
} from "../core/schemas";
import type { QaGenerator, SliceOptions, SliceResult } from "../core/types";
import type { CrawlOptions, CrawlResult } from "../fetch/crawler";
import type { CleanOptions, CleanResult } from "../cleaning/cleaner";

// ============================================================================
// Collaborators
// ============================================================================

export interface GeneratorContext {
  runId: string;
  runDir: string;
  settings: PipelineSettings;
}

/**
 * Everything a run calls out to. The factory wires the real
 * implementations; tests swap in fakes.
 */
export interface PipelineDeps {
  fetchPages(startUrl: string, options: CrawlOptions): Promise<CrawlResult>;
  cleanPages(pages: readonly PageRecord[], options: CleanOptions): CleanResult;
  sliceDocument(doc: CleanedDocument, options: SliceOptions): SliceResult;
  tagBlock(block: Block): TaggedBlock;
  createGenerator(ctx: GeneratorContext): QaGenerator;
}

// ============================================================================
// Progress Interface
// ============================================================================

export type ProgressEvent =
  | { type: "run-start"; runId: string; sourceUrl: string }
  | { type: "stage-start"; runId: string; stage: StageName }
  | {
      type: "stage-progress";
      runId: string;
      stage: StageName;
      message: string;
      current?: number;
      total?: number;
    }
  | { type: "stage-complete"; runId: string; stage: StageName; records: number; durationMs: number }
  | { type: "stage-error"; runId: string; stage: StageName; error: string }
  | { type: "run-complete"; runId: string; stats: RunStats }
  | { type: "run-failed"; runId: string; stage: StageName; error: string };

/**
 * Progress emitter interface.
 *
 * Implementations can log to console, drive a CLI spinner, update a run
 * queue, etc.
 */
export interface Progress {
  emit(event: ProgressEvent): void;
}

/**
 * No-op progress emitter for when progress tracking isn't needed.
 */
export const nullProgress: Progress = {
  emit: () => {},
};

/**
 * Console-based progress emitter for CLI usage.
 */
export function createConsoleProgress(): Progress {
  return {
    emit(event) {
      switch (event.type) {
        case "run-start":
          console.log(`[${event.runId}] Starting run for ${event.sourceUrl}`);
          break;
        case "stage-start":
          console.log(`[${event.runId}] Starting ${formatStageName(event.stage)}...`);
          break;
        case "stage-progress":
          if (event.current !== undefined && event.total !== undefined) {
            console.log(
              `[${event.runId}] ${formatStageName(event.stage)}: ${event.message} (${event.current}/${event.total})`
            );
          } else {
            console.log(`[${event.runId}] ${formatStageName(event.stage)}: ${event.message}`);
          }
          break;
        case "stage-complete":
          console.log(
            `[${event.runId}] Completed ${formatStageName(event.stage)} (${event.records} records)`
          );
          break;
        case "stage-error":
          console.error(`[${event.runId}] Error in ${formatStageName(event.stage)}: ${event.error}`);
          break;
        case "run-complete":
          console.log(`[${event.runId}] Run complete`);
          break;
        case "run-failed":
          console.error(`[${event.runId}] Run failed during ${formatStageName(event.stage)}`);
          break;
      }
    },
  };
}

/**
 * Callback-based progress emitter for run queue integration.
 */
export function createCallbackProgress(
  callback: (message: string) => void
): Progress {
  return {
    emit(event) {
      switch (event.type) {
        case "run-start":
          callback(`Starting run for ${event.sourceUrl}`);
          break;
        case "stage-start":
          callback(`Starting ${formatStageName(event.stage)}`);
          break;
        case "stage-progress":
          if (event.current !== undefined && event.total !== undefined) {
            callback(`${event.message} (${event.current}/${event.total})`);
          } else {
            callback(event.message);
          }
          break;
        case "stage-complete":
          callback(`Completed ${formatStageName(event.stage)}`);
          break;
        case "stage-error":
          callback(`Error: ${event.error}`);
          break;
        case "run-complete":
          callback("Run complete");
          break;
        case "run-failed":
          callback(`Run failed: ${event.error}`);
          break;
      }
    },
  };
}

/**
 * Fan one event stream out to several emitters.
 */
export function combineProgress(...emitters: Progress[]): Progress {
  return {
    emit(event) {
      for (const p of emitters) p.emit(event);
    },
  };
}

export function formatStageName(stage: StageName): string {
  switch (stage) {
    case "fetch":
      return "fetching";
    case "clean":
      return "cleaning";
    case "slice":
      return "slicing";
    case "tag":
      return "tagging";
    case "generate":
      return "QA generation";
  }
}
