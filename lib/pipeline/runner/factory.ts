/**
 * Runner Factory
 *
 * Wires the real stage implementations into a PipelineDeps. This is the
 * main entry point for setting up the pipeline outside of tests.
 */

import { cleanPages } from "../cleaning/cleaner";
import type { LlmLogEntry } from "../core/llm";
import { crawlSite } from "../fetch/crawler";
import { createLlmQaGenerator } from "../generation/qa-generator";
import { appendLogEntry } from "../llm-log";
import { sliceDocument } from "../slicing/slicer";
import { tagBlock } from "../tagging/role-classifier";
import type { PipelineDeps } from "./types";

export interface CreatePipelineDepsOptions {
  /** Replaces the global fetch used by the crawler */
  fetch?: typeof fetch;
}

export function createPipelineDeps(options: CreatePipelineDepsOptions = {}): PipelineDeps {
  return {
    fetchPages: (startUrl, crawlOptions) =>
      crawlSite(startUrl, { fetch: options.fetch, ...crawlOptions }),
    cleanPages,
    sliceDocument,
    tagBlock: (block) => tagBlock(block),
    createGenerator: ({ runId, runDir, settings }) => {
      const { generation } = settings;
      return createLlmQaGenerator({
        runId,
        provider: generation.provider,
        modelId: generation.model,
        promptName: generation.prompt,
        temperature: generation.temperature,
        maxRetries: generation.max_retries,
        onLog: (entry: LlmLogEntry) => {
          // A full disk shouldn't fail the run over a log line
          try {
            appendLogEntry(runDir, entry);
          } catch (err) {
            console.warn(
              `[${runId}] Could not write LLM log: ${err instanceof Error ? err.message : String(err)}`
            );
          }
        },
      });
    },
  };
}
