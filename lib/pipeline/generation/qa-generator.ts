import { generateObject, type LanguageModel } from "ai";
import { qaResponseSchema, type LLMProvider } from "../core/schemas";
import type { QaBatch, QaGenerator } from "../core/types";
import {
  loadPrompt,
  messagesToLogFormat,
  resolveLanguageModel,
  resolveModelId,
  type LlmLogEntry,
} from "../core/llm";

export interface LlmQaGeneratorOptions {
  runId: string;
  provider: LLMProvider;
  modelId?: string;
  promptName: string;
  temperature: number;
  maxRetries: number;
  onLog?: (entry: LlmLogEntry) => void;
  /** Override model resolution (tests use the ai SDK's mock models) */
  model?: LanguageModel;
}

/**
 * QaGenerator backed by a structured-output LLM call. One call per batch;
 * the response is constrained to {pairs: [{question, answer}]}.
 */
export function createLlmQaGenerator(options: LlmQaGeneratorOptions): QaGenerator {
  const model = options.model ?? resolveLanguageModel(options.provider, options.modelId);
  const { modelId } = resolveModelId(options.provider, options.modelId);

  return {
    async generate(batch: QaBatch, signal: AbortSignal) {
      const { system, messages } = await loadPrompt(options.promptName, {
        source_url: batch.sourceUrl,
        page_type: batch.pageType,
        texts: batch.texts,
      });

      const t0 = Date.now();
      const log = (extra: Pick<LlmLogEntry, "usage" | "error">) =>
        options.onLog?.({
          timestamp: new Date().toISOString(),
          runId: options.runId,
          taskType: "qa-generation",
          pageId: `${batch.sourceUrl}#${batch.ordinals.join(",")}`,
          promptName: options.promptName,
          modelId,
          durationMs: Date.now() - t0,
          ...extra,
          system,
          messages: messagesToLogFormat(messages),
        });

      try {
        const result = await generateObject({
          model,
          schema: qaResponseSchema,
          system,
          messages,
          abortSignal: signal,
          maxRetries: options.maxRetries,
          temperature: options.temperature,
        });
        log({
          usage: {
            inputTokens: result.usage.inputTokens ?? 0,
            outputTokens: result.usage.outputTokens ?? 0,
          },
        });
        return result.object.pairs;
      } catch (err) {
        log({ error: err instanceof Error ? err.message : String(err) });
        throw err;
      }
    },
  };
}
