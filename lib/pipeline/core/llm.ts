/**
 * LLM access for the pipeline.
 *
 * - Resolves a provider/model pair to a Vercel AI SDK LanguageModel
 * - Loads Liquid prompts and converts them to AI SDK messages
 * - Defines the structured entries appended to a run's llm-log.jsonl
 */

import type { LanguageModel, ModelMessage } from "ai";
import { openai } from "@ai-sdk/openai";
import { anthropic } from "@ai-sdk/anthropic";
import { google } from "@ai-sdk/google";
import { groq } from "@ai-sdk/groq";
import { llmProviderSchema, type LLMProvider } from "./schemas";
import { renderPrompt, type PromptMessage } from "../prompt";

// ============================================================================
// Provider types and model resolution
// ============================================================================

export const DEFAULT_MODELS: Record<LLMProvider, string> = {
  openai: "gpt-4o-mini",
  anthropic: "claude-3-5-haiku-latest",
  google: "gemini-2.0-flash",
  groq: "llama-3.1-8b-instant",
};

const MODEL_FACTORIES: Record<LLMProvider, (id: string) => LanguageModel> = {
  openai: (id) => openai(id),
  anthropic: (id) => anthropic(id),
  google: (id) => google(id),
  groq: (id) => groq(id),
};

export interface ResolvedModel {
  provider: LLMProvider;
  modelId: string;
}

/**
 * Work out which provider and model to use. A model id of the form
 * "provider:model-id" overrides the configured provider.
 */
export function resolveModelId(provider: LLMProvider, modelId?: string): ResolvedModel {
  if (modelId?.includes(":")) {
    const idx = modelId.indexOf(":");
    const parsed = llmProviderSchema.safeParse(modelId.slice(0, idx));
    if (parsed.success) {
      return { provider: parsed.data, modelId: modelId.slice(idx + 1) };
    }
  }
  return { provider, modelId: modelId ?? DEFAULT_MODELS[provider] };
}

export function resolveLanguageModel(
  provider: LLMProvider,
  modelId?: string
): LanguageModel {
  const resolved = resolveModelId(provider, modelId);
  return MODEL_FACTORIES[resolved.provider](resolved.modelId);
}

// ============================================================================
// Log entries
// ============================================================================

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface LlmLogEntry {
  timestamp: string;
  runId: string;
  taskType: string;
  pageId?: string;
  promptName: string;
  modelId: string;
  durationMs: number;
  usage?: TokenUsage;
  error?: string;
  system?: string;
  messages: LlmLogMessage[];
}

export interface LlmLogMessage {
  role: string;
  content: string;
}

// ============================================================================
// Prompt loading helper
// ============================================================================

/**
 * Load and render a Liquid prompt template, returning the system text and
 * the remaining messages in AI SDK form.
 */
export async function loadPrompt(
  templateName: string,
  context: Record<string, unknown>
): Promise<{ system?: string; messages: ModelMessage[] }> {
  const promptMessages = await renderPrompt(templateName, context);
  const system = promptMessages
    .filter((m) => m.role === "system")
    .map((m) => m.content)
    .join("\n\n");

  return {
    system: system || undefined,
    messages: toModelMessages(promptMessages),
  };
}

export function toModelMessages(messages: readonly PromptMessage[]): ModelMessage[] {
  const out: ModelMessage[] = [];
  for (const m of messages) {
    switch (m.role) {
      case "system":
        break;
      case "user":
        out.push({ role: "user", content: m.content });
        break;
      case "assistant":
        out.push({ role: "assistant", content: m.content });
        break;
    }
  }
  return out;
}

export function messagesToLogFormat(messages: readonly ModelMessage[]): LlmLogMessage[] {
  return messages.map((m) => ({
    role: m.role,
    content: typeof m.content === "string" ? m.content : JSON.stringify(m.content),
  }));
}
