/**
 * Core types for the pure pipeline functions.
 *
 * Artifact shapes live in schemas.ts (inferred from zod); the types here
 * describe in-memory values that never hit disk directly.
 */

import type { Block, DegeneratePolicy, QaResponse } from "./schemas";

// ============================================================================
// Atomic spans
// ============================================================================

export type SpanKind = "price" | "measurement" | "temporal" | "warning";

export interface AtomicSpan {
  kind: SpanKind;
  start: number; // inclusive
  end: number; // exclusive
  text: string;
}

export interface SpanReport {
  flags: Record<SpanKind, boolean>;
  spans: AtomicSpan[]; // sorted by start, then end
}

// ============================================================================
// Slicing
// ============================================================================

export interface SliceOptions {
  maxBlockChars: number;
  minBlockChars: number;
  /** Ceiling when a span forces a block past maxBlockChars (default 2 × max) */
  hardLimitChars?: number;
  degeneratePolicy?: DegeneratePolicy;
}

export interface SliceResult {
  blocks: Block[];
  /** True when at least one cut fell back to a hard character limit */
  degenerate: boolean;
}

// ============================================================================
// QA generation - abstracted interface for the LLM collaborator
// ============================================================================

export interface QaBatch {
  sourceUrl: string;
  pageType: string;
  ordinals: number[];
  texts: string[];
}

export interface QaGenerator {
  generate(batch: QaBatch, signal: AbortSignal): Promise<QaResponse["pairs"]>;
}
