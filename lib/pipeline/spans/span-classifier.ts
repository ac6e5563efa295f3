/**
 * Span Classifier
 *
 * Finds atomic spans (prices, measurements, dates/durations, warning
 * phrases) in a piece of text and reports their exact offsets, so the
 * slicer knows where a cut is forbidden.
 *
 * Detection is purely lexical. Each category is one combined regex, so
 * within a category the leftmost non-overlapping match wins; categories
 * run independently and may overlap each other.
 */

import { z } from "zod/v4";
import type { AtomicSpan, SpanKind, SpanReport } from "../core/types";
import rawVocabulary from "./vocabulary.json";

const vocabularySchema = z.object({
  currency_symbols: z.array(z.string()).min(1),
  currency_codes: z.array(z.string()).min(1),
  measurement_units: z.array(z.string()).min(1),
  duration_units: z.array(z.string()).min(1),
  months: z.array(z.string()).min(1),
  warning_cues: z.array(z.string()).min(1),
});

export type SpanVocabulary = z.infer<typeof vocabularySchema>;

export const SPAN_KINDS: readonly SpanKind[] = [
  "price",
  "measurement",
  "temporal",
  "warning",
];

const NUM = String.raw`\d+(?:[.,]\d+)*`;
const RANGE_SEP = String.raw`\s?(?:-|–|to)\s?`;
// A number must not continue a word or another number
const NUM_START = String.raw`(?<![\p{L}\p{N}.,])`;
const WORD_END = String.raw`(?![\p{L}\p{N}])`;

export type SpanPatterns = Record<SpanKind, RegExp>;

/**
 * Compile one global regex per category from a vocabulary.
 */
export function compileSpanPatterns(vocabulary: SpanVocabulary): SpanPatterns {
  const sym = alternation(vocabulary.currency_symbols);
  const code = alternation(vocabulary.currency_codes);
  const unit = alternation(vocabulary.measurement_units);
  const duration = alternation(vocabulary.duration_units);
  const month = alternation(vocabulary.months);
  const cue = alternation(vocabulary.warning_cues);

  const price = [
    // $300, $300-$400, $ 1,200.50 to 2,000
    `(?:${sym})\\s?${NUM}(?:${RANGE_SEP}(?:${sym})?\\s?${NUM})?`,
    // 300€, 20 - 30 £
    `${NUM_START}${NUM}(?:\\s?[-–]\\s?${NUM})?\\s?(?:${sym})`,
    // USD 300
    `(?<![\\p{L}])(?:${code})\\s?${NUM}`,
    // 300 USD
    `${NUM_START}${NUM}\\s?(?:${code})${WORD_END}`,
  ].join("|");

  const measurement = `${NUM_START}${NUM}(?:${RANGE_SEP}${NUM})?\\s?(?:${unit})${WORD_END}`;

  const temporal = [
    // 2024-05-01
    String.raw`${NUM_START}\d{4}-\d{2}-\d{2}${WORD_END}`,
    // 05/01/2024
    String.raw`${NUM_START}\d{1,2}/\d{1,2}/\d{2,4}${WORD_END}`,
    // May 1, 2024 / Sept. 3rd
    `(?<![\\p{L}])(?:${month})\\.?\\s\\d{1,2}(?:st|nd|rd|th)?(?:,?\\s\\d{4})?${WORD_END}`,
    // 1 May 2024 / 3rd of June
    `${NUM_START}\\d{1,2}(?:st|nd|rd|th)?\\s(?:of\\s)?(?:${month})(?:,?\\s\\d{4})?${WORD_END}`,
    // 9:30 am, 17:00
    `${NUM_START}\\d{1,2}:\\d{2}(?:\\s?(?:am|pm))?${WORD_END}`,
    // 5pm
    `${NUM_START}\\d{1,2}\\s?(?:am|pm)${WORD_END}`,
    // 3-4 months, 30 minutes
    `${NUM_START}${NUM}(?:${RANGE_SEP}${NUM})?\\s?(?:${duration})${WORD_END}`,
  ].join("|");

  const warning = `(?<![\\p{L}])(?:${cue})(?![\\p{L}])`;

  return {
    price: new RegExp(price, "gu"),
    measurement: new RegExp(measurement, "giu"),
    temporal: new RegExp(temporal, "giu"),
    warning: new RegExp(warning, "giu"),
  };
}

const DEFAULT_PATTERNS = compileSpanPatterns(vocabularySchema.parse(rawVocabulary));

/**
 * Detect every atomic span in `text`.
 */
export function detectSpans(
  text: string,
  patterns: SpanPatterns = DEFAULT_PATTERNS
): SpanReport {
  const spans: AtomicSpan[] = [];
  const flags: Record<SpanKind, boolean> = {
    price: false,
    measurement: false,
    temporal: false,
    warning: false,
  };

  for (const kind of SPAN_KINDS) {
    // matchAll clones the regex, so shared patterns keep no lastIndex state
    for (const match of text.matchAll(patterns[kind])) {
      if (match[0].length === 0) continue;
      const start = match.index;
      spans.push({ kind, start, end: start + match[0].length, text: match[0] });
      flags[kind] = true;
    }
  }

  spans.sort((a, b) => a.start - b.start || a.end - b.end);
  return { flags, spans };
}

/**
 * A cut at `offset` separates text[offset - 1] from text[offset].
 * It is forbidden when it falls strictly inside any span.
 */
export function isCutAllowed(offset: number, spans: readonly AtomicSpan[]): boolean {
  return !spans.some((s) => s.start < offset && offset < s.end);
}

/**
 * If `offset` is inside a span, follow the chain of overlapping spans and
 * return the offset where the last of them closes; otherwise `offset`.
 */
export function closingOffset(offset: number, spans: readonly AtomicSpan[]): number {
  let end = offset;
  let extended = true;
  while (extended) {
    extended = false;
    for (const s of spans) {
      if (s.start < end && end < s.end) {
        end = s.end;
        extended = true;
      }
    }
  }
  return end;
}

function alternation(words: readonly string[]): string {
  return [...words]
    .sort((a, b) => b.length - a.length)
    .map((w) => escapeRegex(w).replace(/ /g, "[ \\t]+"))
    .join("|");
}

function escapeRegex(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
