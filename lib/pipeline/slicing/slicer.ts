/**
 * Slicer
 *
 * Breaks a cleaned document into bounded-size blocks. Cuts only happen at
 * segment or sentence boundaries, never inside an atomic span; when no
 * such boundary exists the slicer degrades (extends past the maximum for
 * a straddling span, or hard-cuts at a word break) instead of failing.
 */

import type { Block, BlockWarning, CleanedDocument } from "../core/schemas";
import type { AtomicSpan, SliceOptions, SliceResult, SpanKind } from "../core/types";
import { closingOffset, detectSpans, isCutAllowed } from "../spans/span-classifier";
import { countWords, normalizeText } from "../text";

const SEGMENT_JOIN = "\n\n";

/** Sentence end: terminal punctuation, optional closers, then whitespace */
const SENTENCE_END = /[.!?]+["'”’)\]]*\s+/g;
const LINE_BREAK = /\s*\n\s*/g;
const WHITESPACE = /\s/;

interface Boundary {
  /** Where the block before the boundary ends (exclusive) */
  end: number;
  /** Where the next block starts */
  cut: number;
}

interface BlockRange {
  start: number;
  end: number;
  warnings: BlockWarning[];
}

/**
 * Slice one cleaned document into ordered blocks.
 *
 * Pure: the same document and options always produce the same blocks.
 */
export function sliceDocument(doc: CleanedDocument, options: SliceOptions): SliceResult {
  const { maxBlockChars: max, minBlockChars: min } = options;
  const hardLimit = Math.max(options.hardLimitChars ?? max * 2, max);

  const text = doc.segments.map(normalizeText).filter(Boolean).join(SEGMENT_JOIN);
  if (text.length === 0) return { blocks: [], degenerate: false };

  const { spans } = detectSpans(text);
  const boundaries = findBoundaries(text, spans);
  const ranges: BlockRange[] = [];
  const len = text.length;
  let start = 0;

  const cutAt = (pos: number, warnings: BlockWarning[]) => {
    let end = pos;
    while (end > start && WHITESPACE.test(text[end - 1])) end--;
    let next = pos;
    while (next < len && WHITESPACE.test(text[next])) next++;
    ranges.push({ start, end, warnings });
    start = next;
  };

  while (start < len) {
    if (len - start <= max) {
      ranges.push({ start, end: len, warnings: [] });
      break;
    }

    const limit = start + max;

    // Largest boundary that keeps the block within [min, max]
    let best: Boundary | undefined;
    for (const b of boundaries) {
      if (b.cut <= start) continue;
      const size = b.end - start;
      if (size > max) break;
      if (size >= Math.max(min, 1)) best = b;
    }
    if (best) {
      ranges.push({ start, end: best.end, warnings: [] });
      start = best.cut;
      continue;
    }

    const spanClose = closingOffset(limit, spans);
    if (spanClose > limit) {
      // A span straddles the limit: let the block run until it closes
      const ceiling = start + hardLimit;
      if (len <= ceiling && !boundaries.some((b) => b.end >= spanClose && b.end < len)) {
        ranges.push({ start, end: len, warnings: ["atomic_span_overflow"] });
        break;
      }
      const next = boundaries.find((b) => b.end >= spanClose && b.end <= ceiling);
      if (next) {
        ranges.push({ start, end: next.end, warnings: ["atomic_span_overflow"] });
        start = next.cut;
        continue;
      }
      cutAt(firstFreeWhitespace(text, spanClose, ceiling, spans) ?? spanClose, [
        "atomic_span_overflow",
      ]);
      continue;
    }

    // No sentence or segment boundary fits: hard cut at a word break
    cutAt(lastFreeWhitespace(text, start + Math.max(min, 1), limit, spans) ?? limit, [
      "classification_degenerate",
    ]);
  }

  const degenerate = ranges.some((r) => r.warnings.includes("classification_degenerate"));
  const review = degenerate && options.degeneratePolicy === "review";

  const blocks = ranges.map((range, ordinal) =>
    toBlock(doc, text, spans, range, ordinal, review)
  );
  return { blocks, degenerate };
}

function findBoundaries(text: string, spans: readonly AtomicSpan[]): Boundary[] {
  const byCut = new Map<number, number>();
  const add = (end: number, cut: number) => {
    if (cut <= 0 || cut >= text.length) return;
    if (!isCutAllowed(end, spans) || !isCutAllowed(cut, spans)) return;
    const existing = byCut.get(cut);
    if (existing === undefined || end < existing) byCut.set(cut, end);
  };

  for (const m of text.matchAll(SENTENCE_END)) {
    const trailing = m[0].length - m[0].trimEnd().length;
    add(m.index + m[0].length - trailing, m.index + m[0].length);
  }
  for (const m of text.matchAll(LINE_BREAK)) {
    add(m.index, m.index + m[0].length);
  }

  return [...byCut.entries()]
    .map(([cut, end]) => ({ end, cut }))
    .sort((a, b) => a.cut - b.cut);
}

/**
 * Last position in [from, to] that opens a whitespace run outside every
 * span. Opening the run keeps the trimmed block end at or after `from`.
 */
function lastFreeWhitespace(
  text: string,
  from: number,
  to: number,
  spans: readonly AtomicSpan[]
): number | undefined {
  for (let p = Math.min(to, text.length - 1); p >= from; p--) {
    if (isRunStart(text, p) && isCutAllowed(p, spans)) return p;
  }
  return undefined;
}

/** First whitespace in [from, to] outside every span. */
function firstFreeWhitespace(
  text: string,
  from: number,
  to: number,
  spans: readonly AtomicSpan[]
): number | undefined {
  for (let p = from; p <= Math.min(to, text.length - 1); p++) {
    if (WHITESPACE.test(text[p]) && isCutAllowed(p, spans)) return p;
  }
  return undefined;
}

function isRunStart(text: string, p: number): boolean {
  return WHITESPACE.test(text[p]) && p > 0 && !WHITESPACE.test(text[p - 1]);
}

function toBlock(
  doc: CleanedDocument,
  text: string,
  spans: readonly AtomicSpan[],
  range: BlockRange,
  ordinal: number,
  review: boolean
): Block {
  const blockText = text.slice(range.start, range.end);
  const flags: Record<SpanKind, boolean> = {
    price: false,
    measurement: false,
    temporal: false,
    warning: false,
  };
  for (const s of spans) {
    if (s.start >= range.start && s.end <= range.end) flags[s.kind] = true;
  }

  const block: Block = {
    source_url: doc.source_url,
    page_type: doc.page_type,
    ordinal,
    text: blockText,
    flags,
    char_count: blockText.length,
    word_count: countWords(blockText),
  };
  if (range.warnings.length > 0) block.warnings = range.warnings;
  if (review) block.review = true;
  return block;
}
