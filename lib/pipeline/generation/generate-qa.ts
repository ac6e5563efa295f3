/**
 * QA Generation
 *
 * Turns tagged blocks into question/answer records:
 * 1. Keep blocks whose role is allowed and that are not held for review
 * 2. Drop low-signal blocks (too short, listings, dropdown text)
 * 3. Group by page, batch under a token budget
 * 4. Run batches through a QaGenerator with bounded concurrency, each
 *    call time-boxed; a failed batch becomes a failure record
 */

import { GenerationTimeout } from "../core/errors";
import type { GenerationFailure, QaRecord, Role, TaggedBlock } from "../core/schemas";
import type { QaBatch, QaGenerator } from "../core/types";

const PRICE = /\$\s?\d+/;
const BOOKED = /\bbooked\b/i;
const DROPDOWN = /please choose an option/i;
const MIN_WORDS = 8;
const MIN_DISTINCT_WORDS = 5;

export interface GenerateQaOptions {
  roles: readonly Role[];
  maxTokensPerBatch: number;
  tokenMultiplier: number;
  timeoutMs: number;
  concurrency: number;
  onBatch?: (completed: number, total: number) => void;
}

export interface GenerateQaResult {
  records: QaRecord[];
  failures: GenerationFailure[];
  batches: number;
  /** Blocks excluded by role, review or the low-signal filter */
  excluded: number;
}

export function isLowSignal(block: Pick<TaggedBlock, "text" | "word_count">): boolean {
  const text = block.text.trim();
  if (block.word_count < MIN_WORDS) return true;
  if (PRICE.test(text) && BOOKED.test(text)) return true;
  if (DROPDOWN.test(text)) return true;
  return new Set(text.split(/\s+/)).size < MIN_DISTINCT_WORDS;
}

export function estimateTokens(wordCount: number, multiplier: number): number {
  return Math.ceil(wordCount * multiplier);
}

/**
 * Group eligible blocks by (source_url, page_type) in first-seen order and
 * pack each group into batches that stay under the token budget. A block
 * that alone exceeds the budget still gets a batch of its own.
 */
export function buildBatches(
  blocks: readonly TaggedBlock[],
  options: Pick<GenerateQaOptions, "maxTokensPerBatch" | "tokenMultiplier">
): QaBatch[] {
  const groups = new Map<string, TaggedBlock[]>();
  for (const block of blocks) {
    const key = `${block.source_url}\u0000${block.page_type}`;
    const group = groups.get(key);
    if (group) group.push(block);
    else groups.set(key, [block]);
  }

  const batches: QaBatch[] = [];
  for (const group of groups.values()) {
    const sorted = [...group].sort((a, b) => a.ordinal - b.ordinal);
    let current: TaggedBlock[] = [];
    let words = 0;

    const flush = () => {
      if (current.length === 0) return;
      batches.push({
        sourceUrl: current[0].source_url,
        pageType: current[0].page_type,
        ordinals: current.map((b) => b.ordinal),
        texts: current.map((b) => b.text),
      });
      current = [];
      words = 0;
    };

    for (const block of sorted) {
      const next = words + block.word_count;
      if (
        current.length > 0 &&
        estimateTokens(next, options.tokenMultiplier) > options.maxTokensPerBatch
      ) {
        flush();
      }
      current.push(block);
      words += block.word_count;
    }
    flush();
  }
  return batches;
}

export async function generateQa(
  blocks: readonly TaggedBlock[],
  generator: QaGenerator,
  options: GenerateQaOptions
): Promise<GenerateQaResult> {
  const allowed = new Set<Role>(options.roles);
  const eligible = blocks.filter(
    (b) => allowed.has(b.role) && b.review !== true && !isLowSignal(b)
  );
  const batches = buildBatches(eligible, options);

  const results: Array<QaRecord[] | GenerationFailure> = new Array(batches.length);
  let completed = 0;

  async function processBatch(i: number): Promise<void> {
    const batch = batches[i];
    try {
      const pairs = await withTimeout(
        (signal) => generator.generate(batch, signal),
        options.timeoutMs
      );
      results[i] = pairs.map((p) => ({
        source_url: batch.sourceUrl,
        page_type: batch.pageType,
        question: p.question,
        answer: p.answer,
      }));
    } catch (err) {
      results[i] = {
        source_url: batch.sourceUrl,
        page_type: batch.pageType,
        ordinals: batch.ordinals,
        error: err instanceof GenerationTimeout ? "GenerationTimeout" : "GenerationError",
        message: err instanceof Error ? err.message : String(err),
      };
    }
    completed++;
    options.onBatch?.(completed, batches.length);
  }

  // Process batches with bounded concurrency
  const queue = batches.map((_, i) => i);
  const workers = Array.from(
    { length: Math.min(Math.max(options.concurrency, 1), batches.length) },
    async () => {
      for (let i = queue.shift(); i !== undefined; i = queue.shift()) {
        await processBatch(i);
      }
    }
  );
  await Promise.all(workers);

  const records: QaRecord[] = [];
  const failures: GenerationFailure[] = [];
  for (const result of results) {
    if (Array.isArray(result)) records.push(...result);
    else failures.push(result);
  }

  return {
    records,
    failures,
    batches: batches.length,
    excluded: blocks.length - eligible.length,
  };
}

/**
 * Run `task` with an abort signal that fires after `timeoutMs`; the
 * returned promise rejects with GenerationTimeout at that point even if
 * the task ignores the signal.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new GenerationTimeout(timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
