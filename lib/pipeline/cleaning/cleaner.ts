import { createHash } from "node:crypto";
import type { CleanedDocument, PageRecord } from "../core/schemas";
import { normalizeText } from "../text";

export interface CleanOptions {
  minParagraphChars: number;
  maxHeadingLevel: number;
  navKeywords: readonly string[];
}

export interface CleanResult {
  documents: CleanedDocument[];
  /** Pages with no content left after filtering */
  empty: number;
  duplicates: number;
}

/**
 * Strip navigation and boilerplate from crawled pages and drop duplicate
 * pages. Keeps the title, top-level headings and content segments in
 * document order.
 */
export function cleanPages(pages: readonly PageRecord[], options: CleanOptions): CleanResult {
  const seen = new Set<string>();
  const documents: CleanedDocument[] = [];
  let empty = 0;
  let duplicates = 0;

  for (const page of pages) {
    const parts: string[] = [];
    let content = 0;

    const title = normalizeText(page.title ?? "");
    if (title) parts.push(title);

    for (const segment of page.segments) {
      if (segment.kind === "heading") {
        if ((segment.level ?? 1) <= options.maxHeadingLevel) parts.push(segment.text);
        continue;
      }
      if (isNavigationText(segment.text, options)) continue;
      parts.push(segment.text);
      content++;
    }

    if (content === 0) {
      empty++;
      continue;
    }

    const segments = parts.map(normalizeText).filter(Boolean);
    const hash = createHash("sha256").update(segments.join("\n\n")).digest("hex");
    if (seen.has(hash)) {
      duplicates++;
      continue;
    }
    seen.add(hash);

    documents.push({ source_url: page.source_url, page_type: page.page_type, segments });
  }

  return { documents, empty, duplicates };
}

export function isNavigationText(
  text: string,
  options: Pick<CleanOptions, "minParagraphChars" | "navKeywords">
): boolean {
  const lower = text.toLowerCase();
  if (lower.length < options.minParagraphChars) return true;
  return options.navKeywords.some((k) => lower.includes(k.toLowerCase()));
}
