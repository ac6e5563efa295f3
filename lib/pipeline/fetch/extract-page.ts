import { DomUtils, parseDocument } from "htmlparser2";
import type { PageRecord, PageSegment } from "../core/schemas";

const STRIPPED_TAGS = new Set(["script", "style", "noscript", "template"]);
const HEADING = /^h([1-6])$/;
const MIN_PARAGRAPH_CHARS = 30;

const PAGE_TYPE_CUES: ReadonlyArray<[string, readonly string[]]> = [
  ["product", ["ingredient", "how to use", "benefits"]],
  ["faq", ["faq", "frequently asked", "shipping", "returns"]],
  ["routine", ["routine", "step", "cleanse", "apply"]],
];

export interface ExtractedPage {
  page: PageRecord;
  /** Absolute hrefs found on the page, in document order */
  links: string[];
}

/**
 * Parse one HTML page into a Page Record plus its outgoing links.
 */
export function extractPage(html: string, url: string, fetchedAt: string): ExtractedPage {
  const doc = parseDocument(html);

  for (const el of DomUtils.getElementsByTagName((name) => STRIPPED_TAGS.has(name), doc, true)) {
    DomUtils.removeElement(el);
  }

  const titleEl = DomUtils.getElementsByTagName("title", doc, true, 1)[0];
  const title = titleEl ? collapse(DomUtils.textContent(titleEl)) : "";

  const metaEl = DomUtils.findOne(
    (el) =>
      el.name === "meta" &&
      (DomUtils.getAttributeValue(el, "name") ?? "").toLowerCase() === "description",
    doc.children
  );
  const metaDescription = metaEl ? (DomUtils.getAttributeValue(metaEl, "content") ?? "").trim() : "";

  const segments: PageSegment[] = [];
  const content = DomUtils.findAll(
    (el) => HEADING.test(el.name) || el.name === "p" || el.name === "li",
    doc.children
  );
  for (const el of content) {
    const text = collapse(DomUtils.textContent(el));
    if (!text) continue;
    const heading = HEADING.exec(el.name);
    if (heading) {
      segments.push({ kind: "heading", level: Number(heading[1]), text });
    } else if (el.name === "p") {
      if (text.length > MIN_PARAGRAPH_CHARS) segments.push({ kind: "paragraph", text });
    } else {
      segments.push({ kind: "list_item", text });
    }
  }

  const links: string[] = [];
  for (const a of DomUtils.getElementsByTagName("a", doc, true)) {
    const href = DomUtils.getAttributeValue(a, "href");
    if (!href) continue;
    try {
      links.push(new URL(href, url).toString());
    } catch {
      // unparseable hrefs are not links
      continue;
    }
  }

  const page: PageRecord = {
    source_url: url,
    page_type: classifyPageType(DomUtils.textContent(doc)),
    segments,
    fetched_at: fetchedAt,
  };
  if (title) page.title = title;
  if (metaDescription) page.meta_description = metaDescription;

  return { page, links };
}

/** Keyword heuristic over the page's visible text. */
export function classifyPageType(text: string): string {
  const lower = text.toLowerCase();
  for (const [type, cues] of PAGE_TYPE_CUES) {
    if (cues.some((cue) => lower.includes(cue))) return type;
  }
  return "general";
}

function collapse(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}
