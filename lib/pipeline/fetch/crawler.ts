/**
 * Crawler
 *
 * Breadth-first, same-host crawl starting from a single URL. Pages that
 * fail to fetch are reported as warnings; the caller decides whether an
 * empty crawl is fatal.
 */

import { setTimeout as sleep } from "node:timers/promises";
import type { PageRecord } from "../core/schemas";
import { extractPage } from "./extract-page";

export interface CrawlOptions {
  maxPages: number;
  delaySeconds: number;
  timeoutMs: number;
  userAgent: string;
  skipKeywords: readonly string[];
  skipExtensions: readonly string[];
  fetch?: typeof fetch;
  /** Waits between requests; injectable so tests don't sleep */
  delay?: (ms: number) => Promise<unknown>;
  onPage?: (url: string, fetched: number) => void;
  now?: () => Date;
}

export interface CrawlResult {
  pages: PageRecord[];
  warnings: string[];
  /** URLs requested, successful or not */
  requested: number;
}

export async function crawlSite(startUrl: string, options: CrawlOptions): Promise<CrawlResult> {
  const fetchFn = options.fetch ?? fetch;
  const delay = options.delay ?? sleep;
  const now = options.now ?? (() => new Date());

  const start = normalizeUrl(startUrl);
  const host = new URL(start).host;
  const queue: string[] = [start];
  const seen = new Set<string>(queue);
  const pages: PageRecord[] = [];
  const warnings: string[] = [];
  let requested = 0;

  while (queue.length > 0 && pages.length < options.maxPages) {
    const url = queue.shift();
    if (url === undefined) break;

    if (requested > 0 && options.delaySeconds > 0) {
      await delay(options.delaySeconds * 1000);
    }
    requested++;

    let html: string;
    try {
      const res = await fetchFn(url, {
        headers: { "User-Agent": options.userAgent },
        signal: AbortSignal.timeout(options.timeoutMs),
      });
      if (!res.ok) {
        warnings.push(`${url}: HTTP ${res.status}`);
        continue;
      }
      const contentType = res.headers.get("content-type") ?? "";
      if (contentType && !contentType.includes("html")) {
        warnings.push(`${url}: skipped non-HTML content (${contentType})`);
        continue;
      }
      html = await res.text();
    } catch (err) {
      warnings.push(`${url}: ${err instanceof Error ? err.message : String(err)}`);
      continue;
    }

    const { page, links } = extractPage(html, url, now().toISOString());
    pages.push(page);
    options.onPage?.(url, pages.length);

    for (const link of links) {
      const next = normalizeUrl(link);
      if (seen.has(next) || !shouldFollow(next, host, options)) continue;
      seen.add(next);
      queue.push(next);
    }
  }

  return { pages, warnings, requested };
}

/** Drop the fragment and any trailing slash. */
export function normalizeUrl(raw: string): string {
  const url = new URL(raw);
  url.hash = "";
  return url.toString().replace(/\/+$/, "");
}

export function shouldFollow(
  url: string,
  host: string,
  options: Pick<CrawlOptions, "skipKeywords" | "skipExtensions">
): boolean {
  const parsed = new URL(url);
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") return false;
  if (parsed.host !== host) return false;

  const lower = url.toLowerCase();
  if (options.skipKeywords.some((k) => lower.includes(k.toLowerCase()))) return false;
  const path = parsed.pathname.toLowerCase();
  return !options.skipExtensions.some((ext) => path.endsWith(ext.toLowerCase()));
}
