import { describe, it, expect, vi } from "vitest";
import { crawlSite, normalizeUrl, shouldFollow, type CrawlOptions } from "../crawler";

const PAGES: Record<string, { status: number; body: string }> = {
  "https://example.com": {
    status: 200,
    body: `<title>Home</title>
      <p>Welcome to the clinic, where every visit starts with a consultation.</p>
      <a href="/a">A</a><a href="/a/">A again</a><a href="/b#top">B</a>
      <a href="/login">Login</a><a href="/img.png">Image</a>
      <a href="https://other.com/c">Other</a>`,
  },
  "https://example.com/a": {
    status: 200,
    body: `<title>A</title><a href="/">Home</a>`,
  },
  "https://example.com/b": { status: 500, body: "" },
};

type FetchInput = Parameters<typeof fetch>[0];

function urlOf(input: FetchInput): string {
  if (typeof input === "string") return input;
  return input instanceof URL ? input.toString() : input.url;
}

function fakeFetch() {
  return vi.fn(async (input: FetchInput) => {
    const entry = PAGES[urlOf(input)];
    if (!entry) return new Response("missing", { status: 404 });
    return new Response(entry.body, {
      status: entry.status,
      headers: { "content-type": "text/html; charset=utf-8" },
    });
  });
}

function options(overrides: Partial<CrawlOptions> = {}): CrawlOptions {
  return {
    maxPages: 10,
    delaySeconds: 1,
    timeoutMs: 5000,
    userAgent: "test-agent",
    skipKeywords: ["login"],
    skipExtensions: [".png"],
    delay: vi.fn(async () => undefined),
    ...overrides,
  };
}

describe("crawlSite", () => {
  it("crawls breadth-first within the host", async () => {
    const fetchFn = fakeFetch();
    const delay = vi.fn(async () => undefined);
    const result = await crawlSite("https://example.com/", options({ fetch: fetchFn, delay }));

    expect(fetchFn.mock.calls.map(([input]) => urlOf(input))).toEqual([
      "https://example.com",
      "https://example.com/a",
      "https://example.com/b",
    ]);
    expect(result.pages.map((p) => p.source_url)).toEqual([
      "https://example.com",
      "https://example.com/a",
    ]);
    expect(result.warnings).toEqual(["https://example.com/b: HTTP 500"]);
    expect(result.requested).toBe(3);
    expect(delay).toHaveBeenCalledTimes(2);
    expect(delay).toHaveBeenCalledWith(1000);
  });

  it("stops at maxPages", async () => {
    const fetchFn = fakeFetch();
    const result = await crawlSite("https://example.com", options({ fetch: fetchFn, maxPages: 1 }));

    expect(result.pages).toHaveLength(1);
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it("records network errors as warnings", async () => {
    const fetchFn = vi.fn(async () => {
      throw new Error("connect ECONNREFUSED");
    });
    const result = await crawlSite("https://example.com", options({ fetch: fetchFn }));

    expect(result.pages).toEqual([]);
    expect(result.warnings).toEqual(["https://example.com: connect ECONNREFUSED"]);
  });

  it("reports each fetched page", async () => {
    const onPage = vi.fn();
    await crawlSite("https://example.com", options({ fetch: fakeFetch(), onPage }));

    expect(onPage.mock.calls).toEqual([
      ["https://example.com", 1],
      ["https://example.com/a", 2],
    ]);
  });
});

describe("normalizeUrl", () => {
  it("drops fragments and trailing slashes", () => {
    expect(normalizeUrl("https://example.com/services/#pricing")).toBe(
      "https://example.com/services"
    );
  });
});

describe("shouldFollow", () => {
  const opts = { skipKeywords: ["cart"], skipExtensions: [".pdf"] };

  it("rejects other hosts, skip keywords and skip extensions", () => {
    expect(shouldFollow("https://other.com/a", "example.com", opts)).toBe(false);
    expect(shouldFollow("https://example.com/Cart", "example.com", opts)).toBe(false);
    expect(shouldFollow("https://example.com/menu.PDF", "example.com", opts)).toBe(false);
    expect(shouldFollow("mailto:hello@example.com", "example.com", opts)).toBe(false);
  });

  it("accepts same-host pages", () => {
    expect(shouldFollow("https://example.com/services", "example.com", opts)).toBe(true);
  });
});
