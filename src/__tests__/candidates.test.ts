import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import Firecrawl from "@mendable/firecrawl-js";
import { loadConfig } from "@/lib/config";
import {
  createCandidateFinder,
  exponentialBackoff,
  isTransientError,
  searchQueryFor,
  SearchAbortedError,
  searchWithRetry,
  SearchTimeoutError,
} from "@/lib/enrichment/candidates";
import type { Candidate, PageFetcher, SearchAdapter, SearchHit } from "@/lib/enrichment/types";
import { TransientEnrichmentError } from "@/lib/errors";
import {
  firecrawlPageFetcher,
  firecrawlSearchAdapter,
  markdownHeadings,
  parseScrapeResponse,
  parseSearchResponse,
} from "@/lib/firecrawl/client";

const config = loadConfig({ searchRetries: 2, searchBackoffMs: 0, searchTimeoutMs: 1000 }, {});

function httpError(status: number, message = `HTTP ${status}`): Error {
  return Object.assign(new Error(message), { status });
}

async function collect(iterable: AsyncIterable<Candidate>): Promise<Candidate[]> {
  const out: Candidate[] = [];
  for await (const item of iterable) out.push(item);
  return out;
}

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

// ── Retry policy ────────────────────────────────────────────────────────────

describe("searchWithRetry", () => {
  it("retries transient failures and returns the first success", async () => {
    const hits: SearchHit[] = [{ url: "https://acme.com" }];
    const adapter = vi
      .fn<SearchAdapter>()
      .mockRejectedValueOnce(httpError(503))
      .mockRejectedValueOnce(httpError(429))
      .mockResolvedValueOnce(hits);

    await expect(searchWithRetry(adapter, "Acme official website", config)).resolves.toEqual(hits);
    expect(adapter).toHaveBeenCalledTimes(3);
    expect(adapter).toHaveBeenCalledWith(
      "Acme official website",
      expect.objectContaining({ limit: 5 }),
    );
  });

  it("throws TransientEnrichmentError once retries are exhausted", async () => {
    const adapter = vi.fn<SearchAdapter>().mockRejectedValue(httpError(502, "Bad gateway"));

    const error = await searchWithRetry(adapter, "q", config).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(TransientEnrichmentError);
    expect(error).toMatchObject({
      attempts: 3,
      message: "Search failed after 3 attempt(s): Bad gateway",
    });
    expect(adapter).toHaveBeenCalledTimes(3);
  });

  it("does not retry permanent failures", async () => {
    const unauthorized = httpError(401, "Unauthorized");
    const adapter = vi.fn<SearchAdapter>().mockRejectedValue(unauthorized);

    await expect(searchWithRetry(adapter, "q", config)).rejects.toBe(unauthorized);
    expect(adapter).toHaveBeenCalledTimes(1);
  });

  it("treats a slow search as a transient timeout", async () => {
    const adapter = vi.fn<SearchAdapter>().mockImplementation(() => new Promise<SearchHit[]>(() => {}));
    const quick = loadConfig({ searchRetries: 0, searchTimeoutMs: 20 }, {});

    const error = await searchWithRetry(adapter, "q", quick).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(TransientEnrichmentError);
    expect(error).toMatchObject({ attempts: 1, message: "Search failed after 1 attempt(s): Search timed out after 20ms" });
    expect(adapter).toHaveBeenCalledTimes(1);
  });

  it("aborts the adapter's signal when the caller cancels", async () => {
    const controller = new AbortController();
    let seen: AbortSignal | undefined;
    const adapter = vi.fn<SearchAdapter>().mockImplementation(async (_query, { signal }) => {
      seen = signal;
      controller.abort();
      throw httpError(503);
    });

    await expect(searchWithRetry(adapter, "q", config, controller.signal)).rejects.toThrow("HTTP 503");
    expect(adapter).toHaveBeenCalledTimes(1);
    expect(seen?.aborted).toBe(true);
  });

  it("stops waiting on a search that ignores cancellation", async () => {
    const controller = new AbortController();
    const adapter = vi.fn<SearchAdapter>().mockImplementation(() => new Promise<SearchHit[]>(() => {}));
    const slow = loadConfig({ searchRetries: 0, searchTimeoutMs: 60_000 }, {});
    setTimeout(() => controller.abort(), 10);

    await expect(searchWithRetry(adapter, "q", slow, controller.signal)).rejects.toThrow(SearchAbortedError);
    expect(adapter).toHaveBeenCalledTimes(1);
  });

  it("cuts the backoff wait short when the caller cancels", async () => {
    const controller = new AbortController();
    const adapter = vi.fn<SearchAdapter>().mockImplementation(async () => {
      setTimeout(() => controller.abort(), 10);
      throw httpError(503);
    });
    const patient = loadConfig({ searchRetries: 2, searchBackoffMs: 60_000 }, {});

    await expect(searchWithRetry(adapter, "q", patient, controller.signal)).rejects.toThrow(SearchAbortedError);
    expect(adapter).toHaveBeenCalledTimes(1);
  });

  it("passes the timeout to the adapter", async () => {
    const adapter = vi.fn<SearchAdapter>().mockResolvedValue([]);
    await searchWithRetry(adapter, "q", config);
    expect(adapter).toHaveBeenCalledWith("q", expect.objectContaining({ limit: 5, timeoutMs: 1000 }));
  });
});

describe("exponentialBackoff", () => {
  it("doubles the base delay per attempt", () => {
    expect(exponentialBackoff(1000, 0)).toBe(1000);
    expect(exponentialBackoff(1000, 1)).toBe(2000);
    expect(exponentialBackoff(1000, 2)).toBe(4000);
  });
});

describe("isTransientError", () => {
  it("recognizes timeouts, rate limits, server errors and network codes", () => {
    expect(isTransientError(new SearchTimeoutError(10))).toBe(true);
    expect(isTransientError(httpError(408))).toBe(true);
    expect(isTransientError(httpError(429))).toBe(true);
    expect(isTransientError(httpError(500))).toBe(true);
    expect(isTransientError(Object.assign(new Error("reset"), { code: "ECONNRESET" }))).toBe(true);
    expect(isTransientError(new Error("fetch failed"))).toBe(true);
    expect(isTransientError(new Error("wrapped", { cause: { code: "ETIMEDOUT" } }))).toBe(true);
  });

  it("rejects client errors and plain failures", () => {
    expect(isTransientError(httpError(400))).toBe(false);
    expect(isTransientError(httpError(404))).toBe(false);
    expect(isTransientError(new Error("Invalid API key"))).toBe(false);
    expect(isTransientError("boom")).toBe(false);
  });
});

// ── Finder ──────────────────────────────────────────────────────────────────

describe("createCandidateFinder", () => {
  it("queries for the official website and yields one candidate per host", async () => {
    const adapter = vi.fn<SearchAdapter>().mockResolvedValue([
      { url: "https://www.acme.com/", title: "Acme", description: "Widgets" },
      { url: "https://acme.com/about", title: "About Acme" },
      { url: "mailto:info@acme.com" },
      { url: "https://linkedin.com/company/acme", title: "Acme | LinkedIn" },
    ]);
    const finder = createCandidateFinder(adapter, config);

    const candidates = await collect(
      finder.findCandidates({ clusterId: "c_1", representativeName: "Acme" }),
    );

    expect(adapter).toHaveBeenCalledWith(searchQueryFor("Acme"), expect.objectContaining({ limit: 5 }));
    expect(searchQueryFor("Acme")).toBe("Acme official website");
    expect(candidates.map((c) => [c.domain, c.rank])).toEqual([
      ["acme.com", 0],
      ["linkedin.com", 3],
    ]);
    expect(candidates[0]).toMatchObject({
      clusterId: "c_1",
      url: "https://www.acme.com/",
      title: "Acme",
      description: "Widgets",
      resultLimit: 5,
      score: 0,
    });
  });

  it("ignores hits beyond the result limit", async () => {
    const adapter = vi.fn<SearchAdapter>().mockResolvedValue([
      { url: "https://a.com" },
      { url: "https://b.com" },
      { url: "https://c.com" },
    ]);
    const finder = createCandidateFinder(adapter, loadConfig({ searchResultLimit: 2 }, {}));

    const candidates = await collect(finder.findCandidates({ clusterId: "c_1", representativeName: "A" }));
    expect(candidates.map((c) => c.domain)).toEqual(["a.com", "b.com"]);
  });

  it("reads the pages of the top results only", async () => {
    const adapter = vi.fn<SearchAdapter>().mockResolvedValue([
      { url: "https://nwt.com", title: "Home" },
      { url: "https://b.com" },
      { url: "https://c.com" },
    ]);
    const fetchPage = vi.fn<PageFetcher>().mockResolvedValue({ title: "Northwind Traders", headings: [] });
    const finder = createCandidateFinder(adapter, loadConfig({ pageCheckLimit: 2 }, {}), fetchPage);

    const candidates = await collect(finder.findCandidates({ clusterId: "c_1", representativeName: "Northwind" }));

    expect(fetchPage.mock.calls.map(([url]) => url)).toEqual(["https://nwt.com", "https://b.com"]);
    expect(candidates.map((c) => c.page?.title)).toEqual(["Northwind Traders", "Northwind Traders", undefined]);
  });

  it("keeps a candidate whose page cannot be read", async () => {
    const adapter = vi.fn<SearchAdapter>().mockResolvedValue([{ url: "https://acme.com", title: "Acme" }]);
    const fetchPage = vi.fn<PageFetcher>().mockRejectedValue(new Error("HTTP 403"));
    const finder = createCandidateFinder(adapter, config, fetchPage);

    const candidates = await collect(finder.findCandidates({ clusterId: "c_1", representativeName: "Acme" }));

    expect(candidates).toHaveLength(1);
    expect(candidates[0].page).toBeUndefined();
    expect(console.warn).toHaveBeenCalledWith("[page] Could not read https://acme.com: HTTP 403");
  });

  it("skips page reads when the limit is 0", async () => {
    const adapter = vi.fn<SearchAdapter>().mockResolvedValue([{ url: "https://acme.com" }]);
    const fetchPage = vi.fn<PageFetcher>().mockResolvedValue(null);
    const finder = createCandidateFinder(adapter, loadConfig({ pageCheckLimit: 0 }, {}), fetchPage);

    await collect(finder.findCandidates({ clusterId: "c_1", representativeName: "Acme" }));
    expect(fetchPage).not.toHaveBeenCalled();
  });

  it("yields nothing when search finds nothing", async () => {
    const finder = createCandidateFinder(vi.fn<SearchAdapter>().mockResolvedValue([]), config);
    expect(await collect(finder.findCandidates({ clusterId: "c_1", representativeName: "Acme" }))).toEqual([]);
  });
});

// ── Firecrawl adapter ───────────────────────────────────────────────────────

describe("parseSearchResponse", () => {
  it("reads the web result list", () => {
    expect(
      parseSearchResponse({
        web: [
          { url: "https://acme.com", title: "Acme", description: "Widgets" },
          { title: "No URL" },
        ],
      }),
    ).toEqual([{ url: "https://acme.com", title: "Acme", description: "Widgets" }]);
  });

  it("falls back to data[] and metadata fields", () => {
    expect(
      parseSearchResponse({
        data: [{ metadata: { sourceURL: "https://globex.com", title: "Globex", description: null } }],
      }),
    ).toEqual([{ url: "https://globex.com", title: "Globex", description: undefined }]);
  });

  it("returns no hits for an empty response", () => {
    expect(parseSearchResponse({})).toEqual([]);
  });

  it("rejects a malformed response", () => {
    expect(() => parseSearchResponse({ web: "nope" })).toThrow("Unexpected Firecrawl search response");
  });
});

describe("firecrawlSearchAdapter", () => {
  const originalKey = process.env.FIRECRAWL_API_KEY;

  afterEach(() => {
    if (originalKey === undefined) delete process.env.FIRECRAWL_API_KEY;
    else process.env.FIRECRAWL_API_KEY = originalKey;
  });

  it("requires an API key", async () => {
    delete process.env.FIRECRAWL_API_KEY;
    await expect(firecrawlSearchAdapter("Acme official website", { limit: 5 })).rejects.toThrow(
      "FIRECRAWL_API_KEY environment variable is not set",
    );
  });

  it("maps the SDK response to hits", async () => {
    process.env.FIRECRAWL_API_KEY = "test-secret";
    await expect(firecrawlSearchAdapter("Acme official website", { limit: 5 })).resolves.toEqual([]);
  });

  it("forwards the timeout to the SDK", async () => {
    process.env.FIRECRAWL_API_KEY = "test-secret";
    await firecrawlSearchAdapter("Acme official website", { limit: 5, timeoutMs: 1234 });

    const client = new Firecrawl({ apiKey: "test-secret" });
    expect(client.search).toHaveBeenCalledWith("Acme official website", { limit: 5, timeout: 1234 });
  });

  it("does not search once cancelled", async () => {
    process.env.FIRECRAWL_API_KEY = "test-secret";
    await expect(
      firecrawlSearchAdapter("Acme official website", { limit: 5, signal: AbortSignal.abort() }),
    ).rejects.toThrow("This operation was aborted");
  });
});

describe("parseScrapeResponse", () => {
  it("reads the title, description and top-level headings", () => {
    expect(
      parseScrapeResponse({
        markdown: "# Acme Inc\n\nWe make widgets.\n\n## Products\n# Contact #\n",
        metadata: { title: "Acme | Home", description: ["Widgets since 1901"] },
      }),
    ).toEqual({ title: "Acme | Home", description: "Widgets since 1901", headings: ["Acme Inc", "Contact"] });
  });

  it("returns null for a page with nothing to read", () => {
    expect(parseScrapeResponse({ markdown: "plain text", metadata: { title: " " } })).toBeNull();
  });

  it("rejects a malformed response", () => {
    expect(() => parseScrapeResponse({ markdown: 42 })).toThrow("Unexpected Firecrawl scrape response");
  });
});

describe("markdownHeadings", () => {
  it("ignores deeper headings and hash-tags", () => {
    expect(markdownHeadings("#hashtag\n### Deep\n#   Spaced out  ")).toEqual(["Spaced out"]);
  });
});

describe("firecrawlPageFetcher", () => {
  const originalKey = process.env.FIRECRAWL_API_KEY;

  afterEach(() => {
    if (originalKey === undefined) delete process.env.FIRECRAWL_API_KEY;
    else process.env.FIRECRAWL_API_KEY = originalKey;
  });

  it("scrapes markdown with the timeout", async () => {
    process.env.FIRECRAWL_API_KEY = "test-secret";
    await expect(firecrawlPageFetcher("https://acme.com", { timeoutMs: 500 })).resolves.toBeNull();

    const client = new Firecrawl({ apiKey: "test-secret" });
    expect(client.scrape).toHaveBeenCalledWith("https://acme.com", { formats: ["markdown"], timeout: 500 });
  });
});
