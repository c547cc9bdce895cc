import Firecrawl from "@mendable/firecrawl-js";
import { z } from "zod";
import type { PageFetcher, PageSummary, SearchAdapter, SearchHit } from "@/lib/enrichment/types";
import { ConfigurationError } from "@/lib/errors";

/** Throws before any work starts when Firecrawl cannot be used. */
export function requireFirecrawlApiKey(env: NodeJS.ProcessEnv = process.env): string {
  const apiKey = env.FIRECRAWL_API_KEY;
  if (!apiKey) {
    throw new ConfigurationError("FIRECRAWL_API_KEY environment variable is not set");
  }
  return apiKey;
}

function getClient(): Firecrawl {
  return new Firecrawl({ apiKey: requireFirecrawlApiKey() });
}

const SearchResultSchema = z
  .object({
    url: z.string().optional(),
    title: z.string().nullish(),
    description: z.string().nullish(),
    metadata: z
      .object({
        url: z.string().nullish(),
        sourceURL: z.string().nullish(),
        title: z.string().nullish(),
        description: z.string().nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

/** Newer SDKs return `{ web: [...] }`; older ones `{ data: [...] }`. */
const SearchResponseSchema = z
  .object({
    web: z.array(SearchResultSchema).nullish(),
    data: z.array(SearchResultSchema).nullish(),
  })
  .passthrough();

export function parseSearchResponse(raw: unknown): SearchHit[] {
  const parsed = SearchResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Unexpected Firecrawl search response: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }

  const results = parsed.data.web ?? parsed.data.data ?? [];
  const hits: SearchHit[] = [];
  for (const result of results) {
    const url = result.url ?? result.metadata?.url ?? result.metadata?.sourceURL;
    if (!url) continue;
    hits.push({
      url,
      title: result.title ?? result.metadata?.title ?? undefined,
      description: result.description ?? result.metadata?.description ?? undefined,
    });
  }
  return hits;
}

/**
 * Web search through Firecrawl. Implements SearchAdapter; the candidate finder
 * wraps it with the timeout and retry policy.
 */
export const firecrawlSearchAdapter: SearchAdapter = async (query, { limit, signal, timeoutMs }) => {
  const client = getClient();
  signal?.throwIfAborted();
  const raw: unknown = await client.search(query, { limit, ...(timeoutMs ? { timeout: timeoutMs } : {}) });
  return parseSearchResponse(raw);
};

// ---------------------------------------------------------------------------
// Page check
// ---------------------------------------------------------------------------

const ScrapeResponseSchema = z
  .object({
    markdown: z.string().nullish(),
    metadata: z
      .object({
        title: z.union([z.string(), z.array(z.string())]).nullish(),
        description: z.union([z.string(), z.array(z.string())]).nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

function firstText(value: string | string[] | null | undefined): string | undefined {
  const text = Array.isArray(value) ? value[0] : value;
  return text?.trim() || undefined;
}

/** "# Heading" lines of a markdown document. */
export function markdownHeadings(markdown: string): string[] {
  const headings: string[] = [];
  for (const line of markdown.split("\n")) {
    const match = /^#\s+(.*?)(?:\s+#+)?\s*$/.exec(line);
    if (match?.[1]) headings.push(match[1]);
  }
  return headings;
}

export function parseScrapeResponse(raw: unknown): PageSummary | null {
  const parsed = ScrapeResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Unexpected Firecrawl scrape response: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }

  const title = firstText(parsed.data.metadata?.title);
  const description = firstText(parsed.data.metadata?.description);
  const headings = markdownHeadings(parsed.data.markdown ?? "");
  if (!title && !description && headings.length === 0) return null;

  return {
    ...(title ? { title } : {}),
    ...(description ? { description } : {}),
    headings,
  };
}

/** Reads a candidate page's title, meta description and top-level headings. */
export const firecrawlPageFetcher: PageFetcher = async (url, { signal, timeoutMs }) => {
  const client = getClient();
  signal?.throwIfAborted();
  const raw: unknown = await client.scrape(url, {
    formats: ["markdown"],
    ...(timeoutMs ? { timeout: timeoutMs } : {}),
  });
  return parseScrapeResponse(raw);
};
