/**
 * Candidate finder. Wraps a SearchAdapter with the timeout and retry policy and
 * turns search hits into unscored candidates.
 *
 * - Every search call is raced against `searchTimeoutMs`; a timeout counts as a
 *   transient failure.
 * - Transient failures (timeout, network error, HTTP 408/429/5xx) are retried
 *   `searchRetries` times with exponential backoff (base, 2x base, 4x base, ...).
 *   Exhaustion throws TransientEnrichmentError.
 * - Anything else (bad request, auth, malformed response) is thrown immediately.
 * - Hits are deduplicated by host, first occurrence wins; non-http(s) URLs are skipped.
 * - With a PageFetcher, the first `pageCheckLimit` candidates get their page
 *   fetched for the title check. A failed fetch leaves the candidate without a page.
 * - Aborting the signal stops an in-flight search and any backoff wait.
 */
import { TransientEnrichmentError, errorMessage } from "@/lib/errors";
import type { PipelineConfig } from "@/lib/config";
import type { Cluster } from "@/lib/clustering";
import { hostFromUrl } from "./scorer";
import type { Candidate, PageFetcher, PageSummary, SearchAdapter, SearchHit } from "./types";

type FinderConfig = Pick<
  PipelineConfig,
  "searchResultLimit" | "searchRetries" | "searchBackoffMs" | "searchTimeoutMs"
> &
  Partial<Pick<PipelineConfig, "pageCheckLimit">>;

export interface CandidateFinder {
  findCandidates(
    cluster: Pick<Cluster, "clusterId" | "representativeName">,
    signal?: AbortSignal,
  ): AsyncGenerator<Candidate>;
}

export class SearchTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Search timed out after ${timeoutMs}ms`);
    this.name = "SearchTimeoutError";
  }
}

export class SearchAbortedError extends Error {
  constructor() {
    super("Search aborted");
    this.name = "SearchAbortedError";
  }
}

// ---------------------------------------------------------------------------
// Backoff utilities
// ---------------------------------------------------------------------------

/** Resolves after `ms`, or as soon as the signal aborts. */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) return resolve();
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });
}

function rejectOnAbort(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    if (signal.aborted) return reject(new SearchAbortedError());
    signal.addEventListener("abort", () => reject(new SearchAbortedError()), { once: true });
  });
}

export function exponentialBackoff(baseMs: number, attempt: number): number {
  return Math.pow(2, attempt) * baseMs;
}

const TRANSIENT_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_SOCKET",
]);

function numericField(err: object, field: "status" | "statusCode"): number | undefined {
  const value: unknown = Reflect.get(err, field);
  return typeof value === "number" ? value : undefined;
}

export function isTransientError(err: unknown): boolean {
  if (err instanceof SearchTimeoutError) return true;
  if (typeof err !== "object" || err === null) return false;

  const status = numericField(err, "status") ?? numericField(err, "statusCode");
  if (status !== undefined) return status === 408 || status === 429 || status >= 500;

  const code: unknown = Reflect.get(err, "code");
  if (typeof code === "string" && TRANSIENT_CODES.has(code)) return true;

  const cause: unknown = Reflect.get(err, "cause");
  if (cause !== undefined && cause !== err && isTransientError(cause)) return true;

  return err instanceof Error && /timed? ?out|fetch failed|socket hang up|network|\b429\b/i.test(err.message);
}

// ---------------------------------------------------------------------------
// Finder
// ---------------------------------------------------------------------------

export function searchQueryFor(representativeName: string): string {
  return `${representativeName} official website`;
}

async function searchOnce(
  adapter: SearchAdapter,
  query: string,
  config: FinderConfig,
  signal?: AbortSignal,
): Promise<SearchHit[]> {
  const controller = new AbortController();
  const forwardAbort = () => controller.abort();
  signal?.addEventListener("abort", forwardAbort, { once: true });

  let timer: ReturnType<typeof setTimeout> | undefined;
  try {
    // The timer rejects before it aborts, so a timeout is reported as a timeout
    return await Promise.race([
      adapter(query, {
        limit: config.searchResultLimit,
        signal: controller.signal,
        timeoutMs: config.searchTimeoutMs,
      }),
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
          reject(new SearchTimeoutError(config.searchTimeoutMs));
          controller.abort();
        }, config.searchTimeoutMs);
      }),
      rejectOnAbort(controller.signal),
    ]);
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", forwardAbort);
  }
}

export async function searchWithRetry(
  adapter: SearchAdapter,
  query: string,
  config: FinderConfig,
  signal?: AbortSignal,
): Promise<SearchHit[]> {
  const attempts = config.searchRetries + 1;
  let lastError: unknown = null;

  for (let attempt = 0; attempt < attempts; attempt++) {
    if (signal?.aborted) throw new SearchAbortedError();
    try {
      return await searchOnce(adapter, query, config, signal);
    } catch (err) {
      if (signal?.aborted || !isTransientError(err)) throw err;
      lastError = err;
      console.warn(`[search] Attempt ${attempt + 1}/${attempts} failed for "${query}": ${errorMessage(err)}`);
      if (attempt < attempts - 1) {
        await sleep(exponentialBackoff(config.searchBackoffMs, attempt), signal);
      }
    }
  }

  throw new TransientEnrichmentError(
    `Search failed after ${attempts} attempt(s): ${errorMessage(lastError)}`,
    attempts,
    lastError,
  );
}

async function fetchPageSummary(
  fetchPage: PageFetcher,
  url: string,
  config: FinderConfig,
  signal?: AbortSignal,
): Promise<PageSummary | undefined> {
  const controller = new AbortController();
  const forwardAbort = () => controller.abort();
  if (signal?.aborted) controller.abort();
  signal?.addEventListener("abort", forwardAbort, { once: true });

  let timer: ReturnType<typeof setTimeout> | undefined;
  try {
    const page = await Promise.race([
      fetchPage(url, { signal: controller.signal, timeoutMs: config.searchTimeoutMs }),
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
          reject(new SearchTimeoutError(config.searchTimeoutMs));
          controller.abort();
        }, config.searchTimeoutMs);
      }),
      rejectOnAbort(controller.signal),
    ]);
    return page ?? undefined;
  } catch (err) {
    if (signal?.aborted) throw err;
    console.warn(`[page] Could not read ${url}: ${errorMessage(err)}`);
    return undefined;
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", forwardAbort);
  }
}

export function createCandidateFinder(
  adapter: SearchAdapter,
  config: FinderConfig,
  fetchPage?: PageFetcher,
): CandidateFinder {
  const pageCheckLimit = fetchPage ? (config.pageCheckLimit ?? 0) : 0;

  return {
    async *findCandidates(cluster, signal) {
      const hits = await searchWithRetry(adapter, searchQueryFor(cluster.representativeName), config, signal);

      const seen = new Set<string>();
      const limit = config.searchResultLimit;
      for (const [rank, hit] of hits.slice(0, limit).entries()) {
        const domain = hostFromUrl(hit.url);
        if (!domain || seen.has(domain)) continue;
        seen.add(domain);

        const page =
          fetchPage && rank < pageCheckLimit ? await fetchPageSummary(fetchPage, hit.url, config, signal) : undefined;
        yield {
          clusterId: cluster.clusterId,
          url: hit.url,
          domain,
          title: hit.title ?? "",
          description: hit.description ?? "",
          ...(page ? { page } : {}),
          rank,
          resultLimit: limit,
          score: 0,
          evidence: { domainTokenMatch: 0, nameInTitleOrDomain: 0, searchRank: 0, notDenylisted: 0 },
        };
      }
    },
  };
}
