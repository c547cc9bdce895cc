/**
 * Pipeline configuration.
 *
 * Every tunable lives here with a documented default. Values come from explicit
 * overrides first, then RESOLVER_* environment variables, then the defaults.
 * The schema is validated once, up front; a bad value raises ConfigurationError
 * before any record is touched.
 */
import { z } from "zod";
import { ConfigurationError } from "@/lib/errors";
import { DEFAULT_ABBREVIATIONS, DEFAULT_LEGAL_SUFFIXES } from "@/lib/normalizer";

/** Generic and aggregator hosts that are never a company's own site. */
export const DEFAULT_DENYLIST_DOMAINS = [
  "linkedin.com",
  "facebook.com",
  "instagram.com",
  "twitter.com",
  "x.com",
  "youtube.com",
  "wikipedia.org",
  "crunchbase.com",
  "bloomberg.com",
  "zoominfo.com",
  "dnb.com",
  "glassdoor.com",
  "indeed.com",
  "yelp.com",
  "opencorporates.com",
  "yellowpages.com",
];

const unitInterval = z.number().min(0).max(1);

const WEIGHT_SUM_TOLERANCE = 1e-6;

export const ScoringWeightsSchema = z
  .object({
    domainTokenMatch: unitInterval,
    nameInTitleOrDomain: unitInterval,
    searchRank: unitInterval,
    notDenylisted: unitInterval,
  })
  .refine(
    (w) =>
      Math.abs(w.domainTokenMatch + w.nameInTitleOrDomain + w.searchRank + w.notDenylisted - 1) <=
      WEIGHT_SUM_TOLERANCE,
    { message: "scoring weights must sum to 1.0" },
  );

export type ScoringWeights = z.infer<typeof ScoringWeightsSchema>;

const lowerTokens = z.array(z.string().trim().min(1).toLowerCase());

export const PipelineConfigSchema = z.object({
  /** Pairwise name similarity at or above which two canonical keys merge. */
  similarityThreshold: unitInterval.default(0.9),
  legalSuffixes: lowerTokens.default([...DEFAULT_LEGAL_SUFFIXES]),
  abbreviations: z.record(z.string()).default(DEFAULT_ABBREVIATIONS),
  /** Leading tokens such as a city name that prefix many records in one source. */
  stripPrefixes: lowerTokens.default([]),
  maxBatchSize: z.number().int().min(1).default(2000),
  /** Inclusive: a best score equal to the threshold is verified. */
  acceptanceThreshold: unitInterval.default(0.7),
  searchResultLimit: z.number().int().min(1).max(20).default(5),
  searchRetries: z.number().int().min(0).max(10).default(2),
  searchBackoffMs: z.number().int().min(0).default(1000),
  searchTimeoutMs: z.number().int().min(1).default(15_000),
  /** Top search results whose page is fetched to check its title and headings. 0 disables. */
  pageCheckLimit: z.number().int().min(0).max(20).default(3),
  denylistDomains: lowerTokens.default(DEFAULT_DENYLIST_DOMAINS),
  scoringWeights: ScoringWeightsSchema.default({
    domainTokenMatch: 0.4,
    nameInTitleOrDomain: 0.3,
    searchRank: 0.1,
    notDenylisted: 0.2,
  }),
  /** Batches processed at once. Clusters inside a batch run one at a time. */
  concurrency: z.number().int().min(1).max(32).default(2),
  /** Consecutive search exhaustions after which the rest of a batch is skipped. */
  circuitBreakerThreshold: z.number().int().min(1).default(5),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

const NUMERIC_ENV: Array<[keyof PipelineConfig, string]> = [
  ["similarityThreshold", "RESOLVER_SIMILARITY_THRESHOLD"],
  ["maxBatchSize", "RESOLVER_MAX_BATCH_SIZE"],
  ["acceptanceThreshold", "RESOLVER_ACCEPTANCE_THRESHOLD"],
  ["searchResultLimit", "RESOLVER_SEARCH_RESULT_LIMIT"],
  ["searchRetries", "RESOLVER_SEARCH_RETRIES"],
  ["searchBackoffMs", "RESOLVER_SEARCH_BACKOFF_MS"],
  ["searchTimeoutMs", "RESOLVER_SEARCH_TIMEOUT_MS"],
  ["pageCheckLimit", "RESOLVER_PAGE_CHECK_LIMIT"],
  ["concurrency", "RESOLVER_CONCURRENCY"],
  ["circuitBreakerThreshold", "RESOLVER_CIRCUIT_BREAKER_THRESHOLD"],
];

const LIST_ENV: Array<[keyof PipelineConfig, string]> = [
  ["legalSuffixes", "RESOLVER_LEGAL_SUFFIXES"],
  ["stripPrefixes", "RESOLVER_STRIP_PREFIXES"],
  ["denylistDomains", "RESOLVER_DENYLIST_DOMAINS"],
];

/** Read RESOLVER_* variables. Unset or blank variables are left out. */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, name] of NUMERIC_ENV) {
    const raw = env[name]?.trim();
    if (raw) out[key] = Number(raw);
  }
  for (const [key, name] of LIST_ENV) {
    const raw = env[name];
    if (raw !== undefined && raw.trim() !== "") {
      out[key] = raw.split(",").map((s) => s.trim()).filter(Boolean);
    }
  }
  return out;
}

/**
 * Build a validated configuration.
 * Pass `env: {}` to ignore the process environment (tests do).
 */
export function loadConfig(
  overrides: PipelineConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
): PipelineConfig {
  const parsed = PipelineConfigSchema.safeParse({ ...configFromEnv(env), ...overrides });
  if (!parsed.success) {
    throw new ConfigurationError(
      "Invalid pipeline configuration",
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`),
    );
  }
  return parsed.data;
}
