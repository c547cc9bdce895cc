/**
 * Enrichment pipeline type definitions.
 * Central source of truth for batches, candidates, statuses and enriched output.
 */
import type { Cluster } from "@/lib/clustering";

/** Terminal status of one cluster's website lookup. */
export type EnrichmentStatus = "verified" | "unverified" | "no_candidate" | "error";

export const ENRICHMENT_STATUSES: readonly EnrichmentStatus[] = [
  "verified",
  "unverified",
  "no_candidate",
  "error",
];

/** Statuses a resumed run never reprocesses. */
export const FINAL_STATUSES: readonly EnrichmentStatus[] = ["verified", "no_candidate"];

/** A checkpointable unit of clusters. */
export interface Batch {
  batchId: string;
  clusterIds: string[];
}

/** One result from the external search capability. */
export interface SearchHit {
  url: string;
  title?: string;
  description?: string;
}

/** Takes a query, returns hits in rank order. */
export type SearchAdapter = (
  query: string,
  options: { limit: number; signal?: AbortSignal; timeoutMs?: number },
) => Promise<SearchHit[]>;

/** Text read from a candidate's own page. */
export interface PageSummary {
  title?: string;
  description?: string;
  /** Top-level headings, in page order. */
  headings: string[];
}

/** Fetches a candidate page. Null when the page has nothing readable. */
export type PageFetcher = (
  url: string,
  options: { signal?: AbortSignal; timeoutMs?: number },
) => Promise<PageSummary | null>;

/**
 * Named evidence signals, each in [0, 1]. Weighted by ScoringWeights into the
 * candidate score.
 */
export interface CandidateEvidence {
  domainTokenMatch: number;
  nameInTitleOrDomain: number;
  searchRank: number;
  notDenylisted: number;
}

export interface Candidate {
  clusterId: string;
  url: string;
  /** Lower-cased host without a leading "www.". */
  domain: string;
  title: string;
  description: string;
  /** Set when the page was fetched. */
  page?: PageSummary;
  /** 0-based position in the search results. */
  rank: number;
  /** Number of results requested; the denominator of the rank prior. */
  resultLimit: number;
  score: number;
  evidence: CandidateEvidence;
}

export interface EnrichedCluster extends Cluster {
  chosenUrl: string | null;
  confidence: number;
  status: EnrichmentStatus;
  errorMessage?: string;
}

/** Outcome of selecting among a cluster's scored candidates. */
export interface Selection {
  chosenUrl: string | null;
  confidence: number;
  status: Exclude<EnrichmentStatus, "error">;
  best: Candidate | null;
}

/** Collaborator notified after each cluster completes. May be called from concurrent workers. */
export interface ProgressSink {
  onClusterComplete(done: number, total: number, batchId: string): void;
}

export interface EnrichmentSummary {
  /** Clusters in the final table. */
  total: number;
  /** Clusters written by this run. */
  processed: number;
  /** Clusters carried over from the checkpoint untouched. */
  skipped: number;
  verified: number;
  unverified: number;
  noCandidate: number;
  error: number;
  /** Input rows dropped by validation before clustering. */
  dropped: number;
  cancelled: boolean;
}
