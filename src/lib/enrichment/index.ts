/**
 * Website enrichment barrel exports.
 */
export { makeBatches, batchIdFor } from "./batcher";
export {
  createCandidateFinder,
  isTransientError,
  SearchAbortedError,
  searchQueryFor,
  searchWithRetry,
  SearchTimeoutError,
} from "./candidates";
export type { CandidateFinder } from "./candidates";
export { computeEvidence, domainLabel, hostFromUrl, scoreCandidate, selectBestCandidate } from "./scorer";
export { createCircuitBreaker, enrichCluster, runEnrichment } from "./orchestrator";
export type { EnrichmentRunResult, RunEnrichmentOptions } from "./orchestrator";
export { createConsoleProgressSink, progressFromCallback } from "./progress";
export type { ProgressCallback } from "./progress";
export { createMemoryEnrichedStore, MemoryStore } from "./store";
export type { EnrichedClusterStore, KeyedRecordStore } from "./store";
export { ENRICHMENT_STATUSES, FINAL_STATUSES } from "./types";
export type {
  Batch,
  Candidate,
  CandidateEvidence,
  EnrichedCluster,
  EnrichmentStatus,
  EnrichmentSummary,
  PageFetcher,
  PageSummary,
  ProgressSink,
  SearchAdapter,
  SearchHit,
  Selection,
} from "./types";
