/**
 * Enrichment orchestrator.
 *
 * Drives Candidate Finder → Verifier for every scheduled cluster, batch by batch:
 * - Checkpoint is read once, before any worker starts. Unknown cluster ids in it,
 *   or rows whose members differ from the current cluster, raise ResumeConflictError.
 * - Clusters stored as verified / no_candidate are skipped; error / unverified
 *   ones are redone only with `retryIncomplete`.
 * - Batches run on a bounded pool (config.concurrency); clusters in a batch run in order.
 * - Results and the progress counter go through one serialized writer.
 * - Circuit breaker: after `circuitBreakerThreshold` consecutive search
 *   exhaustions, the rest of the batch is written as "error" without searching.
 *   Each batch starts with a closed breaker.
 * - Cancellation (AbortSignal) is checked before every batch and every cluster.
 *   Rows already written stay in the store for the next run.
 */
import pLimit from "p-limit";
import { ConfigurationError, ResumeConflictError, TransientEnrichmentError, errorMessage } from "@/lib/errors";
import type { Cluster } from "@/lib/clustering";
import type { PipelineConfig } from "@/lib/config";
import type { CandidateFinder } from "./candidates";
import { scoreCandidate, selectBestCandidate } from "./scorer";
import type { EnrichedClusterStore } from "./store";
import { FINAL_STATUSES } from "./types";
import type {
  Batch,
  Candidate,
  EnrichedCluster,
  EnrichmentSummary,
  ProgressSink,
} from "./types";

export interface RunEnrichmentOptions {
  clusters: Cluster[];
  batches: Batch[];
  finder: CandidateFinder;
  store: EnrichedClusterStore;
  config: PipelineConfig;
  progress?: ProgressSink;
  signal?: AbortSignal;
  /** Redo clusters checkpointed as "error" or "unverified". */
  retryIncomplete?: boolean;
  /** Rows dropped at ingest, carried into the summary. */
  dropped?: number;
}

export interface EnrichmentRunResult {
  /** Checkpointed rows merged with this run's rows, sorted by clusterId. */
  enriched: EnrichedCluster[];
  summary: EnrichmentSummary;
}

// ---------------------------------------------------------------------------
// Circuit breaker
// ---------------------------------------------------------------------------

export interface CircuitBreaker {
  consecutiveFailures: number;
  threshold: number;
}

export function createCircuitBreaker(threshold: number): CircuitBreaker {
  return { consecutiveFailures: 0, threshold };
}

function isOpen(breaker: CircuitBreaker): boolean {
  return breaker.consecutiveFailures >= breaker.threshold;
}

// ---------------------------------------------------------------------------
// Single cluster
// ---------------------------------------------------------------------------

export async function enrichCluster(
  cluster: Cluster,
  finder: CandidateFinder,
  config: PipelineConfig,
  signal?: AbortSignal,
): Promise<EnrichedCluster> {
  const scored: Candidate[] = [];
  for await (const candidate of finder.findCandidates(cluster, signal)) {
    scored.push(scoreCandidate(cluster.representativeName, candidate, config));
  }

  const selection = selectBestCandidate(scored, config.acceptanceThreshold);
  return {
    ...cluster,
    chosenUrl: selection.chosenUrl,
    confidence: selection.confidence,
    status: selection.status,
  };
}

function errorResult(cluster: Cluster, message: string): EnrichedCluster {
  return { ...cluster, chosenUrl: null, confidence: 0, status: "error", errorMessage: message };
}

// ---------------------------------------------------------------------------
// Run
// ---------------------------------------------------------------------------

function checkBatches(clusters: Map<string, Cluster>, batches: Batch[]): void {
  const seen = new Set<string>();
  for (const batch of batches) {
    for (const id of batch.clusterIds) {
      if (!clusters.has(id)) {
        throw new ConfigurationError(`${batch.batchId} references unknown cluster ${id}`);
      }
      if (seen.has(id)) {
        throw new ConfigurationError(`Cluster ${id} appears in more than one batch`);
      }
      seen.add(id);
    }
  }
  if (seen.size !== clusters.size) {
    throw new ConfigurationError(`${clusters.size - seen.size} cluster(s) are not assigned to any batch`);
  }
}

function sameMembers(row: Cluster, cluster: Cluster): boolean {
  return (
    row.canonicalKey === cluster.canonicalKey &&
    row.memberIds.length === cluster.memberIds.length &&
    row.memberIds.every((id, i) => id === cluster.memberIds[i])
  );
}

function summarize(
  enriched: EnrichedCluster[],
  processed: number,
  skipped: number,
  dropped: number,
  cancelled: boolean,
): EnrichmentSummary {
  const count = (status: EnrichedCluster["status"]) => enriched.filter((e) => e.status === status).length;
  return {
    total: enriched.length,
    processed,
    skipped,
    verified: count("verified"),
    unverified: count("unverified"),
    noCandidate: count("no_candidate"),
    error: count("error"),
    dropped,
    cancelled,
  };
}

export async function runEnrichment(options: RunEnrichmentOptions): Promise<EnrichmentRunResult> {
  const { batches, finder, store, config, progress, signal } = options;
  const clustersById = new Map(options.clusters.map((c) => [c.clusterId, c]));
  checkBatches(clustersById, batches);

  const prior = await store.readAll();
  const unknown: string[] = [];
  const changed: string[] = [];
  for (const [id, row] of prior) {
    const current = clustersById.get(id);
    if (!current) unknown.push(id);
    else if (!sameMembers(row, current)) changed.push(id);
  }
  if (unknown.length > 0 || changed.length > 0) {
    throw new ResumeConflictError(unknown.sort(), changed.sort());
  }

  const shouldProcess = (clusterId: string): boolean => {
    const previous = prior.get(clusterId);
    if (!previous) return true;
    if (FINAL_STATUSES.includes(previous.status)) return false;
    return options.retryIncomplete === true;
  };

  const scheduled = batches
    .map((batch) => ({ batchId: batch.batchId, clusterIds: batch.clusterIds.filter(shouldProcess) }))
    .filter((batch) => batch.clusterIds.length > 0);
  const total = scheduled.reduce((sum, batch) => sum + batch.clusterIds.length, 0);
  const skipped = [...prior.keys()].filter((id) => !shouldProcess(id)).length;

  console.log(
    `[enrich] ${total} cluster(s) scheduled in ${scheduled.length} batch(es), ${skipped} carried over from checkpoint`,
  );

  const results = new Map(prior);
  let done = 0;

  // Single writer: store appends, the results table and the progress counter
  const writer = pLimit(1);
  const write = (batchId: string, enriched: EnrichedCluster) =>
    writer(async () => {
      await store.append(enriched);
      results.set(enriched.clusterId, enriched);
      done++;
      try {
        progress?.onClusterComplete(done, total, batchId);
      } catch (err) {
        console.warn(`[enrich] Progress sink failed: ${errorMessage(err)}`);
      }
    });

  const processBatch = async (batchId: string, clusterIds: string[]): Promise<void> => {
    if (signal?.aborted) return;
    const breaker = createCircuitBreaker(config.circuitBreakerThreshold);
    console.log(`[enrich] Starting ${batchId} (${clusterIds.length} clusters)`);

    for (const clusterId of clusterIds) {
      if (signal?.aborted) return;
      const cluster = clustersById.get(clusterId);
      if (!cluster) continue;

      if (isOpen(breaker)) {
        await write(
          batchId,
          errorResult(
            cluster,
            `Skipped: ${breaker.consecutiveFailures} consecutive search failures in ${batchId}`,
          ),
        );
        continue;
      }

      let enriched: EnrichedCluster;
      try {
        enriched = await enrichCluster(cluster, finder, config, signal);
        breaker.consecutiveFailures = 0;
      } catch (err) {
        if (signal?.aborted) return;
        if (err instanceof TransientEnrichmentError) {
          breaker.consecutiveFailures++;
          if (isOpen(breaker)) {
            console.warn(`[enrich] Circuit breaker OPEN for ${batchId}, skipping the rest of the batch`);
          }
        }
        console.warn(`[enrich] "${cluster.representativeName}" failed: ${errorMessage(err)}`);
        enriched = errorResult(cluster, errorMessage(err));
      }
      await write(batchId, enriched);
    }

    console.log(`[enrich] Finished ${batchId}`);
  };

  const pool = pLimit(config.concurrency);
  const outcomes = await Promise.allSettled(
    scheduled.map((batch) => pool(() => processBatch(batch.batchId, batch.clusterIds))),
  );
  const failure = outcomes.find((o): o is PromiseRejectedResult => o.status === "rejected");
  if (failure) throw failure.reason;

  const enriched = [...results.values()].sort((a, b) =>
    a.clusterId < b.clusterId ? -1 : a.clusterId > b.clusterId ? 1 : 0,
  );
  const cancelled = signal?.aborted ?? false;
  const summary = summarize(enriched, done, skipped, options.dropped ?? 0, cancelled);

  console.log(
    `[enrich] ${cancelled ? "Cancelled" : "Done"}: ${summary.verified} verified, ${summary.unverified} unverified, ` +
      `${summary.noCandidate} no_candidate, ${summary.error} error, ${summary.dropped} dropped`,
  );

  return { enriched, summary };
}
