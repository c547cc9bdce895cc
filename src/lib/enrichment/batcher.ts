/**
 * Splits clusters into fixed-size batches for checkpointed enrichment.
 * Clusters are ordered by clusterId first, so the same cluster set and batch
 * size always produce the same batches with the same ids.
 */
import { ConfigurationError } from "@/lib/errors";
import type { Cluster } from "@/lib/clustering";
import type { Batch } from "./types";

export function batchIdFor(index: number): string {
  return `batch_${String(index + 1).padStart(3, "0")}`;
}

export function makeBatches(clusters: Cluster[], maxBatchSize: number): Batch[] {
  if (!Number.isInteger(maxBatchSize) || maxBatchSize < 1) {
    throw new ConfigurationError(`maxBatchSize must be an integer >= 1 (got ${maxBatchSize})`);
  }

  const ids = clusters.map((c) => c.clusterId).sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  const batches: Batch[] = [];
  for (let start = 0; start < ids.length; start += maxBatchSize) {
    batches.push({
      batchId: batchIdFor(batches.length),
      clusterIds: ids.slice(start, start + maxBatchSize),
    });
  }
  return batches;
}
