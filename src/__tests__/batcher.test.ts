import { describe, it, expect } from "vitest";
import { batchIdFor, makeBatches } from "@/lib/enrichment/batcher";
import { ConfigurationError } from "@/lib/errors";
import type { Cluster } from "@/lib/clustering";

function clusterWithId(clusterId: string): Cluster {
  return {
    clusterId,
    representativeName: clusterId,
    canonicalKey: clusterId,
    memberIds: [clusterId],
    memberNames: [clusterId],
  };
}

describe("makeBatches", () => {
  it("chunks clusters by id into numbered batches", () => {
    const clusters = ["c_3", "c_1", "c_5", "c_2", "c_4"].map(clusterWithId);
    expect(makeBatches(clusters, 2)).toEqual([
      { batchId: "batch_001", clusterIds: ["c_1", "c_2"] },
      { batchId: "batch_002", clusterIds: ["c_3", "c_4"] },
      { batchId: "batch_003", clusterIds: ["c_5"] },
    ]);
  });

  it("puts everything in one batch when it fits", () => {
    const clusters = ["c_b", "c_a"].map(clusterWithId);
    expect(makeBatches(clusters, 2000)).toEqual([{ batchId: "batch_001", clusterIds: ["c_a", "c_b"] }]);
  });

  it("returns no batches for no clusters", () => {
    expect(makeBatches([], 10)).toEqual([]);
  });

  it("is deterministic for the same clusters and size", () => {
    const clusters = ["c_9", "c_7", "c_8"].map(clusterWithId);
    expect(makeBatches([...clusters].reverse(), 1)).toEqual(makeBatches(clusters, 1));
  });

  it("rejects a batch size below 1 or a fraction", () => {
    expect(() => makeBatches([], 0)).toThrow(ConfigurationError);
    expect(() => makeBatches([], 1.5)).toThrow("maxBatchSize must be an integer >= 1 (got 1.5)");
  });
});

describe("batchIdFor", () => {
  it("zero-pads to three digits", () => {
    expect(batchIdFor(0)).toBe("batch_001");
    expect(batchIdFor(41)).toBe("batch_042");
    expect(batchIdFor(1234)).toBe("batch_1235");
  });
});
