/**
 * Company clusterer.
 *
 * 1. Records sharing a canonical key are merged outright.
 * 2. Distinct keys are compared pairwise; pairs at or above the similarity
 *    threshold are unioned, which makes merging transitive.
 * 3. Each set gets a representative (most frequent display form, then shortest,
 *    then lexicographically smallest) and an id hashed from that name.
 *
 * Records whose key is empty are unclusterable: each becomes its own cluster.
 * The output is sorted by clusterId and does not depend on input order.
 */
import { createHash } from "crypto";
import { distance } from "fastest-levenshtein";
import { EMPTY_KEY, cleanDisplayName, keyTokens, normalizeCompanyKey } from "@/lib/normalizer";
import type { KeyOptions } from "@/lib/normalizer";
import { sortedTokens } from "./similarity";
import { UnionFind } from "./union-find";
import type { Cluster, NormalizedRecord, RawRecord } from "./types";

export interface ClusterOptions {
  similarityThreshold: number;
}

export function normalizeRecords(records: RawRecord[], keyOptions: KeyOptions = {}): NormalizedRecord[] {
  return records.map((record) => ({
    ...record,
    canonicalKey: normalizeCompanyKey(record.rawName, keyOptions),
    displayName: cleanDisplayName(record.rawName),
  }));
}

/**
 * Stable id for a cluster. `discriminator` separates unclusterable singletons
 * that happen to share a display name.
 */
export function clusterIdFor(representativeName: string, discriminator?: string): string {
  const hash = createHash("sha1").update(representativeName, "utf8");
  if (discriminator !== undefined) hash.update(`\u0000${discriminator}`, "utf8");
  return `c_${hash.digest("hex").slice(0, 16)}`;
}

function compareCodeUnits(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function chooseRepresentative(displayNames: string[]): string {
  const counts = new Map<string, number>();
  for (const name of displayNames) {
    counts.set(name, (counts.get(name) ?? 0) + 1);
  }
  const ranked = [...counts.entries()].sort(
    ([nameA, countA], [nameB, countB]) =>
      countB - countA || nameA.length - nameB.length || compareCodeUnits(nameA, nameB),
  );
  if (ranked.length === 0) {
    throw new Error("Cannot choose a representative for an empty cluster");
  }
  return ranked[0][0];
}

// ---------------------------------------------------------------------------
// Pairwise comparison
// ---------------------------------------------------------------------------

interface ComparableKey {
  key: string;
  tokens: Set<string>;
  sorted: string;
}

function toComparable(key: string): ComparableKey {
  return { key, tokens: new Set(keyTokens(key)), sorted: sortedTokens(key) };
}

function isSimilar(a: ComparableKey, b: ComparableKey, threshold: number): boolean {
  // Jaccard can reach the threshold only if the set sizes are close enough
  const sizeRatio = Math.min(a.tokens.size, b.tokens.size) / Math.max(a.tokens.size, b.tokens.size);
  if (sizeRatio >= threshold) {
    let shared = 0;
    for (const token of a.tokens) {
      if (b.tokens.has(token)) shared++;
    }
    if (shared / (a.tokens.size + b.tokens.size - shared) >= threshold) return true;
  }

  // Same for edit similarity and the length difference
  const longest = Math.max(a.sorted.length, b.sorted.length);
  if (1 - Math.abs(a.sorted.length - b.sorted.length) / longest < threshold) return false;
  return 1 - distance(a.sorted, b.sorted) / longest >= threshold;
}

// ---------------------------------------------------------------------------
// Clustering
// ---------------------------------------------------------------------------

function buildCluster(members: NormalizedRecord[], discriminator?: string): Cluster {
  const representativeName = chooseRepresentative(members.map((m) => m.displayName));
  const representative = members.find((m) => m.displayName === representativeName);
  return {
    clusterId: clusterIdFor(representativeName, discriminator),
    representativeName,
    canonicalKey: representative?.canonicalKey ?? EMPTY_KEY,
    memberIds: [...new Set(members.map((m) => m.id))].sort(compareCodeUnits),
    memberNames: [...new Set(members.map((m) => m.displayName))].sort(compareCodeUnits),
  };
}

export function clusterRecords(records: NormalizedRecord[], options: ClusterOptions): Cluster[] {
  const byKey = new Map<string, NormalizedRecord[]>();
  const unclusterable: NormalizedRecord[] = [];

  for (const record of records) {
    if (record.canonicalKey === EMPTY_KEY) {
      unclusterable.push(record);
      continue;
    }
    const group = byKey.get(record.canonicalKey);
    if (group) group.push(record);
    else byKey.set(record.canonicalKey, [record]);
  }

  const keys = [...byKey.keys()].sort(compareCodeUnits).map(toComparable);
  const sets = new UnionFind();
  for (const { key } of keys) sets.add(key);

  for (let i = 0; i < keys.length; i++) {
    for (let j = i + 1; j < keys.length; j++) {
      if (isSimilar(keys[i], keys[j], options.similarityThreshold)) {
        sets.union(keys[i].key, keys[j].key);
      }
    }
  }

  const clusters: Cluster[] = [];
  for (const groupKeys of sets.groups().values()) {
    clusters.push(buildCluster(groupKeys.flatMap((key) => byKey.get(key) ?? [])));
  }
  for (const record of unclusterable) {
    clusters.push(buildCluster([record], record.id));
  }

  return clusters.sort((a, b) => compareCodeUnits(a.clusterId, b.clusterId));
}
