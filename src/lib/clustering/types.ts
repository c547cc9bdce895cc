/**
 * Record and cluster types shared by ingest, clustering, batching and enrichment.
 */

/** One input row. Immutable once ingested. */
export interface RawRecord {
  id: string;
  rawName: string;
  /** Remaining columns of the source row, kept for the caller. */
  source?: Record<string, string>;
}

export interface NormalizedRecord extends RawRecord {
  /** Clustering key; "" means unclusterable. */
  canonicalKey: string;
  /** rawName trimmed with whitespace collapsed; the form counted for representatives. */
  displayName: string;
}

export interface Cluster {
  /** Derived from representativeName, never from input order. */
  clusterId: string;
  representativeName: string;
  canonicalKey: string;
  /** Sorted, unique. */
  memberIds: string[];
  /** Display forms of the members, sorted, unique. */
  memberNames: string[];
}
