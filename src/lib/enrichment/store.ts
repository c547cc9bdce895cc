/**
 * Keyed record store for enrichment checkpoints.
 *
 * The orchestrator reads everything once before work starts and appends one
 * record per completed cluster. Appends are never rewritten in place; when a key
 * is appended twice, the later record wins on the next readAll().
 */
import type { EnrichedCluster } from "./types";

export interface KeyedRecordStore<T> {
  readAll(): Promise<Map<string, T>>;
  append(record: T): Promise<void>;
}

export type EnrichedClusterStore = KeyedRecordStore<EnrichedCluster>;

/** In-process store, keyed by a caller-supplied function. */
export class MemoryStore<T> implements KeyedRecordStore<T> {
  private readonly records: T[] = [];

  constructor(
    private readonly keyOf: (record: T) => string,
    initial: T[] = [],
  ) {
    this.records.push(...initial);
  }

  async readAll(): Promise<Map<string, T>> {
    const out = new Map<string, T>();
    for (const record of this.records) {
      out.set(this.keyOf(record), record);
    }
    return out;
  }

  async append(record: T): Promise<void> {
    this.records.push(record);
  }

  /** Every appended record in order, including superseded ones. */
  history(): readonly T[] {
    return this.records;
  }
}

export function createMemoryEnrichedStore(initial: EnrichedCluster[] = []): MemoryStore<EnrichedCluster> {
  return new MemoryStore((record) => record.clusterId, initial);
}
