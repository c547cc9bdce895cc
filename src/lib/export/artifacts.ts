/**
 * File artifacts that make the pipeline resumable across process restarts.
 *
 *   <out>/clusters.csv              one row per cluster
 *   <out>/batches/batch_NNN.csv     same schema, one file per batch
 *   <out>/dropped_rows.csv          input rows rejected before clustering
 *   <out>/enrichment_log.csv        append-only checkpoint, last row per cluster wins
 *   <out>/enriched_websites.csv     final table, one row per enriched cluster
 *
 * member_ids and member_names are stored as JSON arrays so names containing
 * separators survive the round trip.
 */
import { appendFile, mkdir, readFile, readdir, rm, stat, writeFile } from "fs/promises";
import path from "path";
import { z } from "zod";
import type { Cluster } from "@/lib/clustering";
import type { Batch, EnrichedCluster } from "@/lib/enrichment/types";
import type { EnrichedClusterStore } from "@/lib/enrichment/store";
import type { ValidationError } from "@/lib/errors";
import { csvHeader, parseCsvRecords, toCsv, toCsvLine } from "./csv";
import type { CsvRow } from "./csv";

export const CLUSTERS_FILE = "clusters.csv";
export const BATCH_DIR = "batches";
export const DROPPED_FILE = "dropped_rows.csv";
export const CHECKPOINT_FILE = "enrichment_log.csv";
export const OUTPUT_FILE = "enriched_websites.csv";

export const CLUSTER_COLUMNS = [
  "cluster_id",
  "representative_name",
  "canonical_key",
  "member_count",
  "member_ids",
  "member_names",
] as const;

export const ENRICHED_COLUMNS = [
  ...CLUSTER_COLUMNS,
  "chosen_url",
  "confidence",
  "status",
  "error_message",
] as const;

export const DROPPED_COLUMNS = ["row_number", "reason"] as const;

const BATCH_FILE_PATTERN = /^batch_\d+\.csv$/;

// ---------------------------------------------------------------------------
// Row mapping
// ---------------------------------------------------------------------------

const jsonStringArray = z.string().transform((text, ctx) => {
  try {
    const parsed = z.array(z.string()).safeParse(JSON.parse(text));
    if (parsed.success) return parsed.data;
  } catch {
    // reported below
  }
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: "expected a JSON array of strings" });
  return z.NEVER;
});

const ClusterRowSchema = z.object({
  cluster_id: z.string().min(1),
  representative_name: z.string(),
  canonical_key: z.string(),
  member_ids: jsonStringArray,
  member_names: jsonStringArray,
});

const EnrichedRowSchema = ClusterRowSchema.extend({
  chosen_url: z.string(),
  confidence: z.coerce.number().min(0).max(1),
  status: z.enum(["verified", "unverified", "no_candidate", "error"]),
  error_message: z.string().optional(),
});

export function clusterToRow(cluster: Cluster): CsvRow {
  return {
    cluster_id: cluster.clusterId,
    representative_name: cluster.representativeName,
    canonical_key: cluster.canonicalKey,
    member_count: cluster.memberIds.length,
    member_ids: JSON.stringify(cluster.memberIds),
    member_names: JSON.stringify(cluster.memberNames),
  };
}

export function enrichedToRow(enriched: EnrichedCluster): CsvRow {
  return {
    ...clusterToRow(enriched),
    chosen_url: enriched.chosenUrl,
    confidence: enriched.confidence,
    status: enriched.status,
    error_message: enriched.errorMessage,
  };
}

export function rowToCluster(row: Record<string, string>): Cluster {
  const data = ClusterRowSchema.parse(row);
  return {
    clusterId: data.cluster_id,
    representativeName: data.representative_name,
    canonicalKey: data.canonical_key,
    memberIds: data.member_ids,
    memberNames: data.member_names,
  };
}

export function rowToEnriched(row: Record<string, string>): EnrichedCluster {
  const data = EnrichedRowSchema.parse(row);
  return {
    ...rowToCluster(row),
    chosenUrl: data.chosen_url === "" ? null : data.chosen_url,
    confidence: data.confidence,
    status: data.status,
    ...(data.error_message ? { errorMessage: data.error_message } : {}),
  };
}

// ---------------------------------------------------------------------------
// Cluster and batch artifacts
// ---------------------------------------------------------------------------

async function readRows(file: string): Promise<Record<string, string>[]> {
  return parseCsvRecords(await readFile(file, "utf8")).rows;
}

export async function writeClusterArtifact(file: string, clusters: Cluster[]): Promise<void> {
  await mkdir(path.dirname(file), { recursive: true });
  await writeFile(file, toCsv(CLUSTER_COLUMNS, clusters.map(clusterToRow)), "utf8");
}

export async function readClusterArtifact(file: string): Promise<Cluster[]> {
  return (await readRows(file)).map(rowToCluster);
}

/** Replaces any batch files already in `dir`. */
export async function writeBatchArtifacts(dir: string, batches: Batch[], clusters: Cluster[]): Promise<string[]> {
  const byId = new Map(clusters.map((c) => [c.clusterId, c]));
  await mkdir(dir, { recursive: true });
  for (const entry of await readdir(dir)) {
    if (BATCH_FILE_PATTERN.test(entry)) await rm(path.join(dir, entry));
  }

  const written: string[] = [];
  for (const batch of batches) {
    const rows = batch.clusterIds.flatMap((id) => {
      const cluster = byId.get(id);
      return cluster ? [clusterToRow(cluster)] : [];
    });
    const file = path.join(dir, `${batch.batchId}.csv`);
    await writeFile(file, toCsv(CLUSTER_COLUMNS, rows), "utf8");
    written.push(file);
  }
  return written;
}

/** Batches in file-name order, each with the clusters listed in its file. */
export async function readBatchArtifacts(dir: string): Promise<{ batches: Batch[]; clusters: Cluster[] }> {
  const files = (await readdir(dir)).filter((f) => BATCH_FILE_PATTERN.test(f)).sort();
  const batches: Batch[] = [];
  const clusters: Cluster[] = [];
  for (const file of files) {
    const batchClusters = (await readRows(path.join(dir, file))).map(rowToCluster);
    batches.push({ batchId: file.replace(/\.csv$/, ""), clusterIds: batchClusters.map((c) => c.clusterId) });
    clusters.push(...batchClusters);
  }
  return { batches, clusters };
}

export async function writeDroppedArtifact(file: string, dropped: ValidationError[]): Promise<void> {
  await mkdir(path.dirname(file), { recursive: true });
  const rows = dropped.map((error) => ({ row_number: error.rowNumber, reason: error.message }));
  await writeFile(file, toCsv(DROPPED_COLUMNS, rows), "utf8");
}

/** Rows listed in the dropped-rows artifact; 0 when normalization wrote none. */
export async function readDroppedCount(file: string): Promise<number> {
  try {
    return (await readRows(file)).length;
  } catch (err) {
    if (isMissingFile(err)) return 0;
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Enriched output
// ---------------------------------------------------------------------------

export async function writeEnrichedArtifact(file: string, enriched: EnrichedCluster[]): Promise<void> {
  await mkdir(path.dirname(file), { recursive: true });
  await writeFile(file, toCsv(ENRICHED_COLUMNS, enriched.map(enrichedToRow)), "utf8");
}

export function isMissingFile(err: unknown): boolean {
  return err instanceof Error && Reflect.get(err, "code") === "ENOENT";
}

/**
 * File-backed checkpoint. Rows that fail to parse (a torn last line) are skipped.
 * Before the first append, a torn last line is terminated so the new row starts
 * on a line of its own.
 */
export class CsvEnrichedStore implements EnrichedClusterStore {
  private headerWritten: boolean | null = null;

  constructor(readonly file: string) {}

  async readAll(): Promise<Map<string, EnrichedCluster>> {
    let rows: Record<string, string>[];
    try {
      rows = await readRows(this.file);
    } catch (err) {
      if (isMissingFile(err)) return new Map();
      throw err;
    }

    const out = new Map<string, EnrichedCluster>();
    rows.forEach((row, index) => {
      try {
        const enriched = rowToEnriched(row);
        out.set(enriched.clusterId, enriched);
      } catch (err) {
        console.warn(`[checkpoint] Skipping unreadable row ${index + 1} in ${this.file}:`, err);
      }
    });
    return out;
  }

  async append(record: EnrichedCluster): Promise<void> {
    if (this.headerWritten === null) {
      this.headerWritten = await this.hasContent();
      if (this.headerWritten) await this.terminateTornRow();
    }
    if (!this.headerWritten) {
      await mkdir(path.dirname(this.file), { recursive: true });
      await appendFile(this.file, csvHeader(ENRICHED_COLUMNS), "utf8");
      this.headerWritten = true;
    }
    await appendFile(this.file, toCsvLine(ENRICHED_COLUMNS, enrichedToRow(record)), "utf8");
  }

  private async terminateTornRow(): Promise<void> {
    const text = await readFile(this.file, "utf8");
    const openQuote = (text.match(/"/g)?.length ?? 0) % 2 === 1;
    if (!openQuote && text.endsWith("\n")) return;

    console.warn(`[checkpoint] Last row of ${this.file} is incomplete; starting a new line`);
    await appendFile(this.file, openQuote ? '"\n' : "\n", "utf8");
  }

  private async hasContent(): Promise<boolean> {
    try {
      return (await stat(this.file)).size > 0;
    } catch (err) {
      if (isMissingFile(err)) return false;
      throw err;
    }
  }
}
