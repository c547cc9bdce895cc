/**
 * Pipeline entry points for collaborators (CLI scripts, a dashboard, tests).
 *
 *   resolveCompanies: input CSV → records → canonical keys → clusters → batches,
 *                     written as clusters.csv + batches/*.csv + dropped_rows.csv
 *   enrichCompanies:  clusters.csv + batches → search + verify → enriched_websites.csv,
 *                     checkpointed in enrichment_log.csv
 *
 * The two halves only share the artifact directory, so enrichment can resume in
 * a later process.
 */
import { readFile } from "fs/promises";
import path from "path";
import { clusterRecords, normalizeRecords } from "@/lib/clustering";
import type { Cluster, NormalizedRecord } from "@/lib/clustering";
import { loadConfig } from "@/lib/config";
import type { PipelineConfig } from "@/lib/config";
import { createCandidateFinder, makeBatches, runEnrichment } from "@/lib/enrichment";
import type {
  Batch,
  CandidateFinder,
  EnrichedClusterStore,
  EnrichmentRunResult,
  ProgressSink,
} from "@/lib/enrichment";
import { ConfigurationError } from "@/lib/errors";
import type { ValidationError } from "@/lib/errors";
import {
  BATCH_DIR,
  CHECKPOINT_FILE,
  CLUSTERS_FILE,
  CsvEnrichedStore,
  DROPPED_FILE,
  isMissingFile,
  OUTPUT_FILE,
  readBatchArtifacts,
  readClusterArtifact,
  readDroppedCount,
  writeBatchArtifacts,
  writeClusterArtifact,
  writeDroppedArtifact,
  writeEnrichedArtifact,
} from "@/lib/export/artifacts";
import { parseCsvRecords } from "@/lib/export/csv";
import { firecrawlPageFetcher, firecrawlSearchAdapter, requireFirecrawlApiKey } from "@/lib/firecrawl/client";
import { toRawRecords } from "@/lib/ingest/records";

export interface ResolveOptions {
  outputDir: string;
  config?: PipelineConfig;
  /** Report what would be written without touching the output directory. */
  dryRun?: boolean;
  rowLimit?: number;
  nameColumn?: string;
  idColumn?: string;
}

export interface ResolveResult {
  records: NormalizedRecord[];
  clusters: Cluster[];
  batches: Batch[];
  dropped: ValidationError[];
  /** Paths written; empty on a dry run. */
  files: string[];
}

/** UTF-8 unless that produces replacement characters, then Latin-1. */
export function decodeInput(buffer: Buffer): string {
  const utf8 = buffer.toString("utf8");
  return utf8.includes("\uFFFD") ? buffer.toString("latin1") : utf8;
}

export async function resolveCompanies(inputPath: string, options: ResolveOptions): Promise<ResolveResult> {
  const config = options.config ?? loadConfig();

  const { columns, rows } = parseCsvRecords(decodeInput(await readFile(inputPath)));
  const { records, dropped, nameColumn } = toRawRecords(rows, columns, {
    nameColumn: options.nameColumn,
    idColumn: options.idColumn,
    rowLimit: options.rowLimit,
  });
  console.log(
    `[resolve] ${records.length + dropped.length} row(s) read from ${inputPath} using column '${nameColumn}' (${dropped.length} dropped)`,
  );

  const normalized = normalizeRecords(records, config);
  const clusters = clusterRecords(normalized, config);
  const batches = makeBatches(clusters, config.maxBatchSize);
  console.log(`[resolve] ${normalized.length} record(s) → ${clusters.length} cluster(s) in ${batches.length} batch(es)`);

  if (options.dryRun) {
    console.log(
      `[resolve] Dry run: would write ${CLUSTERS_FILE}, ${DROPPED_FILE} and ${batches.length} batch file(s) to ${options.outputDir}`,
    );
    return { records: normalized, clusters, batches, dropped, files: [] };
  }

  const clustersFile = path.join(options.outputDir, CLUSTERS_FILE);
  await writeClusterArtifact(clustersFile, clusters);
  const batchFiles = await writeBatchArtifacts(path.join(options.outputDir, BATCH_DIR), batches, clusters);
  const droppedFile = path.join(options.outputDir, DROPPED_FILE);
  await writeDroppedArtifact(droppedFile, dropped);
  console.log(`[resolve] Saved ${clustersFile}, ${droppedFile} and ${batchFiles.length} batch file(s)`);

  return { records: normalized, clusters, batches, dropped, files: [clustersFile, ...batchFiles, droppedFile] };
}

export interface EnrichOptions {
  outputDir: string;
  config?: PipelineConfig;
  /** Defaults to Firecrawl search wrapped in the retry policy, with Firecrawl page checks. */
  finder?: CandidateFinder;
  /** Defaults to the CSV checkpoint in the output directory. */
  store?: EnrichedClusterStore;
  progress?: ProgressSink;
  signal?: AbortSignal;
  retryIncomplete?: boolean;
  /** Defaults to the count in dropped_rows.csv. */
  dropped?: number;
}

export interface EnrichResult extends EnrichmentRunResult {
  outputFile: string;
}

export async function enrichCompanies(options: EnrichOptions): Promise<EnrichResult> {
  const config = options.config ?? loadConfig();
  const clustersFile = path.join(options.outputDir, CLUSTERS_FILE);

  let clusters: Cluster[];
  let batches: Batch[];
  try {
    clusters = await readClusterArtifact(clustersFile);
    ({ batches } = await readBatchArtifacts(path.join(options.outputDir, BATCH_DIR)));
  } catch (err) {
    if (isMissingFile(err)) {
      throw new ConfigurationError(`No cluster artifacts in ${options.outputDir}. Run normalization first.`);
    }
    throw err;
  }

  let finder = options.finder;
  if (!finder) {
    requireFirecrawlApiKey();
    finder = createCandidateFinder(firecrawlSearchAdapter, config, firecrawlPageFetcher);
  }
  const dropped = options.dropped ?? (await readDroppedCount(path.join(options.outputDir, DROPPED_FILE)));

  const result = await runEnrichment({
    clusters,
    batches,
    finder,
    store: options.store ?? new CsvEnrichedStore(path.join(options.outputDir, CHECKPOINT_FILE)),
    config,
    progress: options.progress,
    signal: options.signal,
    retryIncomplete: options.retryIncomplete,
    dropped,
  });

  const outputFile = path.join(options.outputDir, OUTPUT_FILE);
  await writeEnrichedArtifact(outputFile, result.enriched);
  console.log(`[enrich] Saved ${outputFile} (${result.enriched.length} rows)`);

  return { ...result, outputFile };
}
