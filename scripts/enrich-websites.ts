/**
 * Find and verify an official website for every cluster written by normalize-companies.
 * Resumes from enrichment_log.csv in the artifact directory; Ctrl-C stops after the
 * clusters in flight and keeps everything already written.
 *
 * Usage: npx tsx scripts/enrich-websites.ts [--out dir] [--retry-incomplete]
 * Requires FIRECRAWL_API_KEY.
 */

import { enrichCompanies } from "../src/lib/pipeline";
import { createConsoleProgressSink } from "../src/lib/enrichment";
import { ConfigurationError, ResumeConflictError } from "../src/lib/errors";

const USAGE = "Usage: npx tsx scripts/enrich-websites.ts [--out dir] [--retry-incomplete]";

const DEFAULT_OUTPUT_DIR = "./enrichment_artifacts";

function usage(message?: string): never {
  if (message) console.error(`Error: ${message}`);
  console.error(USAGE);
  process.exit(1);
}

function parseArgs(argv: string[]) {
  let outputDir = DEFAULT_OUTPUT_DIR;
  let retryIncomplete = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--out") {
      const next = argv[++i];
      if (next === undefined || next.startsWith("--")) usage("--out needs a value");
      outputDir = next;
    } else if (arg === "--retry-incomplete") {
      retryIncomplete = true;
    } else {
      usage(`unknown argument ${arg}`);
    }
  }
  return { outputDir, retryIncomplete };
}

async function main() {
  const { outputDir, retryIncomplete } = parseArgs(process.argv.slice(2));

  const controller = new AbortController();
  const shutdown = (signal: string) => {
    if (controller.signal.aborted) {
      console.log(`[Main] ${signal} again, exiting now`);
      process.exit(130);
    }
    console.log(`[Main] Received ${signal}, finishing clusters in flight...`);
    controller.abort();
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));

  console.log(`\n=== Enriching websites ===`);
  console.log(`Artifacts: ${outputDir}${retryIncomplete ? " (retrying error/unverified)" : ""}\n`);

  const { summary, outputFile } = await enrichCompanies({
    outputDir,
    retryIncomplete,
    progress: createConsoleProgressSink(),
    signal: controller.signal,
  });

  console.log(`\n  Total:        ${summary.total}`);
  console.log(`  Processed:    ${summary.processed}`);
  console.log(`  Skipped:      ${summary.skipped}`);
  console.log(`  Verified:     ${summary.verified}`);
  console.log(`  Unverified:   ${summary.unverified}`);
  console.log(`  No candidate: ${summary.noCandidate}`);
  console.log(`  Error:        ${summary.error}`);
  console.log(`  Dropped:      ${summary.dropped}`);
  console.log(`  Output:       ${outputFile}`);

  if (summary.cancelled) {
    console.log("\n  Cancelled. Run again to resume.");
    process.exit(130);
  }
  console.log("\n  ✓ Done");
}

main().catch((err) => {
  if (err instanceof ConfigurationError || err instanceof ResumeConflictError) {
    console.error(`Error: ${err.message}`);
  } else {
    console.error("Fatal error:", err);
  }
  process.exit(1);
});
