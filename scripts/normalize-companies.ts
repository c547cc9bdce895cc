/**
 * Normalize and cluster a CSV of company names, then write cluster and batch artifacts.
 * Usage: npx tsx scripts/normalize-companies.ts <input.csv> [--out dir] [--dry-run] [--limit n] [--column name] [--id-column name]
 */

import { resolveCompanies } from "../src/lib/pipeline";
import { ConfigurationError } from "../src/lib/errors";

const USAGE =
  "Usage: npx tsx scripts/normalize-companies.ts <input.csv> [--out dir] [--dry-run] [--limit n] [--column name] [--id-column name]";

const DEFAULT_OUTPUT_DIR = "./enrichment_artifacts";

function usage(message?: string): never {
  if (message) console.error(`Error: ${message}`);
  console.error(USAGE);
  process.exit(1);
}

function parseArgs(argv: string[]) {
  let inputPath: string | undefined;
  let outputDir = DEFAULT_OUTPUT_DIR;
  let dryRun = false;
  let rowLimit: number | undefined;
  let nameColumn: string | undefined;
  let idColumn: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const value = () => {
      const next = argv[++i];
      if (next === undefined || next.startsWith("--")) usage(`${arg} needs a value`);
      return next;
    };

    switch (arg) {
      case "--out":
        outputDir = value();
        break;
      case "--dry-run":
        dryRun = true;
        break;
      case "--limit": {
        const raw = value();
        rowLimit = Number(raw);
        if (!Number.isInteger(rowLimit) || rowLimit < 1) usage(`--limit must be a positive integer (got ${raw})`);
        break;
      }
      case "--column":
        nameColumn = value();
        break;
      case "--id-column":
        idColumn = value();
        break;
      default:
        if (arg.startsWith("--")) usage(`unknown option ${arg}`);
        if (inputPath) usage(`unexpected argument ${arg}`);
        inputPath = arg;
    }
  }

  if (!inputPath) usage();
  return { inputPath, outputDir, dryRun, rowLimit, nameColumn, idColumn };
}

async function main() {
  const { inputPath, ...options } = parseArgs(process.argv.slice(2));

  console.log(`\n=== Normalizing companies ===`);
  console.log(`Input: ${inputPath}`);
  console.log(`Output: ${options.outputDir}${options.dryRun ? " (dry run)" : ""}\n`);

  const result = await resolveCompanies(inputPath, options);

  console.log(`\n  Records:  ${result.records.length}`);
  console.log(`  Dropped:  ${result.dropped.length}`);
  console.log(`  Clusters: ${result.clusters.length}`);
  console.log(`  Batches:  ${result.batches.length}`);
  for (const file of result.files.slice(0, 3)) {
    console.log(`  - ${file}`);
  }
  if (result.files.length > 3) console.log(`  ... and ${result.files.length - 3} more`);
  console.log("\n  ✓ Done");
}

main().catch((err) => {
  if (err instanceof ConfigurationError) {
    console.error(`Error: ${err.message}`);
  } else {
    console.error("Fatal error:", err);
  }
  process.exit(1);
});
