/**
 * Turns parsed CSV rows into RawRecords.
 *
 * The name column is the one the caller names, else the first header matching a
 * known company-name column, else the first column. An "id" column supplies
 * record ids; without one, ids are "row-<n>" for the n-th data row.
 *
 * Rows with an empty name, an overlong name, or a missing / duplicate id are
 * dropped and returned as ValidationErrors; they never abort the run.
 */
import { z } from "zod";
import { ConfigurationError, ValidationError } from "@/lib/errors";
import type { RawRecord } from "@/lib/clustering";

export interface IngestOptions {
  nameColumn?: string;
  idColumn?: string;
  /** Only read the first n data rows. */
  rowLimit?: number;
}

export interface IngestResult {
  records: RawRecord[];
  dropped: ValidationError[];
  nameColumn: string;
}

const NAME_COLUMNS = ["name", "company", "company_name", "companyname", "raw_name", "organization"];

const MAX_NAME_LENGTH = 500;

const RowSchema = z.object({
  id: z.string().trim().min(1, "missing id"),
  rawName: z
    .string()
    .trim()
    .min(1, "empty company name")
    .max(MAX_NAME_LENGTH, `company name longer than ${MAX_NAME_LENGTH} characters`),
});

function findColumn(columns: string[], wanted: string): string | undefined {
  return columns.find((c) => c.toLowerCase() === wanted.toLowerCase());
}

export function pickNameColumn(columns: string[], preferred?: string): string {
  if (columns.length === 0) {
    throw new ConfigurationError("Input file has no header row");
  }
  if (preferred) {
    const match = findColumn(columns, preferred);
    if (!match) throw new ConfigurationError(`Column '${preferred}' not found in input`);
    return match;
  }
  for (const candidate of NAME_COLUMNS) {
    const match = findColumn(columns, candidate);
    if (match) return match;
  }
  return columns[0];
}

export function toRawRecords(
  rows: Record<string, string>[],
  columns: string[],
  options: IngestOptions = {},
): IngestResult {
  const nameColumn = pickNameColumn(columns, options.nameColumn);
  const idColumn = options.idColumn
    ? findColumn(columns, options.idColumn)
    : findColumn(columns, "id");
  if (options.idColumn && !idColumn) {
    throw new ConfigurationError(`Column '${options.idColumn}' not found in input`);
  }

  const limited = options.rowLimit !== undefined ? rows.slice(0, options.rowLimit) : rows;
  const records: RawRecord[] = [];
  const dropped: ValidationError[] = [];
  const seenIds = new Set<string>();

  limited.forEach((row, index) => {
    const rowNumber = index + 1;
    const parsed = RowSchema.safeParse({
      id: idColumn ? (row[idColumn] ?? "") : `row-${rowNumber}`,
      rawName: row[nameColumn] ?? "",
    });

    let problem: string | undefined;
    if (!parsed.success) {
      problem = parsed.error.issues.map((issue) => issue.message).join(", ");
    } else if (seenIds.has(parsed.data.id)) {
      problem = `duplicate id '${parsed.data.id}'`;
    }

    if (problem !== undefined || !parsed.success) {
      const error = new ValidationError(`Row ${rowNumber}: ${problem ?? "invalid row"}`, rowNumber);
      console.warn(`[ingest] Dropping ${error.message}`);
      dropped.push(error);
      return;
    }

    seenIds.add(parsed.data.id);
    const source: Record<string, string> = {};
    for (const column of columns) {
      if (column !== nameColumn && column !== idColumn && row[column]) source[column] = row[column];
    }
    records.push({
      id: parsed.data.id,
      // Raw text is kept untrimmed; the normalizer and display cleanup handle whitespace
      rawName: row[nameColumn] ?? "",
      ...(Object.keys(source).length > 0 ? { source } : {}),
    });
  });

  return { records, dropped, nameColumn };
}
