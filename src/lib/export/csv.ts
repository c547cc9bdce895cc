/**
 * Minimal CSV codec for the pipeline's input and artifact files.
 *
 * Writing quotes a field only when it must (comma, double quote, CR or LF).
 * Reading follows RFC 4180: quoted fields may hold commas, doubled quotes and
 * line breaks; CRLF and LF are both accepted; a leading UTF-8 BOM is dropped.
 */

/**
 * Escape a value for CSV output.
 *
 * - null/undefined → empty string
 * - Contains comma, double-quote, or newline → wrap in double-quotes, double internal quotes
 * - Otherwise return as-is
 */
export function escapeCsv(s: string | number | null | undefined): string {
  if (s == null || s === "") return "";
  const text = String(s);
  if (text.includes(",") || text.includes('"') || text.includes("\n") || text.includes("\r")) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

export type CsvRow = Record<string, string | number | null | undefined>;

export function csvHeader(columns: readonly string[]): string {
  return columns.map(escapeCsv).join(",") + "\n";
}

export function toCsv(columns: readonly string[], rows: CsvRow[]): string {
  return csvHeader(columns) + rows.map((row) => toCsvLine(columns, row)).join("");
}

export function toCsvLine(columns: readonly string[], row: CsvRow): string {
  return columns.map((column) => escapeCsv(row[column])).join(",") + "\n";
}

/** Parse CSV text into rows of fields. Blank lines are skipped. */
export function parseCsv(text: string): string[][] {
  const input = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let inQuotes = false;
  let fieldStarted = false;

  const endRow = () => {
    if (fieldStarted || row.length > 0 || field !== "") {
      row.push(field);
      rows.push(row);
    }
    row = [];
    field = "";
    fieldStarted = false;
  };

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];

    if (inQuotes) {
      if (ch === '"') {
        if (input[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
      fieldStarted = true;
    } else if (ch === ",") {
      row.push(field);
      field = "";
      fieldStarted = true;
    } else if (ch === "\n") {
      endRow();
    } else if (ch === "\r") {
      if (input[i + 1] === "\n") i++;
      endRow();
    } else {
      field += ch;
      fieldStarted = true;
    }
  }
  endRow();

  return rows;
}

/**
 * Parse CSV text with a header row into objects keyed by column name.
 * Missing trailing fields become "", extra fields are ignored.
 */
export function parseCsvRecords(text: string): { columns: string[]; rows: Record<string, string>[] } {
  const [header, ...body] = parseCsv(text);
  if (!header) return { columns: [], rows: [] };

  const columns = header.map((c) => c.trim());
  const rows = body.map((fields) => {
    const record: Record<string, string> = {};
    columns.forEach((column, index) => {
      record[column] = fields[index] ?? "";
    });
    return record;
  });
  return { columns, rows };
}
