import fs from "node:fs";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";

export type CsvRow = Record<string, string>;

export type CsvTable = {
  header: string[];
  rows: CsvRow[];
  /** Records dropped by the parser or cut to the header. A file with any must not be rewritten. */
  skipped: number;
};

/**
 * Reads a whole CSV file into memory. Short rows are padded to the header. Long rows are cut to
 * it and counted in `skipped`, as are records the parser cannot make sense of (bad quoting).
 * Throws when the file itself cannot be read.
 */
export function readCsv(filePath: string): CsvTable {
  const raw = fs.readFileSync(filePath, "utf8");
  let dropped = 0;
  const records: unknown = parse(raw, {
    bom: true,
    relax_column_count: true,
    skip_empty_lines: true,
    skip_records_with_error: true,
    on_skip: () => {
      dropped += 1;
      return undefined;
    }
  });
  const table = toTable(records);
  return { ...table, skipped: table.skipped + dropped };
}

export function writeCsv(filePath: string, header: string[], rows: CsvRow[]): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const headerLine = stringify([header]);
  const body = rows.length ? stringify(rows, { columns: header }) : "";
  fs.writeFileSync(filePath, headerLine + body, "utf8");
}

export function appendCsvRows(filePath: string, header: string[], rows: CsvRow[]): void {
  if (!rows.length) {
    return;
  }
  const body = stringify(rows, { columns: header });
  const prefix = endsWithNewline(filePath) ? "" : "\n";
  fs.appendFileSync(filePath, prefix + body, "utf8");
}

export function listCsvFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) {
    return [];
  }
  return fs
    .readdirSync(dir)
    .filter((name) => name.toLowerCase().endsWith(".csv"))
    .sort()
    .map((name) => path.join(dir, name));
}

function endsWithNewline(filePath: string): boolean {
  const stat = fs.statSync(filePath);
  if (stat.size === 0) {
    return true;
  }
  const fd = fs.openSync(filePath, "r");
  try {
    const tail = Buffer.alloc(1);
    fs.readSync(fd, tail, 0, 1, stat.size - 1);
    return tail.toString("utf8") === "\n";
  } finally {
    fs.closeSync(fd);
  }
}

function toTable(records: unknown): CsvTable {
  if (!Array.isArray(records) || !records.length) {
    return { header: [], rows: [], skipped: 0 };
  }
  const [header, ...body] = records.map(toFields);
  const rows: CsvRow[] = [];
  let skipped = 0;
  for (const fields of body) {
    if (fields.length > header.length) {
      skipped += 1;
    }
    const row: CsvRow = {};
    header.forEach((column, index) => {
      row[column] = fields[index] ?? "";
    });
    rows.push(row);
  }
  return { header, rows, skipped };
}

function toFields(record: unknown): string[] {
  if (!Array.isArray(record)) {
    return [];
  }
  return record.map((value) => (typeof value === "string" ? value : ""));
}
