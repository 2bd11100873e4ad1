import type { CsvRow } from "./csv_io.js";

export type HeaderMerge = {
  header: string[];
  added: string[];
  widened: boolean;
};

/**
 * Superset of the existing header and the incoming columns. Existing order is kept and new
 * columns go last in encounter order; an empty existing header starts from `baseHeader`.
 */
export function mergeHeader(
  existing: readonly string[],
  incoming: Iterable<string>,
  baseHeader: readonly string[]
): HeaderMerge {
  const header = existing.length ? [...existing] : [...baseHeader];
  const seen = new Set(header);
  const added: string[] = [];
  for (const column of incoming) {
    if (seen.has(column)) {
      continue;
    }
    seen.add(column);
    header.push(column);
    added.push(column);
  }
  return { header, added, widened: existing.length > 0 && added.length > 0 };
}

export function conformRow(row: Readonly<Record<string, string | undefined>>, header: readonly string[]): CsvRow {
  const out: CsvRow = {};
  for (const column of header) {
    out[column] = row[column] ?? "";
  }
  return out;
}
