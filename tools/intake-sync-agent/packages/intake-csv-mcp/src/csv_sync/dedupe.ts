import fs from "node:fs";

import { readCsv, writeCsv, CsvRow } from "./csv_io.js";
import { DEFAULT_COLUMNS } from "./columns.js";
import type { FileOpOptions } from "./inference.js";
import { buildSignature } from "./signature.js";

export function dedupeRows(
  rows: readonly CsvRow[],
  excluded: Iterable<string> = DEFAULT_COLUMNS.signatureExcluded
): { rows: CsvRow[]; removed: number } {
  const skip = [...excluded];
  const seen = new Set<string>();
  const kept: CsvRow[] = [];
  for (const row of rows) {
    const signature = buildSignature(row, skip);
    if (seen.has(signature)) {
      continue;
    }
    seen.add(signature);
    kept.push(row);
  }
  return { rows: kept, removed: rows.length - kept.length };
}

/** Drops every row whose signature repeats an earlier one. Returns the number removed. */
export function dedupeFile(filePath: string, options: FileOpOptions = {}): number {
  const columns = options.columns ?? DEFAULT_COLUMNS;
  if (!fs.existsSync(filePath)) {
    return 0;
  }
  try {
    const { header, rows, skipped } = readCsv(filePath);
    const result = dedupeRows(rows, columns.signatureExcluded);
    if (!result.removed) {
      return 0;
    }
    if (skipped) {
      options.logger?.warn("dedupe.rewrite_refused", new Error(`${skipped} row(s) do not fit the header`), filePath, { skipped });
      return 0;
    }
    writeCsv(filePath, header, result.rows);
    options.logger?.info("dedupe.removed", { removed: result.removed }, filePath);
    return result.removed;
  } catch (err) {
    options.logger?.warn("dedupe.failed", err, filePath);
    return 0;
  }
}
