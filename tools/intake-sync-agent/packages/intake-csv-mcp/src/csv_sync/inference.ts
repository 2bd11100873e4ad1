import fs from "node:fs";

import type { SyncLogger } from "../logger.js";
import { readCsv, writeCsv, CsvRow } from "./csv_io.js";
import { DEFAULT_COLUMNS, CsvColumns, YES, cell, ingestionValue } from "./columns.js";

export type InferenceResult = {
  rows: CsvRow[];
  marked: number;
  updatesMade: boolean;
};

export type FileOpOptions = {
  columns?: CsvColumns;
  logger?: SyncLogger;
};

/**
 * For each business key with two or more rows, marks every row whose scheduled time differs
 * from the earliest-ingested row as rescheduled. The earliest row and rows sharing its time
 * keep whatever flag they already had. Input rows are not mutated.
 */
export function inferReschedules(rows: readonly CsvRow[], columns: CsvColumns = DEFAULT_COLUMNS): InferenceResult {
  const next = rows.map((row) => ({ ...row }));
  const groups = new Map<string, number[]>();
  next.forEach((row, index) => {
    const key = cell(row, columns.businessKey);
    if (!key) {
      return;
    }
    const group = groups.get(key);
    if (group) {
      group.push(index);
    } else {
      groups.set(key, [index]);
    }
  });

  let marked = 0;
  for (const indexes of groups.values()) {
    if (indexes.length < 2) {
      continue;
    }
    const ordered = ingestionOrder(indexes, (index) => ingestionValue(next[index], columns));
    const firstTime = cell(next[ordered[0]], columns.temporalKey);
    for (const index of ordered.slice(1)) {
      const row = next[index];
      if (cell(row, columns.temporalKey) === firstTime) {
        continue;
      }
      if (cell(row, columns.derived) !== YES) {
        row[columns.derived] = YES;
        marked += 1;
      }
    }
  }
  return { rows: next, marked, updatesMade: marked > 0 };
}

/** Re-derives the rescheduled flag for a whole file. Returns true only when the file was rewritten. */
export function fixReschedulesInFile(filePath: string, options: FileOpOptions = {}): boolean {
  const columns = options.columns ?? DEFAULT_COLUMNS;
  if (!fs.existsSync(filePath)) {
    return false;
  }
  try {
    const { header, rows, skipped } = readCsv(filePath);
    if (!header.includes(columns.derived) || !rows.length) {
      return false;
    }
    const result = inferReschedules(rows, columns);
    if (!result.updatesMade) {
      return false;
    }
    if (skipped) {
      options.logger?.warn("reschedule.rewrite_refused", new Error(`${skipped} row(s) do not fit the header`), filePath, { skipped });
      return false;
    }
    writeCsv(filePath, header, result.rows);
    options.logger?.info("reschedule.marked", { marked: result.marked }, filePath);
    return true;
  } catch (err) {
    options.logger?.warn("reschedule.failed", err, filePath);
    return false;
  }
}

/**
 * Orders one key's items by ingestion timestamp. Rows are appended in fetch order, so when any
 * item lacks a timestamp the whole group keeps file order.
 */
export function ingestionOrder<T>(items: readonly T[], stampOf: (item: T) => string): T[] {
  const stamped = items.map((item) => ({ item, stamp: stampOf(item) }));
  if (stamped.some(({ stamp }) => !stamp)) {
    return [...items];
  }
  return stamped.sort((a, b) => compareText(a.stamp, b.stamp)).map(({ item }) => item);
}

export function compareText(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}
