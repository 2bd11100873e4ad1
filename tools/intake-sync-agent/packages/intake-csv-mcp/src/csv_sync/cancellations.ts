import path from "node:path";

import type { SyncLogger } from "../logger.js";
import { parseAppointmentTime, parseSyncTimestamp, formatSyncTimestamp } from "../records/time.js";
import { listCsvFiles, readCsv, CsvRow, CsvTable } from "./csv_io.js";
import { NO, YES, cell, ingestionColumns, ingestionValue } from "./columns.js";
import type { FormCsvStore } from "./form_store.js";
import { ingestionOrder } from "./inference.js";

export type CancellationOptions = {
  now?: Date;
  timeZone?: string;
  logger?: SyncLogger;
};

/**
 * An appointment whose latest exported row is still active, whose scheduled time is in the
 * future, and which no longer appears in the current sync is taken as cancelled. A cancelled
 * copy of that row is written through the store. Returns cancellations per file name.
 */
export function detectCancellations(
  store: FormCsvStore,
  exportDir: string,
  currentIds: Iterable<string>,
  options: CancellationOptions = {}
): Record<string, number> {
  const columns = store.columns;
  const now = options.now ?? new Date();
  const active = new Set([...currentIds].map((id) => id.trim()));
  const result: Record<string, number> = {};

  for (const filePath of listCsvFiles(exportDir)) {
    const table = tryReadCsv(filePath, options.logger);
    if (!table) {
      continue;
    }
    const { header, rows } = table;
    const stampColumn = ingestionColumns(columns).find((column) => header.includes(column));
    if (!stampColumn || !header.includes(columns.temporalKey) || !header.includes(columns.businessKey)) {
      continue;
    }

    let detected = 0;
    for (const row of latestRowPerKey(rows, store)) {
      const key = cell(row, columns.businessKey);
      if (cell(row, columns.status) === YES || active.has(key)) {
        continue;
      }
      const ingestedAt = parseSyncTimestamp(ingestionValue(row, columns));
      if (!ingestedAt || ingestedAt.getTime() >= now.getTime()) {
        continue;
      }
      const scheduledAt = parseAppointmentTime(cell(row, columns.temporalKey), options.timeZone);
      if (!scheduledAt || scheduledAt.getTime() <= now.getTime()) {
        continue;
      }
      const cancelled: CsvRow = {
        ...row,
        [stampColumn]: formatSyncTimestamp(now),
        [columns.status]: YES,
        [columns.derived]: NO
      };
      const outcome = store.writeRecord(filePath, cancelled);
      if (outcome !== "skipped" && outcome !== "failed") {
        detected += 1;
      }
    }
    if (detected) {
      result[path.basename(filePath)] = detected;
      options.logger?.info("cancellations.detected", { count: detected }, filePath);
    }
  }
  return result;
}

function latestRowPerKey(rows: readonly CsvRow[], store: FormCsvStore): CsvRow[] {
  const columns = store.columns;
  const groups = new Map<string, CsvRow[]>();
  for (const row of rows) {
    const key = cell(row, columns.businessKey);
    if (!key) {
      continue;
    }
    const group = groups.get(key);
    if (group) {
      group.push(row);
    } else {
      groups.set(key, [row]);
    }
  }
  return [...groups.values()].flatMap((group) => ingestionOrder(group, (row) => ingestionValue(row, columns)).slice(-1));
}

function tryReadCsv(filePath: string, logger?: SyncLogger): CsvTable | null {
  try {
    return readCsv(filePath);
  } catch (err) {
    logger?.warn("cancellations.read_failed", err, filePath);
    return null;
  }
}
