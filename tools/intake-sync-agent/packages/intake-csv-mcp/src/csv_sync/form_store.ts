import fs from "node:fs";
import path from "node:path";

import type { SyncLogger } from "../logger.js";
import { appendCsvRows, readCsv, writeCsv, CsvRow } from "./csv_io.js";
import { DEFAULT_COLUMNS, CsvColumns, NO, YES, baseHeader, cell } from "./columns.js";
import { dedupeFile } from "./dedupe.js";
import { fixReschedulesInFile } from "./inference.js";
import { conformRow, mergeHeader } from "./schema.js";
import { buildSignature } from "./signature.js";

export type WriteOutcome = "skipped" | "new" | "change" | "revision" | "failed";

export type OutcomeCounts = Record<WriteOutcome, number>;

export type FormCsvStoreOptions = {
  columns?: CsvColumns;
  logger?: SyncLogger;
};

type LoadedFile = {
  state: "absent" | "ok" | "unreadable";
  header: string[];
  rows: CsvRow[];
  skipped: number;
};

export function emptyCounts(): OutcomeCounts {
  return { skipped: 0, new: 0, change: 0, revision: 0, failed: 0 };
}

/**
 * Flat-file repository for per-category form exports. Every read-modify-write of a category
 * file goes through here, so the file on disk is the only identity index there is.
 */
export class FormCsvStore {
  readonly columns: CsvColumns;
  private readonly logger?: SyncLogger;

  constructor(options: FormCsvStoreOptions = {}) {
    this.columns = options.columns ?? DEFAULT_COLUMNS;
    this.logger = options.logger;
  }

  writeRecord(filePath: string, record: Readonly<CsvRow>): WriteOutcome {
    try {
      return this.reconcile(filePath, record);
    } catch (err) {
      this.logger?.warn("store.write_failed", err, filePath, {
        appointment_id: record[this.columns.businessKey] ?? ""
      });
      return "failed";
    }
  }

  writeRecords(filePath: string, records: readonly Readonly<CsvRow>[]): OutcomeCounts {
    const counts = emptyCounts();
    for (const record of records) {
      counts[this.writeRecord(filePath, record)] += 1;
    }
    return counts;
  }

  private reconcile(filePath: string, record: Readonly<CsvRow>): WriteOutcome {
    const { derived, signatureExcluded } = this.columns;
    const incoming: CsvRow = { ...record, [derived]: NO };
    const existing = this.load(filePath);
    const merge = mergeHeader(existing.header, Object.keys(incoming), baseHeader(this.columns));

    const rows = existing.rows.map((row) => conformRow(row, merge.header));
    const signatures = new Set(rows.map((row) => buildSignature(row, signatureExcluded)));
    const candidate = conformRow(incoming, merge.header);
    // The rescheduled flag is ours, so a row already flagged by inference still counts as a match.
    const variants = [candidate, { ...candidate, [derived]: YES }];
    if (variants.some((row) => signatures.has(buildSignature(row, signatureExcluded)))) {
      this.logger?.info("store.skip_duplicate", { appointment_id: cell(candidate, this.columns.businessKey) }, filePath);
      return "skipped";
    }

    const outcome = this.classify(existing.rows, candidate);
    if (existing.state !== "ok") {
      writeCsv(filePath, merge.header, [candidate]);
    } else if (merge.widened) {
      if (existing.skipped) {
        throw new Error(`Refusing to rewrite ${filePath}: ${existing.skipped} row(s) would be lost`);
      }
      writeCsv(filePath, merge.header, [...rows, candidate]);
      this.logger?.info("schema.widened", { added: merge.added }, filePath);
    } else {
      appendCsvRows(filePath, merge.header, [candidate]);
    }
    this.logger?.info(
      "store.appended",
      { outcome, appointment_id: cell(candidate, this.columns.businessKey) },
      filePath
    );

    fixReschedulesInFile(filePath, { columns: this.columns, logger: this.logger });
    dedupeFile(filePath, { columns: this.columns, logger: this.logger });
    return outcome;
  }

  private classify(existing: readonly CsvRow[], candidate: CsvRow): WriteOutcome {
    const { businessKey, temporalKey, status } = this.columns;
    const key = cell(candidate, businessKey);
    const siblings = key ? existing.filter((row) => cell(row, businessKey) === key) : [];
    if (!siblings.length) {
      return "new";
    }
    const time = cell(candidate, temporalKey);
    const state = cell(candidate, status);
    const timeChanged = siblings.every((row) => cell(row, temporalKey) !== time);
    const statusChanged = siblings.every((row) => cell(row, status) !== state);
    return timeChanged || statusChanged ? "change" : "revision";
  }

  private load(filePath: string): LoadedFile {
    if (!fs.existsSync(filePath)) {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      return { state: "absent", header: [], rows: [], skipped: 0 };
    }
    try {
      const { header, rows, skipped } = readCsv(filePath);
      if (!header.length) {
        return { state: "absent", header: [], rows: [], skipped: 0 };
      }
      if (skipped) {
        this.logger?.warn("schema.rows_skipped", new Error(`${skipped} row(s) do not fit the header`), filePath, { skipped });
      }
      return { state: "ok", header, rows, skipped };
    } catch (err) {
      const aside = `${filePath}.unreadable`;
      this.logger?.warn("schema.read_failed", err, filePath, { moved_to: aside });
      fs.renameSync(filePath, aside);
      return { state: "unreadable", header: [], rows: [], skipped: 0 };
    }
  }
}
