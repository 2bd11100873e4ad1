import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import type { CsvRow } from "../src/csv_sync/csv_io.js";

export const T1 = "March 09, 2026 04:00 PM EDT";
export const T2 = "March 12, 2026 10:00 AM EDT";

export function makeTempDir(prefix = "intake-csv-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function formRow(overrides: Record<string, string> = {}): CsvRow {
  return {
    "Sync Timestamp": "2026-01-05 09:00:00",
    "Appointment ID": "7",
    "Client Name": "Test Client",
    Email: "client@example.com",
    Phone: "555-0100",
    "Appointment DateTime": T1,
    Canceled: "No",
    ...overrides
  };
}

export function readSteps(logPath: string): Array<Record<string, unknown>> {
  return fs
    .readFileSync(logPath, "utf8")
    .split("\n")
    .filter(Boolean)
    .map((line): unknown => JSON.parse(line))
    .filter(isRecord);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
