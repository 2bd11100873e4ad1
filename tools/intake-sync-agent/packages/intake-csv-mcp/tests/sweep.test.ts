import fs from "node:fs";
import path from "node:path";
import { describe, it, expect } from "vitest";

import { readCsv, writeCsv } from "../src/csv_sync/csv_io.js";
import { baseHeader } from "../src/csv_sync/columns.js";
import { sweepDirectory } from "../src/csv_sync/sweep.js";
import { SyncLogger } from "../src/logger.js";
import { T2, formRow, makeTempDir, readSteps } from "./helpers.js";

describe("sweepDirectory", () => {
  it("flags reschedules and removes duplicates in every file", () => {
    const dir = makeTempDir();
    const dirty = path.join(dir, "dirty.csv");
    const clean = path.join(dir, "clean.csv");
    writeCsv(dirty, baseHeader(), [
      formRow({ Rescheduled: "No" }),
      formRow({ "Sync Timestamp": "2026-01-06 09:00:00", "Appointment DateTime": T2, Rescheduled: "No" }),
      formRow({ "Sync Timestamp": "2026-01-07 09:00:00", Rescheduled: "No" })
    ]);
    writeCsv(clean, baseHeader(), [formRow({ Rescheduled: "No" })]);

    expect(sweepDirectory(dir)).toEqual([
      { file: clean, rescheduleRewrite: false, duplicatesRemoved: 0 },
      { file: dirty, rescheduleRewrite: true, duplicatesRemoved: 1 }
    ]);
    expect(readCsv(dirty).rows.map((row) => [row["Appointment DateTime"], row.Rescheduled])).toEqual([
      [formRow()["Appointment DateTime"], "No"],
      [T2, "Yes"]
    ]);
  });

  it("logs a file it cannot read instead of reporting it clean", () => {
    const dir = makeTempDir();
    fs.mkdirSync(path.join(dir, "broken.csv"));
    const logger = new SyncLogger(dir, { stepsOnly: true });

    expect(sweepDirectory(dir, { logger })).toEqual([
      { file: path.join(dir, "broken.csv"), rescheduleRewrite: false, duplicatesRemoved: 0 }
    ]);
    expect(logger.warningCount).toBe(2);
    expect(readSteps(logger.stepsPath).map((step) => step.step)).toEqual(["reschedule.failed", "dedupe.failed"]);
  });
});
