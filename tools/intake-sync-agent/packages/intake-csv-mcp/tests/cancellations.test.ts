import fs from "node:fs";
import path from "node:path";
import { describe, it, expect, beforeEach } from "vitest";

import { detectCancellations } from "../src/csv_sync/cancellations.js";
import { readCsv } from "../src/csv_sync/csv_io.js";
import { FormCsvStore } from "../src/csv_sync/form_store.js";
import { formatSyncTimestamp } from "../src/records/time.js";
import { formRow, makeTempDir } from "./helpers.js";

const NOW = new Date("2026-02-01T12:00:00Z");

describe("detectCancellations", () => {
  let dir: string;
  let filePath: string;
  let store: FormCsvStore;

  beforeEach(() => {
    dir = makeTempDir();
    filePath = path.join(dir, "help_desk.csv");
    store = new FormCsvStore();
    store.writeRecord(filePath, formRow({ "Appointment ID": "7", Stage: "Idea" }));
    store.writeRecord(
      filePath,
      formRow({ "Appointment ID": "8", "Appointment DateTime": "January 02, 2026 10:00 AM EST", Stage: "Growth" })
    );
  });

  it("writes one cancelled copy for a future appointment missing from the sync", () => {
    expect(detectCancellations(store, dir, ["9"], { now: NOW })).toEqual({ "help_desk.csv": 1 });

    const { rows } = readCsv(filePath);
    expect(rows).toHaveLength(3);
    expect(rows[2]).toMatchObject({
      "Sync Timestamp": formatSyncTimestamp(NOW),
      "Appointment ID": "7",
      Canceled: "Yes",
      Rescheduled: "No",
      Stage: "Idea"
    });
  });

  it("does nothing on a second run", () => {
    detectCancellations(store, dir, ["9"], { now: NOW });
    expect(detectCancellations(store, dir, ["9"], { now: NOW })).toEqual({});
    expect(readCsv(filePath).rows).toHaveLength(3);
  });

  it("leaves appointments that are still in the sync", () => {
    expect(detectCancellations(store, dir, ["7"], { now: NOW })).toEqual({});
    expect(readCsv(filePath).rows).toHaveLength(2);
  });

  it("skips files without the expected columns", () => {
    fs.writeFileSync(path.join(dir, "other.csv"), "a,b\n1,2\n");
    expect(detectCancellations(store, dir, ["7"], { now: NOW })).toEqual({});
    expect(fs.readFileSync(path.join(dir, "other.csv"), "utf8")).toBe("a,b\n1,2\n");
  });
});
