import fs from "node:fs";
import path from "node:path";
import { describe, it, expect } from "vitest";

import { ACTIVITY_LOG_HEADER, ActivityLog } from "../src/csv_sync/activity_log.js";
import { readCsv } from "../src/csv_sync/csv_io.js";
import type { Appointment } from "../src/types.js";
import { makeTempDir } from "./helpers.js";

const NOW = new Date(2026, 0, 5, 9, 0, 0);

const APPOINTMENT: Appointment = {
  appointmentId: "101",
  clientName: "Jane Doe",
  email: "jane@example.com",
  phone: "555-0101",
  datetime: "2026-03-09T16:00:00-0400",
  appointmentType: "FREE | Startup Essentials",
  canceled: false,
  dateCreated: "2026-01-02T10:00:00-0500",
  answers: []
};

describe("ActivityLog", () => {
  it("creates the file with a header and appends one line per action", () => {
    const filePath = path.join(makeTempDir(), "logs", "appointment_log.csv");
    const log = new ActivityLog(filePath);

    expect(log.logAppointment(APPOINTMENT, "PROCESSED", { notes: "csv:new", now: NOW })).toBe(true);
    expect(log.logAppointment(APPOINTMENT, "CANCELLED", { injected: true, sinkRecordId: "rec-1", now: NOW })).toBe(true);

    const { header, rows } = readCsv(filePath);
    expect(header).toEqual(ACTIVITY_LOG_HEADER);
    expect(rows[0]).toEqual({
      Timestamp: "2026-01-05 09:00:00",
      "Appointment ID": "101",
      "Client Name": "Jane Doe",
      Email: "jane@example.com",
      Phone: "555-0101",
      "Appointment DateTime": "March 09, 2026 04:00 PM EDT",
      "Appointment Type": "FREE | Startup Essentials",
      Status: "Active",
      Canceled: "No",
      "Date Created": "2026-01-02T10:00:00-0500",
      Action: "PROCESSED",
      Injected: "No",
      "Sink Record ID": "",
      Notes: "csv:new"
    });
    expect(rows[1]).toMatchObject({ Status: "Cancelled", Canceled: "Yes", Action: "CANCELLED", Injected: "Yes", "Sink Record ID": "rec-1" });
  });

  it("returns false when the log cannot be written", () => {
    const dir = makeTempDir();
    fs.writeFileSync(path.join(dir, "blocker"), "x");
    const log = new ActivityLog(path.join(dir, "blocker", "appointment_log.csv"));
    expect(log.logAppointment(APPOINTMENT, "PROCESSED", { now: NOW })).toBe(false);
  });
});
