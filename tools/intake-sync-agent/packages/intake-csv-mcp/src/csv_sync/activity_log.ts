import fs from "node:fs";

import type { SyncLogger } from "../logger.js";
import type { Appointment, AppointmentAction } from "../types.js";
import { appointmentTimeCell } from "../records/appointment.js";
import { formatSyncTimestamp } from "../records/time.js";
import { appendCsvRows, writeCsv, CsvRow } from "./csv_io.js";
import { NO, YES } from "./columns.js";

export const ACTIVITY_LOG_HEADER = [
  "Timestamp",
  "Appointment ID",
  "Client Name",
  "Email",
  "Phone",
  "Appointment DateTime",
  "Appointment Type",
  "Status",
  "Canceled",
  "Date Created",
  "Action",
  "Injected",
  "Sink Record ID",
  "Notes"
];

export type ActivityEntryOptions = {
  injected?: boolean;
  sinkRecordId?: string;
  notes?: string;
  now?: Date;
};

/** Append-only audit trail: one line per appointment action, never rewritten. */
export class ActivityLog {
  readonly filePath: string;
  private readonly timeZone?: string;
  private readonly logger?: SyncLogger;

  constructor(filePath: string, options: { timeZone?: string; logger?: SyncLogger } = {}) {
    this.filePath = filePath;
    this.timeZone = options.timeZone;
    this.logger = options.logger;
  }

  logAppointment(appointment: Appointment, action: AppointmentAction, options: ActivityEntryOptions = {}): boolean {
    const cancelled = action === "CANCELLED" || appointment.canceled;
    const row: CsvRow = {
      Timestamp: formatSyncTimestamp(options.now ?? new Date()),
      "Appointment ID": appointment.appointmentId,
      "Client Name": appointment.clientName,
      Email: appointment.email,
      Phone: appointment.phone,
      "Appointment DateTime": appointmentTimeCell(appointment, { timeZone: this.timeZone, logger: this.logger }),
      "Appointment Type": appointment.appointmentType,
      Status: cancelled ? "Cancelled" : "Active",
      Canceled: cancelled ? YES : NO,
      "Date Created": appointment.dateCreated,
      Action: action,
      Injected: options.injected ? YES : NO,
      "Sink Record ID": options.sinkRecordId ?? "",
      Notes: options.notes ?? ""
    };
    try {
      if (!fs.existsSync(this.filePath) || fs.statSync(this.filePath).size === 0) {
        writeCsv(this.filePath, ACTIVITY_LOG_HEADER, [row]);
      } else {
        appendCsvRows(this.filePath, ACTIVITY_LOG_HEADER, [row]);
      }
      return true;
    } catch (err) {
      this.logger?.warn("activity_log.write_failed", err, this.filePath, { appointment_id: appointment.appointmentId });
      return false;
    }
  }
}
