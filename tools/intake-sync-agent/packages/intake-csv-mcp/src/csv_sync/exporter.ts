import fs from "node:fs";
import path from "node:path";

import type { SyncLogger } from "../logger.js";
import type { Appointment, AppointmentAction } from "../types.js";
import { buildManifest, ManifestEntry } from "../io/manifest.js";
import { buildFormRecord } from "../records/appointment.js";
import type { ActivityLog } from "./activity_log.js";
import { detectCancellations } from "./cancellations.js";
import { FormNameClassifier } from "./classifier.js";
import { dedupeFile } from "./dedupe.js";
import { FormCsvStore, OutcomeCounts, WriteOutcome, emptyCounts } from "./form_store.js";

export const ALL_FORMS_FILE = "all_forms.csv";

export type ExportOptions = {
  exportDir: string;
  classifier?: FormNameClassifier;
  store?: FormCsvStore;
  groupByType?: boolean;
  detectCancellations?: boolean;
  activityLog?: ActivityLog;
  now?: Date;
  timeZone?: string;
  logger?: SyncLogger;
};

export type ExportSummary = {
  files: Record<string, string>;
  counts: OutcomeCounts;
  withoutForms: number;
  cancellations: Record<string, number>;
  manifest: ManifestEntry[];
};

/**
 * Routes each appointment to its category file and reconciles it there, in fetch order.
 * A failing file is logged and counted; the batch always runs to the end.
 */
export function exportAppointments(appointments: readonly Appointment[], options: ExportOptions): ExportSummary {
  const logger = options.logger;
  const groupByType = options.groupByType ?? true;
  const classifier = options.classifier ?? new FormNameClassifier();
  const store = options.store ?? new FormCsvStore({ logger });
  const now = options.now ?? new Date();
  fs.mkdirSync(options.exportDir, { recursive: true });

  const files: Record<string, string> = {};
  const counts = emptyCounts();
  let withoutForms = 0;

  for (const appointment of appointments) {
    const record = buildFormRecord(appointment, {
      now,
      timeZone: options.timeZone,
      includeType: !groupByType,
      columns: store.columns,
      logger
    });
    if (!record) {
      withoutForms += 1;
      continue;
    }
    const label = groupByType ? appointment.appointmentType || "unknown" : "all";
    const fileName = groupByType ? classifier.fileNameFor(label) : ALL_FORMS_FILE;
    const filePath = path.join(options.exportDir, fileName);
    files[label] = filePath;

    const outcome = store.writeRecord(filePath, record);
    counts[outcome] += 1;
    if (outcome !== "skipped") {
      options.activityLog?.logAppointment(appointment, activityAction(appointment, outcome), {
        notes: `csv:${outcome}`,
        now
      });
    }
  }

  let cancellations: Record<string, number> = {};
  if (options.detectCancellations) {
    cancellations = detectCancellations(
      store,
      options.exportDir,
      appointments.map((appointment) => appointment.appointmentId),
      { now, timeZone: options.timeZone, logger }
    );
  }
  const touchedFiles = [...new Set([
    ...Object.values(files),
    ...Object.keys(cancellations).map((name) => path.join(options.exportDir, name))
  ])];
  if (options.detectCancellations) {
    for (const filePath of touchedFiles) {
      dedupeFile(filePath, { columns: store.columns, logger });
    }
  }

  logger?.info("export.done", { counts, without_forms: withoutForms, cancellations });
  return { files, counts, withoutForms, cancellations, manifest: buildManifest(touchedFiles) };
}

function activityAction(appointment: Appointment, outcome: WriteOutcome): AppointmentAction {
  if (outcome === "failed") {
    return "FAILED";
  }
  if (appointment.canceled) {
    return "CANCELLED";
  }
  return outcome === "change" ? "RESCHEDULED" : "PROCESSED";
}
