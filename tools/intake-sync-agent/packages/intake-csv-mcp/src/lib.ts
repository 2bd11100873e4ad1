export { readCsv, writeCsv, appendCsvRows, listCsvFiles } from "./csv_sync/csv_io.js";
export type { CsvRow, CsvTable } from "./csv_sync/csv_io.js";
export { DEFAULT_COLUMNS, YES, NO, baseHeader } from "./csv_sync/columns.js";
export type { CsvColumns } from "./csv_sync/columns.js";
export { buildSignature } from "./csv_sync/signature.js";
export { mergeHeader, conformRow } from "./csv_sync/schema.js";
export type { HeaderMerge } from "./csv_sync/schema.js";
export { inferReschedules, fixReschedulesInFile } from "./csv_sync/inference.js";
export type { InferenceResult, FileOpOptions } from "./csv_sync/inference.js";
export { dedupeRows, dedupeFile } from "./csv_sync/dedupe.js";
export { FormCsvStore, emptyCounts } from "./csv_sync/form_store.js";
export type { WriteOutcome, OutcomeCounts, FormCsvStoreOptions } from "./csv_sync/form_store.js";
export { FormNameClassifier } from "./csv_sync/classifier.js";
export type { ClassifierOptions } from "./csv_sync/classifier.js";
export { ActivityLog, ACTIVITY_LOG_HEADER } from "./csv_sync/activity_log.js";
export { detectCancellations } from "./csv_sync/cancellations.js";
export { exportAppointments, ALL_FORMS_FILE } from "./csv_sync/exporter.js";
export type { ExportOptions, ExportSummary } from "./csv_sync/exporter.js";
export { sweepDirectory } from "./csv_sync/sweep.js";
export { parseAppointments, structureAppointment, buildFormRecord } from "./records/appointment.js";
export { formatAppointmentTime, parseAppointmentTime, formatSyncTimestamp } from "./records/time.js";
export { SyncLogger, normalizeError } from "./logger.js";
export type { Appointment, FormAnswer, AppointmentAction } from "./types.js";
