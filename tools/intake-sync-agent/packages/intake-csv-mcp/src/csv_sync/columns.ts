import type { CsvRow } from "./csv_io.js";

export const YES = "Yes";
export const NO = "No";

export type CsvColumns = {
  ingestion: string;
  ingestionAliases: string[];
  businessKey: string;
  clientName: string;
  email: string;
  phone: string;
  temporalKey: string;
  appointmentType: string;
  status: string;
  derived: string;
  signatureExcluded: string[];
};

export const DEFAULT_COLUMNS: CsvColumns = {
  ingestion: "Sync Timestamp",
  ingestionAliases: ["Export Timestamp"],
  businessKey: "Appointment ID",
  clientName: "Client Name",
  email: "Email",
  phone: "Phone",
  temporalKey: "Appointment DateTime",
  appointmentType: "Appointment Type",
  status: "Canceled",
  derived: "Rescheduled",
  signatureExcluded: ["Export Timestamp", "Sync Timestamp", "Timestamp"]
};

export function baseHeader(columns: CsvColumns = DEFAULT_COLUMNS): string[] {
  return [
    columns.ingestion,
    columns.businessKey,
    columns.clientName,
    columns.email,
    columns.phone,
    columns.temporalKey,
    columns.status,
    columns.derived
  ];
}

export function ingestionColumns(columns: CsvColumns = DEFAULT_COLUMNS): string[] {
  return [columns.ingestion, ...columns.ingestionAliases];
}

/** First non-empty ingestion timestamp of the row, or "" when it has none. */
export function ingestionValue(row: CsvRow, columns: CsvColumns = DEFAULT_COLUMNS): string {
  for (const column of ingestionColumns(columns)) {
    const value = (row[column] ?? "").trim();
    if (value) {
      return value;
    }
  }
  return "";
}

export function cell(row: CsvRow, column: string): string {
  return (row[column] ?? "").trim();
}
