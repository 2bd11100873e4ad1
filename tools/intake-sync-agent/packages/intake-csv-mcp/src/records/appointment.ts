import { z } from "zod";

import type { SyncLogger } from "../logger.js";
import type { CsvRow } from "../csv_sync/csv_io.js";
import { DEFAULT_COLUMNS, CsvColumns, NO, YES, baseHeader } from "../csv_sync/columns.js";
import type { Appointment, FormAnswer } from "../types.js";
import { formatAppointmentTime, formatSyncTimestamp } from "./time.js";

const scalar = z.union([z.string(), z.number(), z.boolean()]).nullish();

const formValueSchema = z.object({
  name: z.string().nullish(),
  value: scalar
});

const formSchema = z.object({
  id: z.union([z.number(), z.string()]).nullish(),
  name: z.string().nullish(),
  values: z.array(formValueSchema).nullish()
});

/** Appointment as the scheduling API returns it; unknown keys are dropped. */
export const rawAppointmentSchema = z.object({
  id: z.union([z.number(), z.string()]),
  firstName: z.string().nullish(),
  lastName: z.string().nullish(),
  email: z.string().nullish(),
  phone: z.string().nullish(),
  datetime: z.string().nullish(),
  type: z.string().nullish(),
  canceled: z.boolean().nullish(),
  datetimeCreated: z.string().nullish(),
  forms: z.array(formSchema).nullish()
});

export type RawAppointment = z.infer<typeof rawAppointmentSchema>;

export type ParsedAppointments = {
  appointments: Appointment[];
  rejected: { index: number; message: string }[];
};

export function parseAppointments(input: unknown): ParsedAppointments {
  const items = Array.isArray(input) ? input : [input];
  const appointments: Appointment[] = [];
  const rejected: ParsedAppointments["rejected"] = [];
  items.forEach((item, index) => {
    const result = rawAppointmentSchema.safeParse(item);
    if (result.success) {
      appointments.push(structureAppointment(result.data));
    } else {
      rejected.push({ index, message: result.error.issues.map((issue) => issue.message).join("; ") });
    }
  });
  return { appointments, rejected };
}

export function structureAppointment(raw: RawAppointment): Appointment {
  const answers: FormAnswer[] = [];
  for (const form of raw.forms ?? []) {
    for (const field of form.values ?? []) {
      const name = (field.name ?? "").trim();
      if (name) {
        answers.push({ name, value: field.value === null || field.value === undefined ? "" : String(field.value) });
      }
    }
  }
  return {
    appointmentId: String(raw.id),
    clientName: `${raw.firstName ?? ""} ${raw.lastName ?? ""}`.trim(),
    email: raw.email ?? "",
    phone: raw.phone ?? "",
    datetime: raw.datetime ?? "",
    appointmentType: raw.type ?? "",
    canceled: raw.canceled ?? false,
    dateCreated: raw.datetimeCreated ?? "",
    answers
  };
}

export type FormRecordOptions = {
  now?: Date;
  timeZone?: string;
  includeType?: boolean;
  columns?: CsvColumns;
  logger?: SyncLogger;
};

/**
 * Flattens an appointment into one export row: base columns followed by every form answer.
 * The rescheduled flag is left to the store. Returns null when the appointment carries no answers.
 */
export function buildFormRecord(appointment: Appointment, options: FormRecordOptions = {}): CsvRow | null {
  if (!appointment.answers.length) {
    return null;
  }
  const columns = options.columns ?? DEFAULT_COLUMNS;
  const record: CsvRow = {
    [columns.ingestion]: formatSyncTimestamp(options.now ?? new Date()),
    [columns.businessKey]: appointment.appointmentId,
    [columns.clientName]: appointment.clientName,
    [columns.email]: appointment.email,
    [columns.phone]: appointment.phone,
    [columns.temporalKey]: appointmentTimeCell(appointment, options),
    [columns.status]: appointment.canceled ? YES : NO
  };
  if (options.includeType) {
    record[columns.appointmentType] = appointment.appointmentType;
  }

  const reserved = new Set([...baseHeader(columns), columns.appointmentType, ...columns.signatureExcluded]);
  for (const answer of appointment.answers) {
    if (reserved.has(answer.name)) {
      continue;
    }
    record[answer.name] = answer.value;
  }
  return record;
}

export function appointmentTimeCell(appointment: Appointment, options: FormRecordOptions = {}): string {
  const formatted = formatAppointmentTime(appointment.datetime, options.timeZone);
  if (formatted === null) {
    options.logger?.warn("appointment.datetime_unparsed", new Error(`Unrecognised datetime: ${appointment.datetime}`), undefined, {
      appointment_id: appointment.appointmentId
    });
    return appointment.datetime;
  }
  return formatted;
}
