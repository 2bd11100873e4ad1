import { format, isValid, parse, parseISO } from "date-fns";
import { formatInTimeZone, fromZonedTime } from "date-fns-tz";

import { DEFAULT_TIME_ZONE } from "../config.js";

export const SYNC_TIMESTAMP_FORMAT = "yyyy-MM-dd HH:mm:ss";
const APPOINTMENT_FORMAT = "MMMM dd, yyyy hh:mm a";

const ZONE_ABBREVIATIONS: Record<string, string> = {
  EST: "America/New_York",
  EDT: "America/New_York",
  CST: "America/Chicago",
  CDT: "America/Chicago",
  MST: "America/Denver",
  MDT: "America/Denver",
  PST: "America/Los_Angeles",
  PDT: "America/Los_Angeles"
};

const HAS_OFFSET = /\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:[zZ]|[+-]\d{2}(?::?\d{2})?)$/;

/** Ingestion timestamps are written in process-local time, as the sync host sees it. */
export function formatSyncTimestamp(date: Date): string {
  return format(date, SYNC_TIMESTAMP_FORMAT);
}

export function parseSyncTimestamp(value: string): Date | null {
  const parsed = parse(value.trim(), SYNC_TIMESTAMP_FORMAT, new Date(0));
  return isValid(parsed) ? parsed : null;
}

/**
 * "2026-03-09T16:00:00-0400" -> "March 09, 2026 04:00 PM EDT". Values without an offset are
 * taken as UTC. Returns null when the input is not an ISO datetime.
 */
export function formatAppointmentTime(iso: string, timeZone: string = DEFAULT_TIME_ZONE): string | null {
  const trimmed = iso.trim();
  if (!trimmed) {
    return "";
  }
  const instant = parseInstant(trimmed);
  if (!isValid(instant)) {
    return null;
  }
  return formatInTimeZone(instant, timeZone, `${APPOINTMENT_FORMAT} zzz`);
}

/** Reverses formatAppointmentTime; also accepts plain ISO strings. */
export function parseAppointmentTime(value: string, timeZone: string = DEFAULT_TIME_ZONE): Date | null {
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }
  const match = trimmed.match(/^(.*\d{1,2}:\d{2}\s*[AP]M)(?:\s+([A-Z]{2,5}))?$/i);
  if (match) {
    const wallClock = parse(match[1], APPOINTMENT_FORMAT, new Date(0));
    if (!isValid(wallClock)) {
      return null;
    }
    const abbreviation = match[2]?.toUpperCase();
    const zone = abbreviation ? ZONE_ABBREVIATIONS[abbreviation] ?? timeZone : timeZone;
    return fromZonedTime(wallClock, zone);
  }
  const instant = parseInstant(trimmed);
  return isValid(instant) ? instant : null;
}

function parseInstant(text: string): Date {
  const hasTime = /\d{2}:\d{2}/.test(text);
  return parseISO(hasTime && !HAS_OFFSET.test(text) ? `${text}Z` : text);
}
