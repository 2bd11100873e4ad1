import { DEFAULT_COLUMNS } from "./columns.js";

export const SIGNATURE_SEPARATOR = "|";

/**
 * Canonical identity of a row: every non-timestamp `column:value` pair, values trimmed,
 * sorted by column name. Column order in the input has no effect.
 */
export function buildSignature(
  row: Readonly<Record<string, unknown>>,
  excluded: Iterable<string> = DEFAULT_COLUMNS.signatureExcluded
): string {
  const skip = new Set(excluded);
  return Object.keys(row)
    .filter((column) => !skip.has(column))
    .sort()
    .map((column) => `${column}:${normalizeCell(row[column])}`)
    .join(SIGNATURE_SEPARATOR);
}

export function normalizeCell(value: unknown): string {
  if (value === null || value === undefined) {
    return "";
  }
  return String(value).trim();
}
