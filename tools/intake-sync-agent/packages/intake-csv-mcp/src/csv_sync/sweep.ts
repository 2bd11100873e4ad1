import { listCsvFiles } from "./csv_io.js";
import { dedupeFile } from "./dedupe.js";
import { fixReschedulesInFile, FileOpOptions } from "./inference.js";

export type SweepResult = {
  file: string;
  rescheduleRewrite: boolean;
  duplicatesRemoved: number;
};

/** Re-runs reschedule inference and the dedup pass over every CSV in a directory. */
export function sweepDirectory(dir: string, options: FileOpOptions = {}): SweepResult[] {
  return listCsvFiles(dir).map((file) => ({
    file,
    rescheduleRewrite: fixReschedulesInFile(file, options),
    duplicatesRemoved: dedupeFile(file, options)
  }));
}
