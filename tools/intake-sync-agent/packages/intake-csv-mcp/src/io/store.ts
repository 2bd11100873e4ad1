import fs from "node:fs";
import path from "node:path";

import type { ExportSummary } from "../csv_sync/exporter.js";

export type RunMetaExtra = Record<string, unknown>;

/** Writes `meta.json` beside the exports describing the last run. Returns its path. */
export function storeRunMeta(exportDir: string, summary: ExportSummary, extra: RunMetaExtra = {}): string {
  fs.mkdirSync(exportDir, { recursive: true });
  const metaPath = path.join(exportDir, "meta.json");
  const metaOut = {
    timestamp: new Date().toISOString(),
    files: summary.files,
    counts: summary.counts,
    without_forms: summary.withoutForms,
    cancellations: summary.cancellations,
    manifest: summary.manifest,
    extra
  };
  fs.writeFileSync(metaPath, JSON.stringify(metaOut, null, 2) + "\n", "utf8");
  return metaPath;
}
