import fs from "node:fs";
import crypto from "node:crypto";

import { readCsv } from "../csv_sync/csv_io.js";

export type ManifestEntry = {
  path: string;
  size: number;
  sha256: string;
  rows: number;
};

export function buildManifest(filePaths: string[]): ManifestEntry[] {
  return filePaths
    .filter((filePath) => fs.existsSync(filePath))
    .map((filePath) => {
      const buf = fs.readFileSync(filePath);
      return {
        path: filePath,
        size: buf.length,
        sha256: crypto.createHash("sha256").update(buf).digest("hex"),
        rows: countRows(filePath)
      };
    });
}

function countRows(filePath: string): number {
  try {
    return readCsv(filePath).rows.length;
  } catch {
    return -1;
  }
}
