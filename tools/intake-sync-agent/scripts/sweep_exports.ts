#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";

import { sweepDirectory } from "../packages/intake-csv-mcp/src/csv_sync/sweep.js";
import { SyncLogger } from "../packages/intake-csv-mcp/src/logger.js";

function main(): number {
  const target = process.argv[2];
  if (!target) {
    console.error("Usage: sweep_exports.ts <dir>");
    return 1;
  }
  const abs = path.resolve(target);
  if (!fs.existsSync(abs) || !fs.statSync(abs).isDirectory()) {
    console.error("Target is not a directory: " + abs);
    return 1;
  }
  const logger = new SyncLogger(abs, { logDirName: path.join("logs", "sweep_exports") });
  for (const result of sweepDirectory(abs, { logger })) {
    const name = path.basename(result.file);
    console.log(`${name}: rescheduled=${result.rescheduleRewrite ? "rewritten" : "ok"} duplicates_removed=${result.duplicatesRemoved}`);
  }
  logger.finalize(logger.warningCount ? "error" : "success");
  if (logger.warningCount) {
    console.error(`${logger.warningCount} warning(s); see ${logger.stepsPath}`);
    return 1;
  }
  return 0;
}

process.exit(main());
