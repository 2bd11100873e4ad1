import fs from "node:fs";
import path from "node:path";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";

import { cfgFromEnv, resolvePath } from "./config.js";
import { ActivityLog } from "./csv_sync/activity_log.js";
import { FormNameClassifier } from "./csv_sync/classifier.js";
import { dedupeFile } from "./csv_sync/dedupe.js";
import { exportAppointments, type ExportSummary } from "./csv_sync/exporter.js";
import { FormCsvStore } from "./csv_sync/form_store.js";
import { fixReschedulesInFile } from "./csv_sync/inference.js";
import { sweepDirectory } from "./csv_sync/sweep.js";
import { storeRunMeta } from "./io/store.js";
import { SyncLogger, normalizeError } from "./logger.js";
import { parseAppointments } from "./records/appointment.js";

const cfg = cfgFromEnv();

const server = new McpServer({ name: "intake-csv-mcp", version: "0.1.0" });

function textResult(...lines: string[]) {
  return {
    content: lines.map((text) => ({ type: "text" as const, text }))
  };
}

function loadAppointmentsInput(appointmentsPath?: string, inline?: unknown[]): unknown {
  if (inline && inline.length) {
    return inline;
  }
  if (!appointmentsPath) {
    throw new Error("Provide appointmentsPath or inline appointments.");
  }
  const raw = fs.readFileSync(resolvePath(cfg.repoRoot, appointmentsPath), "utf8");
  return JSON.parse(raw);
}

server.tool(
  "export_csv",
  {
    appointmentsPath: z.string().optional().describe("JSON file holding an array of scheduling API appointments"),
    appointments: z.array(z.unknown()).optional(),
    exportDir: z.string().default(cfg.defaultExportDir),
    groupByType: z.boolean().default(true),
    detectCancellations: z.boolean().default(true),
    activityLog: z.boolean().default(true),
    keywords: z.array(z.string()).optional(),
    fallbackFormName: z.string().optional()
  },
  async (args) => {
    const exportDir = resolvePath(cfg.repoRoot, args.exportDir);
    const logger = new SyncLogger(exportDir, { stepsOnly: cfg.logStepsOnly });
    let summary: ExportSummary | null = null;
    let rejected = 0;
    let error: unknown = null;
    try {
      const input = logger.step("loadAppointments", () => loadAppointmentsInput(args.appointmentsPath, args.appointments));
      const parsed = parseAppointments(input);
      rejected = parsed.rejected.length;
      for (const entry of parsed.rejected) {
        logger.warn("appointment.rejected", new Error(entry.message), undefined, { index: entry.index });
      }
      const classifier = new FormNameClassifier({
        keywords: args.keywords ?? cfg.formTypeKeywords,
        fallbackName: args.fallbackFormName ?? cfg.fallbackFormName
      });
      const activityLog = args.activityLog
        ? new ActivityLog(resolvePath(cfg.repoRoot, cfg.activityLogFile), { timeZone: cfg.timeZone, logger })
        : undefined;
      summary = logger.step("exportAppointments", () =>
        exportAppointments(parsed.appointments, {
          exportDir,
          classifier,
          store: new FormCsvStore({ logger }),
          groupByType: args.groupByType,
          detectCancellations: args.detectCancellations,
          activityLog,
          timeZone: cfg.timeZone,
          logger
        })
      );
      storeRunMeta(exportDir, summary, { rejected });
    } catch (err) {
      error = err;
    }
    const meta = logger.finalize(error ? "error" : "success", error || undefined, summary ? { counts: summary.counts } : undefined);

    if (error || !summary) {
      const errMeta = normalizeError(error);
      return textResult(`Export failed. ${errMeta.code}: ${errMeta.message}`, JSON.stringify(meta, null, 2));
    }
    return textResult(
      `Export complete. Files: ${Object.keys(summary.files).length}. Rejected: ${rejected}. Warnings: ${logger.warningCount}.`,
      JSON.stringify({ files: summary.files, counts: summary.counts, cancellations: summary.cancellations }, null, 2)
    );
  }
);

/** Maintenance tools log under `logs/<tool>/`, apart from export runs. */
function toolLogger(dir: string, tool: string): SyncLogger {
  return new SyncLogger(dir, { logDirName: path.join("logs", tool), stepsOnly: cfg.logStepsOnly });
}

function warningLine(logger: SyncLogger): string {
  return logger.warningCount
    ? `Warnings: ${logger.warningCount}. See ${logger.stepsPath}.`
    : "Warnings: 0.";
}

server.tool(
  "dedupe_csv",
  {
    file: z.string()
  },
  async ({ file }) => {
    const filePath = resolvePath(cfg.repoRoot, file);
    const logger = toolLogger(path.dirname(filePath), "dedupe_csv");
    const removed = dedupeFile(filePath, { logger });
    logger.finalize(logger.warningCount ? "error" : "success", undefined, { removed });
    return textResult(`Removed ${removed} duplicate row(s) from ${filePath}.`, warningLine(logger));
  }
);

server.tool(
  "fix_reschedules",
  {
    file: z.string()
  },
  async ({ file }) => {
    const filePath = resolvePath(cfg.repoRoot, file);
    const logger = toolLogger(path.dirname(filePath), "fix_reschedules");
    const rewritten = fixReschedulesInFile(filePath, { logger });
    logger.finalize(logger.warningCount ? "error" : "success", undefined, { rewritten });
    if (logger.warningCount) {
      return textResult(`Could not update ${filePath}.`, warningLine(logger));
    }
    return textResult(rewritten ? `Rescheduled flags updated in ${filePath}.` : `No changes needed in ${filePath}.`);
  }
);

server.tool(
  "sweep_exports",
  {
    exportDir: z.string().default(cfg.defaultExportDir)
  },
  async ({ exportDir }) => {
    const dir = resolvePath(cfg.repoRoot, exportDir);
    const logger = toolLogger(dir, "sweep_exports");
    const results = sweepDirectory(dir, { logger });
    logger.finalize(logger.warningCount ? "error" : "success", undefined, { files: results.length });
    return textResult(`Swept ${results.length} file(s). ${warningLine(logger)}`, JSON.stringify(results, null, 2));
  }
);

server.tool(
  "classify_form_name",
  {
    label: z.string(),
    keywords: z.array(z.string()).optional(),
    fallbackFormName: z.string().optional()
  },
  async ({ label, keywords, fallbackFormName }) => {
    const classifier = new FormNameClassifier({
      keywords: keywords ?? cfg.formTypeKeywords,
      fallbackName: fallbackFormName ?? cfg.fallbackFormName
    });
    return textResult(classifier.fileNameFor(label));
  }
);

const transport = new StdioServerTransport();
await server.connect(transport);
