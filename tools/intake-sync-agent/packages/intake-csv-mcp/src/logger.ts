import fs from "node:fs";
import path from "node:path";

type StepPhase = "start" | "end" | "error" | "info" | "warn";

export type StepRecord = {
  ts: string;
  step: string;
  phase: StepPhase;
  ms?: number;
  file?: string;
  error_code?: string;
  error_message?: string;
  data?: Record<string, unknown>;
};

export type RunMeta = {
  status: "running" | "success" | "error";
  started_at: string;
  ended_at: string;
  duration_ms: number;
  output_dir: string;
  logs_dir: string;
  steps_log_path: string;
  warnings: number;
  error_code?: string;
  error_message?: string;
  summary?: Record<string, unknown>;
};

export type SyncLoggerOptions = {
  logDirName?: string;
  stepsOnly?: boolean;
};

export class SyncLogger {
  readonly outputDir: string;
  readonly logsDir: string;
  readonly stepsPath: string;
  readonly metaPath: string;
  private readonly startedAt: number;
  private readonly startedAtIso: string;
  private readonly stepsOnly: boolean;
  private warnings = 0;
  private finalized = false;
  private lastMeta: RunMeta | null = null;

  constructor(outputDir: string, options: SyncLoggerOptions = {}) {
    this.outputDir = outputDir;
    this.logsDir = path.join(outputDir, options.logDirName ?? "logs");
    this.stepsPath = path.join(this.logsDir, "steps.jsonl");
    this.metaPath = path.join(this.logsDir, "run_meta.json");
    this.stepsOnly = options.stepsOnly ?? (process.env.INTAKE_LOG_STEPS_ONLY || "false").toLowerCase() === "true";
    fs.mkdirSync(this.logsDir, { recursive: true });
    fs.writeFileSync(this.stepsPath, "");
    this.startedAt = Date.now();
    this.startedAtIso = new Date(this.startedAt).toISOString();
    if (!this.stepsOnly) {
      this.writeMeta(this.runningMeta());
    }
  }

  get warningCount(): number {
    return this.warnings;
  }

  log(record: StepRecord): void {
    fs.appendFileSync(this.stepsPath, `${JSON.stringify(record)}\n`);
  }

  info(step: string, data: Record<string, unknown>, file?: string): void {
    this.log({ ts: new Date().toISOString(), step, phase: "info", file, data });
  }

  warn(step: string, err: unknown, file?: string, data?: Record<string, unknown>): void {
    const { code, message } = normalizeError(err);
    this.warnings += 1;
    this.log({
      ts: new Date().toISOString(),
      step,
      phase: "warn",
      file,
      error_code: code,
      error_message: message,
      data
    });
  }

  step<T>(name: string, fn: () => T, file?: string): T {
    const started = Date.now();
    this.log({ ts: new Date(started).toISOString(), step: name, phase: "start", file });
    try {
      const result = fn();
      const ended = Date.now();
      this.log({ ts: new Date(ended).toISOString(), step: name, phase: "end", ms: ended - started, file });
      return result;
    } catch (err) {
      const ended = Date.now();
      const { code, message } = normalizeError(err);
      this.log({
        ts: new Date(ended).toISOString(),
        step: name,
        phase: "error",
        ms: ended - started,
        file,
        error_code: code,
        error_message: message
      });
      throw err;
    }
  }

  finalize(status: "success" | "error", err?: unknown, summary?: Record<string, unknown>): RunMeta {
    if (this.finalized && this.lastMeta) {
      return this.lastMeta;
    }
    const ended = Date.now();
    const meta: RunMeta = {
      ...this.runningMeta(),
      status,
      ended_at: new Date(ended).toISOString(),
      duration_ms: ended - this.startedAt,
      summary
    };
    if (err) {
      const { code, message } = normalizeError(err);
      meta.error_code = code;
      meta.error_message = message;
    }
    if (!this.stepsOnly) {
      this.writeMeta(meta);
    }
    this.finalized = true;
    this.lastMeta = meta;
    return meta;
  }

  private runningMeta(): RunMeta {
    return {
      status: "running",
      started_at: this.startedAtIso,
      ended_at: this.startedAtIso,
      duration_ms: 0,
      output_dir: this.outputDir,
      logs_dir: this.logsDir,
      steps_log_path: this.stepsPath,
      warnings: this.warnings
    };
  }

  private writeMeta(meta: RunMeta): void {
    fs.writeFileSync(this.metaPath, `${JSON.stringify(meta, null, 2)}\n`);
  }
}

export function normalizeError(err: unknown): { code: string; message: string } {
  if (err && typeof err === "object") {
    const code = "code" in err && typeof err.code === "string"
      ? err.code
      : "name" in err && typeof err.name === "string"
        ? err.name
        : "ERROR";
    const message = "message" in err && typeof err.message === "string" ? err.message : String(err);
    return { code, message };
  }
  return { code: "ERROR", message: String(err) };
}
