import path from "node:path";
import { fileURLToPath } from "node:url";
import dotenv from "dotenv";

dotenv.config();

export type AppConfig = {
  repoRoot: string;
  agentRoot: string;
  defaultExportDir: string;
  activityLogFile: string;
  formTypeKeywords: string[];
  fallbackFormName: string;
  timeZone: string;
  logStepsOnly: boolean;
};

export const DEFAULT_TIME_ZONE = "America/New_York";
export const DEFAULT_FORM_NAME = "unknown_form_type";

export function cfgFromEnv(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const repoRoot = resolveRepoRoot();
  const agentRoot = path.join(repoRoot, "tools", "intake-sync-agent");

  return {
    repoRoot,
    agentRoot,
    defaultExportDir: env.INTAKE_EXPORT_DIR || "data/csv_exports",
    activityLogFile: env.INTAKE_ACTIVITY_LOG || "data/appointment_log.csv",
    formTypeKeywords: parseList(env.INTAKE_FORM_KEYWORDS),
    fallbackFormName: env.INTAKE_FALLBACK_FORM_NAME || DEFAULT_FORM_NAME,
    timeZone: env.INTAKE_TIME_ZONE || DEFAULT_TIME_ZONE,
    logStepsOnly: (env.INTAKE_LOG_STEPS_ONLY || "false").toLowerCase() === "true"
  };
}

export function parseList(raw: string | undefined): string[] {
  if (!raw) {
    return [];
  }
  return raw
    .split(",")
    .map((value) => value.trim().toLowerCase())
    .filter(Boolean);
}

export function resolveRepoRoot(): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(here, "..", "..", "..", "..", "..");
}

export function resolvePath(repoRoot: string, maybeRelative: string): string {
  if (path.isAbsolute(maybeRelative)) {
    return maybeRelative;
  }
  return path.resolve(repoRoot, maybeRelative);
}
