import path from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type ReportConfig = {
  rankingLimit: number;
  headerScanRows: number;
  maxUploadBytes: number;
  logLevel: LogLevel;
  /** JSONL ops trail; null disables file writes. */
  opsEventsLogPath: string | null;
};

type Env = Record<string, string | undefined>;

function clamp(n: number, lo: number, hi: number) {
  return Math.max(lo, Math.min(hi, n));
}

function envInt(env: Env, name: string, fallback: number, min: number, max: number): number {
  const raw = String(env[name] ?? "").trim();
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n)) return fallback;
  return clamp(Math.round(n), min, max);
}

function normalizeLogLevel(v: unknown): LogLevel {
  const x = String(v || "").trim().toLowerCase();
  if (x === "debug" || x === "warn" || x === "error" || x === "silent") return x;
  return "info";
}

function resolveOpsLogPath(env: Env): string | null {
  const raw = String(env.OPS_EVENTS_LOG_PATH ?? "").trim();
  if (raw.toLowerCase() === "off") return null;
  if (String(env.NODE_ENV || "") === "test" && !raw) return null;
  const target = raw || ".ops-events.jsonl";
  return path.isAbsolute(target) ? target : path.join(process.cwd(), target);
}

export function readReportConfig(env: Env = process.env): ReportConfig {
  return {
    rankingLimit: envInt(env, "REPORT_RANKING_LIMIT", 5, 1, 50),
    headerScanRows: envInt(env, "REPORT_HEADER_SCAN_ROWS", 15, 1, 100),
    maxUploadBytes: envInt(env, "REPORT_MAX_UPLOAD_BYTES", 10 * 1024 * 1024, 1024, 50 * 1024 * 1024),
    logLevel: normalizeLogLevel(env.REPORT_LOG_LEVEL),
    opsEventsLogPath: resolveOpsLogPath(env),
  };
}
