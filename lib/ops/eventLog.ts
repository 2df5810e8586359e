import { promises as fs } from "node:fs";

import { readReportConfig, type LogLevel } from "@/lib/reports/config";

type OpsEvent = {
  ts?: string;
  type: string;
  route?: string;
  status?: number | null;
  details?: Record<string, unknown>;
};

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export function appendOpsEvent(event: OpsEvent) {
  const target = readReportConfig().opsEventsLogPath;
  if (!target) return;
  const payload = {
    ts: event.ts || new Date().toISOString(),
    type: String(event.type || "UNKNOWN"),
    route: event.route || null,
    status: Number.isFinite(Number(event.status)) ? Number(event.status) : null,
    details: event.details || {},
  };
  // Non-blocking telemetry write; failures are intentionally ignored.
  void fs.appendFile(target, `${JSON.stringify(payload)}\n`, "utf8").catch(() => null);
}

export type OpsLogger = {
  debug(message: string, details?: Record<string, unknown>): void;
  info(message: string, details?: Record<string, unknown>): void;
  warn(message: string, details?: Record<string, unknown>): void;
  error(message: string, details?: Record<string, unknown>): void;
};

function write(level: Exclude<LogLevel, "silent">, scope: string, message: string, details?: Record<string, unknown>) {
  const threshold = readReportConfig().logLevel;
  if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;
  const line = JSON.stringify({ level, ts: new Date().toISOString(), scope, message, ...(details || {}) });
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
}

/** Single-line JSON logger tagged with a scope, e.g. "reports.behaviour". */
export function createOpsLogger(scope: string): OpsLogger {
  return {
    debug: (message, details) => write("debug", scope, message, details),
    info: (message, details) => write("info", scope, message, details),
    warn: (message, details) => write("warn", scope, message, details),
    error: (message, details) => write("error", scope, message, details),
  };
}
