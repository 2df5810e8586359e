import path from "node:path";
import { describe, expect, it } from "vitest";

import { readReportConfig } from "@/lib/reports/config";

describe("readReportConfig", () => {
  it("uses defaults", () => {
    expect(readReportConfig({})).toEqual({
      rankingLimit: 5,
      headerScanRows: 15,
      maxUploadBytes: 10 * 1024 * 1024,
      logLevel: "info",
      opsEventsLogPath: path.join(process.cwd(), ".ops-events.jsonl"),
    });
  });

  it("clamps numeric settings", () => {
    const config = readReportConfig({
      REPORT_RANKING_LIMIT: "500",
      REPORT_HEADER_SCAN_ROWS: "0",
      REPORT_MAX_UPLOAD_BYTES: "abc",
    });
    expect(config.rankingLimit).toBe(50);
    expect(config.headerScanRows).toBe(1);
    expect(config.maxUploadBytes).toBe(10 * 1024 * 1024);
  });

  it("normalizes the log level", () => {
    expect(readReportConfig({ REPORT_LOG_LEVEL: "SILENT" }).logLevel).toBe("silent");
    expect(readReportConfig({ REPORT_LOG_LEVEL: "verbose" }).logLevel).toBe("info");
  });

  it("disables the ops trail when off or under test", () => {
    expect(readReportConfig({ OPS_EVENTS_LOG_PATH: "off" }).opsEventsLogPath).toBeNull();
    expect(readReportConfig({ NODE_ENV: "test" }).opsEventsLogPath).toBeNull();
    expect(readReportConfig({ NODE_ENV: "test", OPS_EVENTS_LOG_PATH: "/tmp/ops.jsonl" }).opsEventsLogPath).toBe(
      "/tmp/ops.jsonl"
    );
  });
});
