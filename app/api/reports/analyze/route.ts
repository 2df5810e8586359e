import { v4 as uuid } from "uuid";

import { apiError, apiOk, makeRequestId } from "@/lib/api/errors";
import { appendOpsEvent } from "@/lib/ops/eventLog";
import { readReportConfig } from "@/lib/reports/config";
import { analyzeReport } from "@/lib/reports";
import { loadReportFile, UnsupportedReportFileError } from "@/lib/reports/ingest/spreadsheet";
import { parseReportRequest } from "@/lib/reports/request";
import type { ReportInput } from "@/lib/reports/types";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

const ROUTE = "/api/reports/analyze";

type Rejection = { status: number; code: string; userMessage: string; details?: unknown };

function isMultipart(req: Request) {
  return String(req.headers.get("content-type") || "").toLowerCase().includes("multipart/form-data");
}

async function readMultipart(req: Request, maxBytes: number): Promise<ReportInput | Rejection> {
  const formData = await req.formData();
  const file = formData.get("file");
  if (!(file instanceof File)) {
    return { status: 400, code: "REPORT_MISSING_FILE", userMessage: "No file was provided." };
  }
  if (file.size > maxBytes) {
    return {
      status: 413,
      code: "REPORT_FILE_TOO_LARGE",
      userMessage: "File is too large.",
      details: { size: file.size, maxBytes },
    };
  }
  const data = Buffer.from(await file.arrayBuffer());
  try {
    return loadReportFile({ filename: file.name, data });
  } catch (e) {
    if (e instanceof UnsupportedReportFileError) {
      return {
        status: 415,
        code: "REPORT_UNSUPPORTED_FILE",
        userMessage: "Only .xlsx, .xls, .csv and .txt files are supported.",
        details: { filename: e.filename },
      };
    }
    throw e;
  }
}

async function readJson(req: Request, maxBytes: number): Promise<ReportInput | Rejection> {
  const raw = await req.text();
  if (Buffer.byteLength(raw, "utf8") > maxBytes) {
    return { status: 413, code: "REPORT_BODY_TOO_LARGE", userMessage: "Request body is too large." };
  }
  let body: unknown;
  try {
    body = JSON.parse(raw);
  } catch {
    return { status: 400, code: "REPORT_INVALID_JSON", userMessage: "Request body is not valid JSON." };
  }
  const parsed = parseReportRequest(body);
  if (!parsed.ok) return { status: 400, code: `REPORT_${parsed.code}`, userMessage: parsed.message };
  return parsed.input;
}

function isRejection(v: ReportInput | Rejection): v is Rejection {
  return "status" in v;
}

export async function POST(req: Request) {
  const requestId = makeRequestId();
  const config = readReportConfig();
  try {
    const input = isMultipart(req)
      ? await readMultipart(req, config.maxUploadBytes)
      : await readJson(req, config.maxUploadBytes);

    if (isRejection(input)) {
      appendOpsEvent({ type: "REPORT_REJECTED", route: ROUTE, status: input.status, details: { requestId, code: input.code } });
      return apiError({ ...input, route: ROUTE, requestId });
    }

    const analysisId = uuid();
    const bundle = analyzeReport(input, { config });

    appendOpsEvent({
      type: "REPORT_ANALYZED",
      route: ROUTE,
      status: 200,
      details: {
        requestId,
        analysisId,
        kind: input.kind,
        records: bundle.records.length,
        issues: bundle.issues.length,
        hasExtractableData: bundle.hasExtractableData,
      },
    });

    return apiOk({ analysisId, ...bundle }, requestId);
  } catch (e) {
    return apiError({
      status: 500,
      code: "REPORT_ANALYZE_FAILED",
      userMessage: "Report analysis failed.",
      route: ROUTE,
      requestId,
      cause: e,
    });
  }
}
