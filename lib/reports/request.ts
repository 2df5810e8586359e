import { toCell } from "@/lib/reports/table";
import type { DataTable, ReportInput, TableRow, TextSource } from "@/lib/reports/types";

export type ParsedReportRequest =
  | { ok: true; input: ReportInput }
  | { ok: false; code: string; message: string };

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function fail(code: string, message: string): ParsedReportRequest {
  return { ok: false, code, message };
}

function asSource(v: unknown): TextSource | null {
  if (v === undefined || v === null || v === "") return "ocr";
  const s = String(v).trim().toLowerCase();
  return s === "ocr" || s === "pdf" || s === "plain" ? s : null;
}

function asStringMap(v: unknown): Record<string, string> | null {
  if (v === undefined || v === null) return {};
  if (!isRecord(v)) return null;
  const out: Record<string, string> = {};
  for (const [k, val] of Object.entries(v)) {
    if (val === null || val === undefined) continue;
    out[k] = String(val);
  }
  return out;
}

/** Rows may be objects keyed by column, or arrays read against `columns`. */
function asTable(rowsRaw: unknown[], columnsRaw: unknown): DataTable | null {
  const declared = Array.isArray(columnsRaw) ? columnsRaw.map((c) => String(c ?? "").trim()) : null;
  const columns: string[] = declared ? [...declared] : [];
  const rows: TableRow[] = [];

  for (const raw of rowsRaw) {
    const row: TableRow = {};
    if (Array.isArray(raw)) {
      if (!declared) return null;
      declared.forEach((col, i) => {
        row[col] = toCell(raw[i]);
      });
    } else if (isRecord(raw)) {
      for (const [k, v] of Object.entries(raw)) {
        if (!declared && !columns.includes(k)) columns.push(k);
        row[k] = toCell(v);
      }
    } else {
      return null;
    }
    rows.push(row);
  }
  return { columns, rows };
}

/**
 * Validate a JSON body: `{ text, source? }` or `{ rows, columns?, metadata? }`.
 */
export function parseReportRequest(body: unknown): ParsedReportRequest {
  if (!isRecord(body)) return fail("INVALID_BODY", "Request body must be a JSON object.");

  if (typeof body.text === "string") {
    if (!body.text.trim()) return fail("EMPTY_TEXT", "text must not be empty.");
    const source = asSource(body.source);
    if (!source) return fail("INVALID_SOURCE", "source must be one of ocr, pdf, plain.");
    return { ok: true, input: { kind: "text", text: body.text, source } };
  }

  if (Array.isArray(body.rows)) {
    const table = asTable(body.rows, body.columns);
    if (!table) return fail("INVALID_ROWS", "rows must be objects, or arrays together with columns.");
    const metadata = asStringMap(body.metadata);
    if (!metadata) return fail("INVALID_METADATA", "metadata must be an object of label/value pairs.");
    return { ok: true, input: { kind: "table", table, metadata } };
  }

  return fail("MISSING_INPUT", "Provide text or rows.");
}
