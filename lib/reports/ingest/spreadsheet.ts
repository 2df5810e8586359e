import * as XLSX from "xlsx";

import { readReportConfig } from "@/lib/reports/config";
import { cellText, isBlankCell, toCell } from "@/lib/reports/table";
import type { Cell, DataTable, ReportInput, TableRow } from "@/lib/reports/types";

const TABLE_KEYWORDS = ["label", "score", "subject", "mark", "grade", "result"];
const CONFIRM_KEYWORDS = ["maximum", "total", "percentage", "notes"];
const SPREADSHEET_EXT = new Set(["xlsx", "xls", "csv"]);

export class UnsupportedReportFileError extends Error {
  constructor(readonly filename: string) {
    super(`Unsupported file type: ${filename}`);
    this.name = "UnsupportedReportFileError";
  }
}

export type ReportFile = {
  filename: string;
  data: Buffer | Uint8Array;
};

type Grid = Cell[][];

function extOf(filename: string) {
  const m = /\.([a-z0-9]+)$/i.exec(String(filename || "").trim());
  return m ? m[1].toLowerCase() : "";
}

function rowText(row: readonly Cell[]) {
  return row
    .filter((c) => !isBlankCell(c))
    .map(cellText)
    .join(" ")
    .toLowerCase();
}

export function readGrid(data: Buffer | Uint8Array): Grid {
  const wb = XLSX.read(Buffer.from(data), { type: "buffer" });
  const first = wb.SheetNames[0];
  const ws = first ? wb.Sheets[first] : undefined;
  if (!ws) return [];
  const raw = XLSX.utils.sheet_to_json<unknown[]>(ws, { header: 1, defval: null, blankrows: false });
  return raw.map((row) => (Array.isArray(row) ? row.map(toCell) : []));
}

/**
 * Index of the data table's header row: the first of the leading rows naming
 * a table column ("label", "subject", ...) together with a confirming one
 * ("maximum", "total", ...). Null when none qualifies.
 */
export function detectHeaderRow(grid: Grid, scanRows = readReportConfig().headerScanRows): number | null {
  const limit = Math.min(scanRows, grid.length);
  for (let i = 0; i < limit; i++) {
    const text = rowText(grid[i]);
    if (!text) continue;
    if (TABLE_KEYWORDS.some((k) => text.includes(k)) && CONFIRM_KEYWORDS.some((k) => text.includes(k))) return i;
  }
  return null;
}

/** "Student Name: | Ahmad Daniel" rows above the table -> { "Student Name": "Ahmad Daniel" }. */
export function extractLeadingMetadata(grid: Grid, headerRow: number): Record<string, string> {
  const out: Record<string, string> = {};
  for (const row of grid.slice(0, headerRow)) {
    if (isBlankCell(row[0]) || isBlankCell(row[1])) continue;
    const label = cellText(row[0]).replace(/:+$/, "").trim();
    const value = cellText(row[1]);
    if (label && value && value !== label) out[label] = value;
  }
  return out;
}

export function buildTable(grid: Grid, headerRow: number): DataTable {
  const header = grid[headerRow] ?? [];
  const width = grid.slice(headerRow).reduce((w, row) => Math.max(w, row.length), 0);

  const seen = new Map<string, number>();
  const columns: string[] = [];
  for (let i = 0; i < width; i++) {
    const base = isBlankCell(header[i]) ? `Column ${i + 1}` : cellText(header[i]);
    const n = seen.get(base) ?? 0;
    seen.set(base, n + 1);
    columns.push(n ? `${base}.${n}` : base);
  }

  const rows: TableRow[] = [];
  for (const line of grid.slice(headerRow + 1)) {
    if (line.every((c) => isBlankCell(c))) continue;
    const row: TableRow = {};
    columns.forEach((col, i) => {
      row[col] = line[i] ?? null;
    });
    rows.push(row);
  }
  return { columns, rows };
}

/**
 * Turn an upload into analyzer input. Spreadsheets and CSV become a table
 * (header row detected, leading label/value rows kept as metadata); .txt is
 * passed through as plain text.
 */
export function loadReportFile(file: ReportFile): ReportInput {
  const ext = extOf(file.filename);

  if (ext === "txt") {
    return { kind: "text", text: Buffer.from(file.data).toString("utf8"), source: "plain" };
  }
  if (!SPREADSHEET_EXT.has(ext)) throw new UnsupportedReportFileError(file.filename);

  const grid = readGrid(file.data);
  const headerRow = detectHeaderRow(grid);
  const start = headerRow ?? 0;

  return {
    kind: "table",
    table: buildTable(grid, start),
    metadata: headerRow === null ? {} : extractLeadingMetadata(grid, headerRow),
    columnHeaders: (grid[0] ?? []).map(cellText),
  };
}
