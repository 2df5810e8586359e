import { CANONICAL_COLUMNS, type CanonicalRecord, type Cell, type DataTable, type TableRow } from "@/lib/reports/types";

const NUMERIC_TEXT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;

export function toCell(v: unknown): Cell {
  if (v === null || v === undefined) return null;
  if (typeof v === "number") return Number.isFinite(v) ? v : null;
  if (typeof v === "string" || typeof v === "boolean") return v;
  if (v instanceof Date) return Number.isNaN(v.getTime()) ? null : v.toISOString();
  return String(v);
}

export function cellText(c: Cell | undefined): string {
  if (c === null || c === undefined) return "";
  return String(c).trim();
}

export function isBlankCell(c: Cell | undefined): boolean {
  const s = cellText(c);
  return !s || s.toLowerCase() === "nan";
}

/** Loose numeric read: finite numbers and numeric strings; anything else is null. */
export function toNumber(c: Cell | undefined): number | null {
  if (typeof c === "number") return Number.isFinite(c) ? c : null;
  if (typeof c !== "string") return null;
  const s = c.trim();
  if (!NUMERIC_TEXT.test(s)) return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

/** Score/Maximum coercion: non-numeric or negative values become null. */
export function coerceMark(c: Cell | undefined): number | null {
  const n = toNumber(c);
  return n !== null && n >= 0 ? n : null;
}

export function findColumn(columns: readonly string[], name: string): string | undefined {
  const want = name.trim().toLowerCase();
  return columns.find((c) => String(c).trim().toLowerCase() === want);
}

export function inferNumericColumns(table: DataTable): string[] {
  if (table.numericColumns) return table.numericColumns.filter((c) => table.columns.includes(c));
  return table.columns.filter((col) => {
    let seen = 0;
    for (const row of table.rows) {
      const v = row[col];
      if (isBlankCell(v)) continue;
      if (typeof v !== "number" || !Number.isFinite(v)) return false;
      seen++;
    }
    return seen > 0;
  });
}

/** Lines for the classifier: one column → its cells; several → non-empty cells joined. */
export function tableToLines(table: DataTable): string[] {
  const lines: string[] = [];
  for (const row of table.rows) {
    const values = table.columns.map((c) => row[c]).filter((v) => !isBlankCell(v)).map(cellText);
    if (values.length) lines.push(values.join(" "));
  }
  return lines;
}

export function recordsToTable(records: readonly CanonicalRecord[]): DataTable {
  const rows: TableRow[] = records.map((r) => ({
    Section: r.Section,
    Label: r.Label,
    Score: r.Score,
    Maximum: r.Maximum,
    Value: r.Value,
    Notes: r.Notes,
  }));
  return { columns: [...CANONICAL_COLUMNS], rows, numericColumns: ["Score", "Maximum"] };
}

export function recordCells(record: CanonicalRecord): Cell[] {
  return CANONICAL_COLUMNS.map((c) => record[c]);
}
