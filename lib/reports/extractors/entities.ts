import { extractCertificateHolderName } from "@/lib/reports/extractors/certificateName";
import { normalizeWhitespace, toLines } from "@/lib/reports/normalize/text";
import { noteIssue, type IssueSink } from "@/lib/reports/recovery";
import type { CanonicalRecord, Gender, StudentMetadata } from "@/lib/reports/types";
import { KNOWN_STATES, NAME_STOP_WORDS, STRUCTURED_NAME_STOP_WORDS, titleCase } from "@/lib/reports/vocabulary";

export type GenderMatch = Gender | "Prefer Not To Say";

type NameScan = { name: string | null; stoppedAt: string | null };

const CAPITALIZED = /[A-Z][a-zA-Z]+/g;
const OCR_NAME_CUE = /\b(?:Name|NAME|name)(?:\s*[:\-]\s*|\s+)([A-Z][a-zA-Z]+(?:\s+[A-Z][a-zA-Z]+)*)/;
const STRUCTURED_NAME_CUE = /\b(?:Student\s+Name|Name)\s*[:\-]?\s*(.+)/i;
const NAME_LABEL_CELL = /^(?:Student\s+)?Name\s*:?$/i;

/** Keep tokens up to (not including) the first stop word, number or slash token. */
function takeUntilStopWord(tokens: readonly string[], stopWords: ReadonlySet<string>): { kept: string[]; stoppedAt: string | null } {
  const kept: string[] = [];
  for (const token of tokens) {
    if (stopWords.has(token.toLowerCase()) || /^\d/.test(token) || token.includes("/")) {
      return { kept, stoppedAt: token };
    }
    kept.push(token);
  }
  return { kept, stoppedAt: null };
}

export function scanOcrName(text: string): NameScan {
  for (const raw of toLines(text)) {
    const m = OCR_NAME_CUE.exec(raw);
    if (!m?.[1]) continue;
    const { kept, stoppedAt } = takeUntilStopWord(m[1].split(/\s+/), NAME_STOP_WORDS);
    if (kept.length >= 1) return { name: kept.join(" "), stoppedAt };
  }
  return { name: null, stoppedAt: null };
}

/**
 * Name after a "Name" cue in OCR text, cut at the first metadata keyword,
 * subject or common word. "Name Mahbub English Hasan" -> "Mahbub".
 */
export function extractStudentNameFromOcr(text: string): string | null {
  return scanOcrName(text).name;
}

export function scanStructuredName(text: string): NameScan {
  const t = normalizeWhitespace(String(text || "").replace(/\s+/g, " "));
  if (!t) return { name: null, stoppedAt: null };

  const m = STRUCTURED_NAME_CUE.exec(t);
  const remainder = m?.[1] ?? t;
  const tokens = remainder.match(CAPITALIZED) ?? [];
  if (tokens.length < 2) return { name: null, stoppedAt: null };

  const { kept, stoppedAt } = takeUntilStopWord(tokens, STRUCTURED_NAME_STOP_WORDS);
  return kept.length >= 2 ? { name: kept.join(" "), stoppedAt } : { name: null, stoppedAt: null };
}

/** Structured text ("Name: Ahmad Daniel", "Student Name Ahmad Daniel"); needs two tokens. */
export function extractFullName(text: string): string | null {
  return scanStructuredName(text).name;
}

/** Validation only: two or more capitalized tokens that are not stop words. */
export function looksLikeName(text: string): boolean {
  const tokens = String(text || "").match(CAPITALIZED) ?? [];
  return tokens.filter((t) => !NAME_STOP_WORDS.has(t.toLowerCase())).length >= 2;
}

export function extractGender(text: string): GenderMatch | null {
  const m = /\b(Male|Female|Prefer not to say)\b/i.exec(String(text || ""));
  if (!m) return null;
  const value = titleCase(m[1]);
  if (value === "Male" || value === "Female" || value === "Prefer Not To Say") return value;
  return null;
}

/**
 * "State Selangor" -> "Selangor". Multi-word states are matched first; a bare
 * "Negeri" is the usual OCR truncation of "Negeri Sembilan".
 */
export function extractState(text: string): string | null {
  const t = String(text || "");
  const cue = /\b(?:State|STATE)\b\s*[:\-]?\s*/.exec(t);
  if (!cue) return null;
  const rest = t.slice(cue.index + cue[0].length);
  const restLower = rest.toLowerCase();

  for (const state of KNOWN_STATES) {
    if (!state.includes(" ")) continue;
    const key = state.toLowerCase();
    if (restLower.startsWith(key) && !/[a-z]/i.test(rest.charAt(key.length))) return state;
  }

  const word = /^[A-Za-z]+/.exec(rest)?.[0];
  if (!word) return null;
  if (word.toLowerCase() === "negeri") return "Negeri Sembilan";
  return /^[A-Z]/.test(word) ? word : null;
}

/**
 * Spreadsheets often carry the name as the header cell right after a
 * "Student Name" header: ['Student Name', 'Ahmad Daniel Bin Hassan', ...].
 */
export function extractNameFromColumns(headers: readonly string[]): string | null {
  for (let i = 0; i < headers.length - 1; i++) {
    if (!NAME_LABEL_CELL.test(String(headers[i] || "").trim())) continue;
    const candidate = String(headers[i + 1] || "").trim();
    const tokens = (candidate.match(CAPITALIZED) ?? []).filter((t) => !STRUCTURED_NAME_STOP_WORDS.has(t.toLowerCase()));
    if (tokens.length >= 2) return tokens.join(" ");
  }
  return null;
}

/** Free-form details on an OCR metadata line: Nationality, School Level, Form, Attendance. */
export function parseMetadataLine(line: string): Record<string, string> {
  const out: Record<string, string> = {};
  const t = normalizeWhitespace(line);

  const nationality = /Nationality[:\s]+([A-Za-z]+)/.exec(t);
  if (nationality) out.Nationality = nationality[1];

  const school = /School Level[:\s]+(.+)/.exec(t);
  if (school) {
    const value = school[1].split(/\s+(?:Form|State|Gender|Nationality)[:\s]/)[0].trim();
    if (value) out["School Level"] = value;
  }

  if (/\bForm\b/.test(t) && !/School/.test(t)) {
    const form = /Form[:\s]+(?:Form\s+)?(\d+)/.exec(t);
    if (form) out.Form = `Form ${form[1]}`;
  }

  const attendance = /Attendance(?:\s+Rate)?(?:\s*\(%\))?[:\s]+(\d{1,3}(?:\.\d+)?\s*%?)/i.exec(t);
  if (attendance) out.Attendance = attendance[1].replace(/\s+/g, "");

  return out;
}

export type MetadataSources = {
  records: readonly CanonicalRecord[];
  /** "text" records come from OCR/free text and use the looser one-token name rule. */
  origin: "text" | "table";
  /** Header cells as the loader read them (first sheet row), for the column-header strategy. */
  columnHeaders?: readonly string[];
  /** Label/value pairs the loader found above the data table. */
  explicit?: Record<string, string>;
  text?: string;
};

export function emptyMetadata(): StudentMetadata {
  return { Name: null, Gender: null, State: null, extra: {} };
}

class MetadataBuilder {
  readonly meta = emptyMetadata();

  constructor(private readonly sink?: IssueSink) {}

  name(scan: NameScan | string | null, scope: string) {
    if (this.meta.Name || !scan) return;
    if (typeof scan === "string") {
      this.meta.Name = scan;
      return;
    }
    if (!scan.name) return;
    this.meta.Name = scan.name;
    if (scan.stoppedAt) {
      noteIssue(this.sink, "AMBIGUOUS_BOUNDARY", scope, `name truncated at "${scan.stoppedAt}"`);
    }
  }

  gender(value: GenderMatch | null) {
    if (!value) return;
    if (value === "Male" || value === "Female") {
      if (!this.meta.Gender) this.meta.Gender = value;
    } else {
      this.extra("Gender", value);
    }
  }

  state(value: string | null) {
    if (value && !this.meta.State) this.meta.State = value;
  }

  extra(key: string, value: string) {
    const k = key.trim();
    const v = value.trim();
    if (!k || !v || k in this.meta.extra) return;
    this.meta.extra[k] = v;
  }
}

function explicitKeyKind(key: string): "name" | "gender" | "state" | null {
  const k = key.trim().toLowerCase();
  if (/\bname\b/.test(k)) return "name";
  if (k === "gender" || k === "sex") return "gender";
  if (k === "state") return "state";
  return null;
}

/**
 * Student metadata with per-field first-match-wins, across strategies in
 * priority order: column headers, loader label/value pairs, canonical rows,
 * then a scan of the raw text.
 */
export function resolveStudentMetadata(src: MetadataSources, sink?: IssueSink): StudentMetadata {
  const b = new MetadataBuilder(sink);

  if (src.columnHeaders) b.name(extractNameFromColumns(src.columnHeaders), "metadata.columns");

  for (const [key, value] of Object.entries(src.explicit ?? {})) {
    const kind = explicitKeyKind(key);
    if (kind === "name") b.name(normalizeWhitespace(value) || null, "metadata.explicit");
    else if (kind === "gender") b.gender(extractGender(value));
    else if (kind === "state") b.state(extractState(`State ${value}`) ?? (normalizeWhitespace(value) || null));
    else b.extra(key, value);
  }

  for (const rec of src.records) {
    const text = `${rec.Label} ${rec.Value ?? ""}`.trim();

    if (/name/i.test(rec.Label)) {
      if (src.origin === "text") {
        b.name(scanOcrName(text), "metadata.rows");
      } else {
        const scan = scanStructuredName(text);
        if (scan.name) b.name(scan, "metadata.rows");
        else if (rec.Value && looksLikeName(rec.Value)) b.name(normalizeWhitespace(rec.Value), "metadata.rows");
      }
    }

    b.gender(extractGender(text));
    b.state(extractState(text));

    if (rec.Section !== "Student Details") continue;
    if (rec.Value !== null) {
      if (!explicitKeyKind(rec.Label)) b.extra(rec.Label, rec.Value);
    } else {
      for (const [key, value] of Object.entries(parseMetadataLine(rec.Label))) b.extra(key, value);
    }
  }

  if (src.text) {
    b.name(scanOcrName(src.text), "metadata.text");
    b.name(extractCertificateHolderName(src.text), "metadata.text");
    b.gender(extractGender(src.text));
    b.state(extractState(src.text));
  }

  if (!b.meta.Name) noteIssue(sink, "NO_MATCH", "metadata", "no student name found");
  return b.meta;
}

export function hasMetadata(meta: StudentMetadata): boolean {
  return Boolean(meta.Name || meta.Gender || meta.State || Object.keys(meta.extra).length);
}
