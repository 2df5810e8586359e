import { normalizeOcrText, repairPdfText, toLines } from "@/lib/reports/normalize/text";
import { parseScoreLine, parseTrailingInteger } from "@/lib/reports/parsers/scoreLine";
import { noteIssue, type IssueSink } from "@/lib/reports/recovery";
import { cellText, coerceMark, findColumn, isBlankCell, tableToLines } from "@/lib/reports/table";
import type { CanonicalRecord, DataTable, TextSource } from "@/lib/reports/types";
import {
  CO_CURRICULAR_KEYWORDS,
  METADATA_LINE_PREFIXES,
  RATING_ALTERNATION,
  SECTION_HEADER_ALIASES,
  compactLetters,
  containsKeyword,
  type SectionHeaderAlias,
} from "@/lib/reports/vocabulary";

type HeaderSection = SectionHeaderAlias["section"];

const RATING_LINE_RE = new RegExp(
  `^(?<label>[^A-Za-z]*[A-Za-z].*?)\\s*(?:[:\\-]\\s*|\\s+)(?<rating>${RATING_ALTERNATION})\\.?$`,
  "i"
);
const RATING_TOKEN_RE = new RegExp(`\\b(?:${RATING_ALTERNATION})\\b`, "i");

function record(
  Section: string,
  Label: string,
  Score: number | null = null,
  Maximum: number | null = null,
  Value: string | null = null
): CanonicalRecord {
  return { Section, Label, Score, Maximum, Value, Notes: null };
}

/**
 * Header lines look like "Subjects", "Behaviour Ratings", "CO - CURRICULAR".
 * Spacing and punctuation are ignored; at most two words may trail the alias,
 * none of them a rating, so that data lines such as "Ratings: Good" stay data.
 */
export function resolveSectionHeader(line: string): HeaderSection | null {
  const text = String(line || "").trim();
  if (!text || /\d/.test(text)) return null;
  const compact = compactLetters(text);

  for (const { section, compact: alias } of SECTION_HEADER_ALIASES) {
    if (!compact.startsWith(alias)) continue;

    let consumed = 0;
    let idx = 0;
    while (idx < text.length && consumed < alias.length) {
      if (/[A-Za-z]/.test(text[idx])) consumed++;
      idx++;
    }
    const rest = text.slice(idx);
    if (/^[A-Za-z]/.test(rest) || RATING_TOKEN_RE.test(rest)) continue;
    const trailingWords = rest.match(/[A-Za-z]+/g) ?? [];
    if (trailingWords.length <= 2) return section;
  }
  return null;
}

/** Returns the metadata prefix ("name", "gender", ...) the line starts with. */
export function matchMetadataPrefix(line: string): string | null {
  const low = String(line || "").trim().toLowerCase();
  for (const prefix of METADATA_LINE_PREFIXES) {
    if (!low.startsWith(prefix)) continue;
    const next = low.charAt(prefix.length);
    if (!next || !/[a-z]/.test(next)) return prefix;
  }
  return null;
}

export function splitRatingLine(line: string): { label: string; rating: string } | null {
  const m = RATING_LINE_RE.exec(String(line || "").trim());
  const label = m?.groups?.label?.trim();
  const rating = m?.groups?.rating?.trim();
  if (!label || !rating) return null;
  return { label, rating };
}

function scoreSection(current: HeaderSection | null): string {
  return current === "Behaviour" ? "Behaviour" : "Subjects";
}

/**
 * Single forward pass over text lines. The section cursor moves only on header
 * lines; every other line becomes exactly one record (or two lines become one
 * when a label and its score were split across lines).
 */
export function classifyLines(lines: readonly string[]): CanonicalRecord[] {
  const out: CanonicalRecord[] = [];
  let current: HeaderSection | null = null;

  for (let i = 0; i < lines.length; i++) {
    const line = String(lines[i] ?? "").trim();
    if (!line) continue;

    const header = resolveSectionHeader(line);
    if (header) {
      current = header;
      continue;
    }

    if (matchMetadataPrefix(line)) {
      out.push(record("Student Details", line));
      continue;
    }

    const scored = parseScoreLine(line);
    if (scored) {
      out.push(record(scoreSection(current), scored.label ?? line, scored.score, scored.maximum));
      continue;
    }

    if (current === "Behaviour") {
      const rated = splitRatingLine(line);
      if (rated) {
        out.push(record("Behaviour", rated.label, null, null, rated.rating));
        continue;
      }
    }

    // OCR often puts a label and its score on adjacent lines.
    const next = String(lines[i + 1] ?? "").trim();
    if (next && !resolveSectionHeader(next) && !matchMetadataPrefix(next) && !parseScoreLine(next)) {
      const joined = parseScoreLine(`${line} ${next}`);
      if (joined) {
        out.push(record(scoreSection(current), joined.label ?? line, joined.score, joined.maximum));
        i++;
        continue;
      }
    }

    const trailing = parseTrailingInteger(line);
    if (trailing) {
      out.push(record(scoreSection(current), trailing.label, trailing.score));
      continue;
    }

    const fallbackSection = current ?? (containsKeyword(line, CO_CURRICULAR_KEYWORDS) ? "Co-curricular" : "Misc");
    out.push(record(fallbackSection, line));
  }

  return out;
}

function canonicalSectionName(raw: string): string {
  const text = raw.trim();
  if (!text) return "Misc";
  return resolveSectionHeader(text) ?? text;
}

/**
 * Tables that already carry Section and Label columns skip the classifier:
 * rows pass through with Score/Maximum coerced to numbers (or null).
 */
export function normalizeStructuredTable(table: DataTable, sink?: IssueSink): CanonicalRecord[] | null {
  const sectionCol = findColumn(table.columns, "Section");
  const labelCol = findColumn(table.columns, "Label");
  if (!sectionCol || !labelCol) return null;

  const scoreCol = findColumn(table.columns, "Score");
  const maxCol = findColumn(table.columns, "Maximum");
  const valueCol = findColumn(table.columns, "Value");
  const notesCol = findColumn(table.columns, "Notes");

  const out: CanonicalRecord[] = [];
  table.rows.forEach((row, idx) => {
    if (isBlankCell(row[sectionCol]) && isBlankCell(row[labelCol])) return;

    const mark = (col: string | undefined, field: "Score" | "Maximum") => {
      if (!col || isBlankCell(row[col])) return null;
      const n = coerceMark(row[col]);
      if (n === null) {
        noteIssue(sink, "TYPE_COERCION", "normalize", `${field} "${cellText(row[col])}" in row ${idx + 1} is not a usable number`);
      }
      return n;
    };
    const text = (col: string | undefined) => (col && !isBlankCell(row[col]) ? cellText(row[col]) : null);

    out.push({
      Section: canonicalSectionName(cellText(row[sectionCol])),
      Label: cellText(row[labelCol]),
      Score: mark(scoreCol, "Score"),
      Maximum: mark(maxCol, "Maximum"),
      Value: text(valueCol),
      Notes: text(notesCol),
    });
  });
  return out;
}

export function normalizeTable(table: DataTable, sink?: IssueSink): CanonicalRecord[] {
  return normalizeStructuredTable(table, sink) ?? classifyLines(tableToLines(table));
}

/** Parallel table columns flattened by OCR come through joined with "|". */
function splitColumns(lines: readonly string[]): string[] {
  return lines.flatMap((line) =>
    line.includes("|")
      ? line
          .split("|")
          .map((part) => part.trim())
          .filter(Boolean)
      : [line]
  );
}

export function prepareTextLines(text: string, source: TextSource = "ocr"): string[] {
  const base = source === "pdf" ? repairPdfText(String(text || "")) : String(text || "");
  return splitColumns(toLines(normalizeOcrText(base)));
}

export function normalizeText(text: string, source: TextSource = "ocr"): CanonicalRecord[] {
  return classifyLines(prepareTextLines(text, source));
}
