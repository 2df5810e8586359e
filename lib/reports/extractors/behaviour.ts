import type { BehaviourTraitMap, CanonicalRating, CanonicalRecord } from "@/lib/reports/types";
import {
  CANONICAL_RATINGS,
  RATING_ALTERNATION,
  RATING_VARIANTS,
  titleCase,
} from "@/lib/reports/vocabulary";

const MAX_ATTRIBUTE_WORDS = 5;
const MAX_ATTRIBUTE_LENGTH = 60;

// Common OCR confusions, applied before the second lookup.
const OCR_REPAIRS: ReadonlyArray<[RegExp, string]> = [
  [/0/g, "o"],
  [/1/g, "l"],
  [/5/g, "s"],
  [/@/g, "a"],
  [/4/g, "a"],
  [/\$/g, "s"],
];

function lookupRating(t: string): CanonicalRating | null {
  const canonical = CANONICAL_RATINGS.find((r) => r.toLowerCase() === t);
  return canonical ?? RATING_VARIANTS.get(t) ?? null;
}

/**
 * "Good", "g00d", "verygood", "Unsatisfactory" -> canonical rating, or null.
 * Canonical ratings map to themselves.
 */
export function normalizeRating(token: string): CanonicalRating | null {
  const t = String(token || "")
    .trim()
    .toLowerCase()
    .replace(/\s+/g, " ");
  if (!t) return null;

  const direct = lookupRating(t);
  if (direct) return direct;

  const repaired = OCR_REPAIRS.reduce((acc, [re, to]) => acc.replace(re, to), t);
  const fixed = lookupRating(repaired);
  if (fixed) return fixed;

  return CANONICAL_RATINGS.find((r) => repaired.includes(r.toLowerCase())) ?? null;
}

export function cleanAttribute(raw: string): string {
  const cleaned = String(raw || "")
    .replace(/[^\w\s\-/&']/g, " ")
    .replace(/\s+/g, " ")
    .trim();
  return titleCase(cleaned);
}

const RATING_WORD = `(?:${RATING_ALTERNATION})\\b`;
const ATTRIBUTE_WORD = `\\b[A-Za-z][A-Za-z'&\\-/]{0,20}`;

// 1-5 whole attribute words directly before a rating, on one line. Only the
// last word may not be a rating itself ("Fair Play Good", "Punctuality Very Good").
const STRICT_RE = new RegExp(
  `(?<attr>(?:${ATTRIBUTE_WORD}[ \\t]+){0,${MAX_ATTRIBUTE_WORDS - 1}}(?!${RATING_WORD})${ATTRIBUTE_WORD})` +
    `[ \\t]*(?:[:\\-–—][ \\t]*|[ \\t]+)` +
    `(?<rating>\\b${RATING_WORD})`,
  "gi"
);
const RATING_TOKEN_RE = new RegExp(`\\b${RATING_WORD}`, "gi");
const WORD_RE = /[A-Za-z'&\-/]{1,30}/g;

function strictPairs(text: string): Map<string, CanonicalRating> {
  const out = new Map<string, CanonicalRating>();
  for (const line of text.split("\n")) {
    for (const m of line.matchAll(STRICT_RE)) {
      const rating = normalizeRating(m.groups?.rating ?? "");
      const attr = cleanAttribute(m.groups?.attr ?? "");
      if (rating && attr) out.set(attr, rating);
    }
  }
  return out;
}

/** Walk back from each rating token, collecting up to five preceding words. */
function fallbackPairs(text: string): Map<string, CanonicalRating> {
  const out = new Map<string, CanonicalRating>();
  const words = Array.from(text.matchAll(WORD_RE), (m) => ({
    token: m[0],
    end: (m.index ?? 0) + m[0].length,
  }));

  for (const rm of text.matchAll(RATING_TOKEN_RE)) {
    const rating = normalizeRating(rm[0]);
    if (!rating) continue;
    const start = rm.index ?? 0;

    let idx = -1;
    for (let i = 0; i < words.length && words[i].end <= start; i++) idx = i;
    if (idx < 0) continue;

    const tokens: string[] = [];
    for (let i = idx; i >= 0 && tokens.length < MAX_ATTRIBUTE_WORDS; i--) {
      const token = words[i].token;
      if (/[\d/]/.test(token)) continue;
      if (token.length === 1 && !/[A-Za-z]/.test(token)) continue;
      tokens.unshift(token);
    }
    const attr = cleanAttribute(tokens.join(" "));
    if (attr) out.set(attr, rating);
  }
  return out;
}

function finalize(pairs: Map<string, CanonicalRating>): BehaviourTraitMap {
  const out: BehaviourTraitMap = {};
  for (const [attr, rating] of pairs) {
    if (/\d/.test(attr) || attr.length > MAX_ATTRIBUTE_LENGTH) continue;
    out[attr] = rating;
  }
  return out;
}

/**
 * Attribute -> rating pairs from OCR text. Table-flattened lines keep only the
 * part left of the first "|", where the behaviour column usually sits.
 */
export function extractBehaviourFromText(text: string): BehaviourTraitMap {
  if (!text) return {};
  const cleaned = text
    .replace(/\r/g, "\n")
    .split("\n")
    .map((line) => (line.includes("|") ? line.split("|")[0] : line).trim())
    .filter(Boolean)
    .join("\n");

  const strict = strictPairs(cleaned);
  return finalize(strict.size ? strict : fallbackPairs(cleaned));
}

export function extractBehaviourFromRecords(records: readonly CanonicalRecord[]): BehaviourTraitMap {
  const pairs = new Map<string, CanonicalRating>();
  for (const rec of records) {
    if (!/behaviou?r/i.test(rec.Section)) continue;
    const value = String(rec.Value ?? "").trim();
    if (!rec.Label.trim() || !value || value.toLowerCase() === "nan") continue;
    const rating = normalizeRating(value);
    const attr = cleanAttribute(rec.Label);
    if (rating && attr) pairs.set(attr, rating);
  }
  return finalize(pairs);
}

/** Structured rows win; the text is only scanned when they yield nothing. */
export function extractBehaviour(src: { records?: readonly CanonicalRecord[]; text?: string }): BehaviourTraitMap {
  const structured = extractBehaviourFromRecords(src.records ?? []);
  if (Object.keys(structured).length || !src.text) return structured;
  return extractBehaviourFromText(src.text);
}

export function groupTraitsByRating(traits: BehaviourTraitMap): Partial<Record<CanonicalRating, string[]>> {
  const grouped: Partial<Record<CanonicalRating, string[]>> = {};
  for (const [attr, rating] of Object.entries(traits)) {
    const bucket = grouped[rating] ?? [];
    bucket.push(attr);
    grouped[rating] = bucket;
  }
  return grouped;
}
