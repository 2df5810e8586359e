import vocabulary from "@/lib/reports/data/vocabulary.json";

import type { CanonicalRating, SectionTag } from "@/lib/reports/types";

// Read-only lookup tables shared by every extractor. Built once at module load.

function lowerSet(words: readonly string[]): ReadonlySet<string> {
  return new Set(words.map((w) => w.trim().toLowerCase()).filter(Boolean));
}

export const CANONICAL_RATINGS: readonly CanonicalRating[] = Object.freeze([
  "Excellent",
  "Very Good",
  "Good",
  "Fair",
  "Poor",
  "Bad",
]);

export function isCanonicalRating(value: string): value is CanonicalRating {
  return CANONICAL_RATINGS.some((r) => r === value);
}

export const KNOWN_SUBJECTS: readonly string[] = Object.freeze(
  vocabulary.knownSubjects.map((s) => s.toLowerCase())
);
export const KNOWN_SUBJECT_SET = lowerSet(KNOWN_SUBJECTS);
export const METADATA_KEYWORDS = lowerSet(vocabulary.metadataKeywords);
export const COMMON_WORDS = lowerSet(vocabulary.commonWords);
export const CO_CURRICULAR_KEYWORDS = lowerSet(vocabulary.coCurricularKeywords);
export const TWO_WORD_SUBJECTS: readonly string[] = Object.freeze(
  vocabulary.twoWordSubjects.map((s) => s.toLowerCase())
);
export const RANKING_SKIP_WORDS = lowerSet(vocabulary.rankingSkipWords);
export const KNOWN_STATES: readonly string[] = Object.freeze([...vocabulary.states]);
export const CERTIFICATE_PHRASES: readonly string[] = Object.freeze([...vocabulary.certificatePhrases]);

/** Longest prefixes first so "student name" wins over "student". */
export const METADATA_LINE_PREFIXES: readonly string[] = Object.freeze(
  [...vocabulary.metadataLinePrefixes].map((p) => p.toLowerCase()).sort((a, b) => b.length - a.length)
);

/** Stop words for OCR-sourced name runs: metadata ∪ subjects ∪ common words. */
export const NAME_STOP_WORDS: ReadonlySet<string> = new Set([
  ...METADATA_KEYWORDS,
  ...KNOWN_SUBJECT_SET,
  ...COMMON_WORDS,
]);

/** Structured text also treats co-curricular words as a hard boundary. */
export const STRUCTURED_NAME_STOP_WORDS: ReadonlySet<string> = new Set([
  ...NAME_STOP_WORDS,
  ...CO_CURRICULAR_KEYWORDS,
]);

export const RATING_VARIANTS: ReadonlyMap<string, CanonicalRating> = (() => {
  const out = new Map<string, CanonicalRating>();
  for (const [variant, rating] of Object.entries(vocabulary.ratingVariants)) {
    if (isCanonicalRating(rating)) out.set(variant.toLowerCase(), rating);
  }
  return out;
})();

export type SectionHeaderAlias = {
  section: Exclude<SectionTag, "Misc">;
  alias: string;
  /** Letters only, lowercased; compared against the same projection of a line. */
  compact: string;
};

function isHeaderSection(value: string): value is SectionHeaderAlias["section"] {
  return value === "Subjects" || value === "Behaviour" || value === "Co-curricular" || value === "Student Details";
}

export function compactLetters(text: string): string {
  return String(text || "")
    .toLowerCase()
    .replace(/[^a-z]/g, "");
}

// The alias table is an unordered set per section; longest aliases are tried first.
export const SECTION_HEADER_ALIASES: readonly SectionHeaderAlias[] = (() => {
  const out: SectionHeaderAlias[] = [];
  for (const [section, aliases] of Object.entries(vocabulary.sectionHeaders)) {
    if (!isHeaderSection(section)) continue;
    for (const alias of aliases) {
      out.push({ section, alias: alias.toLowerCase(), compact: compactLetters(alias) });
    }
  }
  return Object.freeze(out.sort((a, b) => b.compact.length - a.compact.length));
})();

/** Every rating spelling the textual extractor looks for, longest first. */
export const RATING_TOKENS: readonly string[] = Object.freeze(
  Array.from(new Set([...RATING_VARIANTS.keys(), ...CANONICAL_RATINGS.map((r) => r.toLowerCase())])).sort(
    (a, b) => b.length - a.length
  )
);

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export const RATING_ALTERNATION = RATING_TOKENS.map((t) => escapeRegExp(t).replace(/ /g, "\\s+")).join("|");

export function titleCase(text: string): string {
  return String(text || "")
    .toLowerCase()
    .replace(/(^|[^a-z])([a-z])/g, (_m, lead: string, ch: string) => `${lead}${ch.toUpperCase()}`);
}

export function wordsOf(text: string): string[] {
  return String(text || "").toLowerCase().match(/[a-z]+/g) ?? [];
}

export function containsKeyword(text: string, keywords: ReadonlySet<string>): boolean {
  return wordsOf(text).some((w) => keywords.has(w));
}
