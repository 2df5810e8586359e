import { cellText, coerceMark, isBlankCell, recordCells } from "@/lib/reports/table";
import type { CanonicalRecord, RankingEntry } from "@/lib/reports/types";
import { RANKING_SKIP_WORDS, TWO_WORD_SUBJECTS, titleCase } from "@/lib/reports/vocabulary";

export const DEFAULT_RANKING_LIMIT = 5;

// Progressively looser "label score" shapes, applied to lowercased cell text.
const FREE_TEXT_PATTERNS: readonly RegExp[] = [
  /([a-z\s]+[a-z]):?\s*(\d+)\s*(?:\/\s*\d+)?/g,
  /([a-z\s]+[a-z])\s+(\d+)\s*(?:\/\s*\d+)?/g,
  /([a-z\s]+(?:\([^)]+\))?):?\s*(\d+)/g,
];

/**
 * Display label for a ranking row: a known two-word phrase when the label
 * contains one, else its last significant word. Shared by both passes so the
 * same subject always collapses to the same label.
 */
export function simplifyLabel(label: string): string {
  const raw = String(label || "").trim();
  const lower = raw.toLowerCase();
  const phrase = TWO_WORD_SUBJECTS.find((p) => lower.includes(p));
  if (phrase) return titleCase(phrase);

  const words = raw.split(/\s+/).filter(Boolean);
  if (!words.length) return "";
  for (let i = words.length - 1; i >= 0; i--) {
    const w = words[i];
    if (!RANKING_SKIP_WORDS.has(w) && w.length > 1) return titleCase(w);
  }
  return titleCase(words[words.length - 1]);
}

export function collectStructuredPairs(records: readonly CanonicalRecord[]): RankingEntry[] {
  const out: RankingEntry[] = [];
  for (const rec of records) {
    if (rec.Score === null || rec.Score <= 0) continue;
    const label = simplifyLabel(rec.Label);
    if (label) out.push({ Label: label, Score: rec.Score });
  }
  return out;
}

export function collectFreeTextPairs(records: readonly CanonicalRecord[]): RankingEntry[] {
  const out: RankingEntry[] = [];
  for (const rec of records) {
    for (const cell of recordCells(rec)) {
      if (isBlankCell(cell)) continue;
      const text = cellText(cell).toLowerCase();
      for (const re of FREE_TEXT_PATTERNS) {
        for (const m of text.matchAll(re)) {
          const label = simplifyLabel(m[1]);
          const score = coerceMark(m[2]);
          if (label && score !== null && score > 0) out.push({ Label: label, Score: score });
        }
      }
    }
  }
  return out;
}

/**
 * Highest score first (stable), one entry per label keeping its best score,
 * cut to `limit`. Running it again on its own output changes nothing.
 */
export function rankPairs(pairs: readonly RankingEntry[], limit = DEFAULT_RANKING_LIMIT): RankingEntry[] {
  const sorted = pairs
    .map((p, idx) => ({ p, idx }))
    .sort((a, b) => b.p.Score - a.p.Score || a.idx - b.idx)
    .map(({ p }) => p);

  const seen = new Set<string>();
  const out: RankingEntry[] = [];
  for (const pair of sorted) {
    if (seen.has(pair.Label)) continue;
    seen.add(pair.Label);
    out.push({ Label: pair.Label, Score: pair.Score });
    if (out.length >= limit) break;
  }
  return out;
}

export function extractTopRanking(records: readonly CanonicalRecord[], limit = DEFAULT_RANKING_LIMIT): RankingEntry[] {
  return rankPairs([...collectStructuredPairs(records), ...collectFreeTextPairs(records)], limit);
}
