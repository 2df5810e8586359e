import type { CanonicalRecord, SubjectScoreMap, SubjectSummary } from "@/lib/reports/types";
import { KNOWN_SUBJECTS, KNOWN_SUBJECT_SET, escapeRegExp, titleCase } from "@/lib/reports/vocabulary";

// KNOWN_SUBJECTS lists multi-word phrases first, so the first hit is the most specific.
const SUBJECT_PATTERNS: ReadonlyArray<{ subject: string; re: RegExp }> = KNOWN_SUBJECTS.map((subject) => ({
  subject,
  re: new RegExp(`(?:^|[^a-z])${escapeRegExp(subject).replace(/ /g, "\\s+")}(?![a-z])`),
}));

/** "Languages 1" -> "Languages"; "Form 2 Mathematics" -> "Mathematics"; no hit -> null. */
export function resolveSubjectName(label: string): string | null {
  const lower = String(label || "").trim().toLowerCase();
  if (!lower) return null;

  const tokens = lower.split(/\s+/);
  const last = tokens[tokens.length - 1].replace(/[^a-z]/g, "");
  if (last && KNOWN_SUBJECT_SET.has(last)) return titleCase(last);

  const hit = SUBJECT_PATTERNS.find(({ re }) => re.test(lower));
  return hit ? titleCase(hit.subject) : null;
}

/**
 * Subject -> score over Subjects rows with a score. A repeated subject keeps
 * its first position and takes the latest score.
 */
export function collectSubjectScores(records: readonly CanonicalRecord[]): SubjectScoreMap {
  const scores: SubjectScoreMap = new Map();
  for (const rec of records) {
    if (rec.Section !== "Subjects" || rec.Score === null) continue;
    const subject = resolveSubjectName(rec.Label);
    if (subject) scores.set(subject, rec.Score);
  }
  return scores;
}

/** Ties go to the subject seen first. */
export function pickExtremes(scores: SubjectScoreMap): { strength: string | null; weakness: string | null } {
  let strength: [string, number] | null = null;
  let weakness: [string, number] | null = null;
  for (const [subject, score] of scores) {
    if (!strength || score > strength[1]) strength = [subject, score];
    if (!weakness || score < weakness[1]) weakness = [subject, score];
  }
  return { strength: strength?.[0] ?? null, weakness: weakness?.[0] ?? null };
}

export function resolveSubjects(records: readonly CanonicalRecord[]): SubjectSummary {
  const scores = collectSubjectScores(records);
  return { scores: Object.fromEntries(scores), ...pickExtremes(scores) };
}
