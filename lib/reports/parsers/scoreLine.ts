export type ScoreLineFormat = "ratio" | "of" | "bare";

export type ScoreLine = {
  label: string | null;
  score: number;
  maximum: number | null;
  format: ScoreLineFormat;
};

// Digit widths bound the values: score 0-999, maximum 0-9999. The lookarounds
// keep a wider number from being read as a shorter one ("5000" is not "500"),
// and digits glued to letters ("g00d") are not a score. Patterns are anchored
// and the label's first letter is found without backtracking, so a long line
// costs linear time per strategy.
const LABEL = String.raw`^(?<label>[^A-Za-z]*[A-Za-z].*?)`;
const SEP = String.raw`(?:[:\-]\s*)?`;
const SCORE = String.raw`(?<![A-Za-z\d.])(?<score>\d{1,3})`;
const MAX = String.raw`(?<max>\d{1,4})(?!\d)`;

type ScoreLineStrategy = { format: ScoreLineFormat; re: RegExp };

const STRATEGIES: ScoreLineStrategy[] = [
  { format: "ratio", re: new RegExp(`${LABEL}${SEP}${SCORE}\\s*/\\s*${MAX}`) },
  { format: "of", re: new RegExp(`${LABEL}${SEP}${SCORE}\\s+of\\s+${MAX}`, "i") },
  { format: "bare", re: new RegExp(`${LABEL}${SEP}${SCORE}(?!\\d)`) },
];

const TRAILING_LABEL_NOISE = /\b(?:score|marks|result)\b[:\s\-]*$/i;

export function cleanScoreLabel(raw: string): string | null {
  const label = String(raw || "")
    .trim()
    .replace(TRAILING_LABEL_NOISE, "")
    .replace(/[\s:\-]+$/, "")
    .trim();
  return label || null;
}

/**
 * Read (label, score, maximum) from one line or concatenated row.
 * Tries "74 / 100", then "74 of 100", then a bare "74"; null when none fit.
 */
export function parseScoreLine(line: string): ScoreLine | null {
  const text = String(line || "").trim();
  if (!text || !/\d/.test(text)) return null;

  for (const { format, re } of STRATEGIES) {
    const m = re.exec(text);
    const groups = m?.groups;
    if (!groups?.score) continue;
    return {
      label: cleanScoreLabel(groups.label ?? ""),
      score: Number.parseInt(groups.score, 10),
      maximum: groups.max ? Number.parseInt(groups.max, 10) : null,
      format,
    };
  }
  return null;
}

/** Last-resort heuristic: the label is everything before the last small integer. */
export function parseTrailingInteger(line: string): { label: string; score: number } | null {
  const text = String(line || "").trim();
  const matches = Array.from(text.matchAll(/\s(\d{1,3})\b/g));
  const last = matches[matches.length - 1];
  if (!last || last.index === undefined) return null;

  const label = cleanScoreLabel(text.slice(0, last.index));
  if (!label || !/[A-Za-z]/.test(label)) return null;
  return { label, score: Number.parseInt(last[1], 10) };
}
