import { normalizeOcrText } from "@/lib/reports/normalize/text";
import { CERTIFICATE_PHRASES } from "@/lib/reports/vocabulary";

const NAME_RUN = String.raw`([A-Z][A-Za-z'\x60.-]+(?:[ \t]+[A-Z][A-Za-z'\x60.-]+){0,4})`;

// Phrase alone on its line, name on the next non-empty line.
const BLOCK_RE = new RegExp(String.raw`^[ \t]*[:\-]?[ \t]*\n\s*${NAME_RUN}[ \t]*(?=\n|$|[.,;:!?])`);
// Phrase and name inline; the name stops before the verb that usually follows.
const INLINE_RE = new RegExp(
  String.raw`^[ \t]*[:\-]?[ \t]*${NAME_RUN}(?=\s*(?:has\b|was\b|completed\b|successfully\b|,|\n|$|\.))`
);

function afterPhrases(text: string): string[] {
  const lower = text.toLowerCase();
  const out: string[] = [];
  for (const phrase of CERTIFICATE_PHRASES) {
    const idx = lower.indexOf(phrase);
    if (idx >= 0) out.push(text.slice(idx + phrase.length));
  }
  return out;
}

/**
 * Certificate wording ("This certifies that", "presented to") acts as the
 * name cue for free-text certificates. Returns null when no phrase is present.
 */
export function extractCertificateHolderName(text: string): string | null {
  const t = normalizeOcrText(text);
  if (!t) return null;
  const tails = afterPhrases(t);

  for (const tail of tails) {
    const m = BLOCK_RE.exec(tail);
    if (m?.[1]) return m[1].trim();
  }
  for (const tail of tails) {
    const m = INLINE_RE.exec(tail);
    if (m?.[1]) return m[1].trim();
  }
  return null;
}
