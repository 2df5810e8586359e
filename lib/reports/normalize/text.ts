export function normalizeWhitespace(s: string) {
  return (s || "")
    .replace(/\r/g, "")
    .replace(/[ \t]+/g, " ")
    .trim();
}

/** Split text into clean-ish lines (OCR / pdf table flattening friendly) */
export function toLines(text: string): string[] {
  return (text || "")
    .replace(/\r\n?/g, "\n")
    .split("\n")
    .map((l) => l.replace(/[ \t]+/g, " ").trim())
    .filter(Boolean);
}

/**
 * OCR sometimes spaces out letters: "H e l e n e" -> "Helene".
 * Needs a run of at least three single letters.
 */
export function collapseSpacedLetters(text: string): string {
  return String(text || "").replace(/\b(?:[A-Za-z] ){2,}[A-Za-z]\b/g, (run) => run.replace(/ /g, ""));
}

export function normalizeOcrText(text: string): string {
  const t = String(text || "")
    .replace(/\r\n?/g, "\n")
    .replace(/[–—]/g, "-");
  return collapseSpacedLetters(t)
    .replace(/[ \t]{2,}/g, " ")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

/**
 * Re-insert the line breaks pdf text extraction tends to drop between
 * certificate headers, organisation names and person names.
 */
export function repairPdfText(text: string): string {
  if (!text) return text;
  return text
    .replace(/([a-z.])(\s*Certificate of Completion)/gi, "$1\n$2")
    .replace(/([a-z])\s+([A-Z]{3,}\s+[A-Z]{3,}\s+[A-Z]{3,})/g, "$1\n$2")
    .replace(/([a-z.])\s*(THIS CERTIFICATE IS PROUDLY PRESENTED)/gi, "$1\n$2")
    .replace(/([a-z])([A-Z][a-z]+\s+(?:of|is|to|in)\s+)/g, "$1\n$2")
    .replace(/([a-z])([A-Z][a-z])/g, "$1 $2")
    .replace(/([A-Z][a-z]+)\s*([A-Z][a-z]+)(Certificate)/g, "$1 $2\n$3");
}
