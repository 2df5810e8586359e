import type { CanonicalRecord } from "@/lib/reports/types";
import { CO_CURRICULAR_KEYWORDS, METADATA_KEYWORDS, containsKeyword } from "@/lib/reports/vocabulary";

const ACTIVITY_SECTION = /co-?curricular|activity|activities/i;

/**
 * Extracurricular entries, e.g. "Chess Club Member | Debate Team" gives two.
 * Inside a co-curricular section every part counts unless it reads like metadata.
 */
export function extractActivities(records: readonly CanonicalRecord[]): string[] {
  const out: string[] = [];
  const seen = new Set<string>();

  for (const rec of records) {
    if (!rec.Label) continue;
    const inActivitySection = ACTIVITY_SECTION.test(rec.Section);

    for (const raw of rec.Label.split(/\s*\|\s*|\//)) {
      const part = raw.trim();
      if (!part) continue;
      const isActivity =
        containsKeyword(part, CO_CURRICULAR_KEYWORDS) ||
        (inActivitySection && !containsKeyword(part, METADATA_KEYWORDS));
      if (!isActivity) continue;

      const key = part.toLowerCase();
      if (seen.has(key)) continue;
      seen.add(key);
      out.push(part);
    }
  }
  return out;
}
