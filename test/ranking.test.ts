import { describe, expect, it } from "vitest";

import {
  collectFreeTextPairs,
  collectStructuredPairs,
  extractTopRanking,
  rankPairs,
  simplifyLabel,
} from "@/lib/reports/extractors/ranking";
import type { CanonicalRecord, RankingEntry } from "@/lib/reports/types";

function scored(Label: string, Score: number | null, Section = "Subjects"): CanonicalRecord {
  return { Section, Label, Score, Maximum: null, Value: null, Notes: null };
}

describe("simplifyLabel", () => {
  it("prefers a known two-word phrase", () => {
    expect(simplifyLabel("Bahasa Malaysia Paper 1")).toBe("Bahasa Malaysia");
    expect(simplifyLabel("Chess Club Secretary")).toBe("Chess Club");
  });

  it("otherwise keeps the last significant word", () => {
    expect(simplifyLabel("History of")).toBe("History");
    expect(simplifyLabel("Form 2 Geography")).toBe("Geography");
    expect(simplifyLabel("a")).toBe("A");
  });
});

describe("ranking passes", () => {
  it("keeps positive structured scores only", () => {
    expect(collectStructuredPairs([scored("Mathematics", 88), scored("Art", 0), scored("Music", null)])).toEqual([
      { Label: "Mathematics", Score: 88 },
    ]);
  });

  it("reads label/score pairs out of free-text cells", () => {
    const pairs = collectFreeTextPairs([scored("Science: 74 / 100", null, "Misc")]);
    expect(pairs).toEqual([
      { Label: "Science", Score: 74 },
      { Label: "Science", Score: 74 },
    ]);
  });
});

describe("rankPairs", () => {
  const pairs: RankingEntry[] = [
    { Label: "Science", Score: 60 },
    { Label: "Mathematics", Score: 88 },
    { Label: "Science", Score: 74 },
    { Label: "English", Score: 65 },
    { Label: "History", Score: 70 },
    { Label: "Geography", Score: 55 },
    { Label: "Art", Score: 90 },
  ];

  it("keeps the highest score per label and returns the top five", () => {
    expect(rankPairs(pairs)).toEqual([
      { Label: "Art", Score: 90 },
      { Label: "Mathematics", Score: 88 },
      { Label: "Science", Score: 74 },
      { Label: "History", Score: 70 },
      { Label: "English", Score: 65 },
    ]);
  });

  it("is idempotent", () => {
    const once = rankPairs(pairs);
    expect(rankPairs(once)).toEqual(once);
    expect(rankPairs(pairs)).toEqual(once);
  });

  it("honours the limit", () => {
    expect(rankPairs(pairs, 2)).toEqual([
      { Label: "Art", Score: 90 },
      { Label: "Mathematics", Score: 88 },
    ]);
  });
});

describe("extractTopRanking", () => {
  it("merges both passes", () => {
    expect(
      extractTopRanking([scored("Additional Mathematics", 95), scored("English", 65), scored("Music 80", null, "Misc")])
    ).toEqual([
      { Label: "Additional Mathematics", Score: 95 },
      { Label: "Music", Score: 80 },
      { Label: "English", Score: 65 },
    ]);
  });
});
