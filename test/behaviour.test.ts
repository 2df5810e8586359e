import { describe, expect, it } from "vitest";

import {
  cleanAttribute,
  extractBehaviour,
  extractBehaviourFromRecords,
  extractBehaviourFromText,
  groupTraitsByRating,
  normalizeRating,
} from "@/lib/reports/extractors/behaviour";
import type { CanonicalRecord } from "@/lib/reports/types";
import { CANONICAL_RATINGS } from "@/lib/reports/vocabulary";

function row(Section: string, Label: string, Value: string | null): CanonicalRecord {
  return { Section, Label, Score: null, Maximum: null, Value, Notes: null };
}

describe("normalizeRating", () => {
  it("is idempotent on canonical ratings", () => {
    for (const rating of CANONICAL_RATINGS) {
      expect(normalizeRating(rating)).toBe(rating);
      expect(normalizeRating(rating.toUpperCase())).toBe(rating);
      expect(normalizeRating(normalizeRating(rating) ?? "")).toBe(rating);
    }
  });

  it("maps variants and OCR confusions", () => {
    expect(normalizeRating("g00d")).toBe("Good");
    expect(normalizeRating("Average")).toBe("Fair");
    expect(normalizeRating("Unsatisfactory")).toBe("Poor");
    expect(normalizeRating("Exce11ent")).toBe("Excellent");
    expect(normalizeRating("$atisfactory")).toBe("Good");
    expect(normalizeRating("P0or")).toBe("Poor");
  });

  it("falls back to substring containment", () => {
    expect(normalizeRating("Goodish")).toBe("Good");
  });

  it("returns null for unknown tokens", () => {
    expect(normalizeRating("purple")).toBeNull();
    expect(normalizeRating("")).toBeNull();
  });
});

describe("cleanAttribute", () => {
  it("strips punctuation and title-cases", () => {
    expect(cleanAttribute("  class   participation* ")).toBe("Class Participation");
    expect(cleanAttribute("self-discipline")).toBe("Self-Discipline");
  });
});

describe("extractBehaviourFromText", () => {
  it("captures attribute phrases before a rating", () => {
    expect(extractBehaviourFromText("Attentiveness: Good\nClass Participation - g00d\nPunctuality Very Good")).toEqual({
      Attentiveness: "Good",
      "Class Participation": "Good",
      Punctuality: "Very Good",
    });
  });

  it("keeps whole attribute words when the first word is also a rating", () => {
    expect(extractBehaviourFromText("Good Manners Excellent\nFair Play Good\nBad Language Poor")).toEqual({
      "Good Manners": "Excellent",
      "Fair Play": "Good",
      "Bad Language": "Poor",
    });
  });

  it("keeps the left column of table rows", () => {
    expect(extractBehaviourFromText("Discipline Excellent | Mathematics 88")).toEqual({ Discipline: "Excellent" });
  });

  it("walks back past numbers when the strict pass finds nothing", () => {
    expect(extractBehaviourFromText("Homework 12 Good")).toEqual({ Homework: "Good" });
  });

  it("never returns attributes containing digits", () => {
    const traits = extractBehaviourFromText("Term2 Good\nNeatness Fair");
    expect(Object.keys(traits)).toEqual(["Neatness"]);
  });

  it("returns nothing for empty text", () => {
    expect(extractBehaviourFromText("")).toEqual({});
  });
});

describe("extractBehaviour", () => {
  it("uses behaviour rows first", () => {
    const records = [
      row("Behaviour", "Punctuality", "avg"),
      row("Behaviour Ratings", "Teamwork", "Excellent"),
      row("Subjects", "Mathematics", "Good"),
      row("Behaviour", "Neatness", "nan"),
    ];
    expect(extractBehaviourFromRecords(records)).toEqual({ Punctuality: "Fair", Teamwork: "Excellent" });
    expect(extractBehaviour({ records, text: "Honesty Good" })).toEqual({ Punctuality: "Fair", Teamwork: "Excellent" });
  });

  it("scans the text when rows have no ratings", () => {
    expect(extractBehaviour({ records: [], text: "Honesty Good" })).toEqual({ Honesty: "Good" });
  });

  it("groups traits by rating", () => {
    expect(groupTraitsByRating({ Honesty: "Good", Punctuality: "Fair", Teamwork: "Good" })).toEqual({
      Good: ["Honesty", "Teamwork"],
      Fair: ["Punctuality"],
    });
  });
});
