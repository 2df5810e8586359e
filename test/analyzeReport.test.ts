import { afterEach, describe, expect, it, vi } from "vitest";

import { readReportConfig } from "@/lib/reports/config";
import { analyzeReport } from "@/lib/reports";
import { recover, type ExtractionIssue } from "@/lib/reports/recovery";

const config = readReportConfig({ REPORT_RANKING_LIMIT: "3", OPS_EVENTS_LOG_PATH: "off" });

const REPORT_CARD = [
  "STUDENT DETAILS",
  "Name: Ahmad Daniel",
  "Gender: Male",
  "State: Selangor",
  "Nationality: Malaysian",
  "Form: 4",
  "Subjects",
  "Mathematics 88 / 100",
  "Science",
  "74 / 100",
  "English 65",
  "Behaviour Ratings",
  "Attentiveness: Good",
  "Class Participation - g00d",
  "Punctuality Excellent",
  "Co-curricular",
  "Chess Club Member | Debate Team",
].join("\n");

describe("analyzeReport", () => {
  it("extracts a full bundle from OCR text", () => {
    const bundle = analyzeReport({ kind: "text", text: REPORT_CARD }, { config });

    expect(bundle.records).toHaveLength(13);
    expect(bundle.metadata).toEqual({
      Name: "Ahmad Daniel",
      Gender: "Male",
      State: "Selangor",
      extra: { Nationality: "Malaysian", Form: "Form 4" },
    });
    expect(bundle.subjects).toEqual({
      scores: { Mathematics: 88, Science: 74, English: 65 },
      strength: "Mathematics",
      weakness: "English",
    });
    expect(bundle.behaviour).toEqual({
      Attentiveness: "Good",
      "Class Participation": "Good",
      Punctuality: "Excellent",
    });
    expect(bundle.behaviourByRating).toEqual({
      Good: ["Attentiveness", "Class Participation"],
      Excellent: ["Punctuality"],
    });
    expect(bundle.ranking).toEqual([
      { Label: "Mathematics", Score: 88 },
      { Label: "Science", Score: 74 },
      { Label: "English", Score: 65 },
    ]);
    expect(bundle.activities).toEqual(["Chess Club Member", "Debate Team"]);
    expect(bundle.issues).toEqual([]);
    expect(bundle.hasExtractableData).toBe(true);
  });

  it("computes statistics over the canonical Score and Maximum columns", () => {
    const { statistics } = analyzeReport({ kind: "text", text: REPORT_CARD }, { config });

    expect(statistics.row_count).toBe(13);
    expect(statistics.column_count).toBe(6);
    expect(statistics.numeric_columns).toEqual(["Score", "Maximum"]);
    expect(statistics.counts).toEqual({ Score: 3, Maximum: 2 });
    expect(statistics.averages.Score).toBeCloseTo(75.667, 3);
    expect(statistics.medians).toEqual({ Score: 74, Maximum: 100 });
    expect(statistics.trends).toEqual({ Score: "decreasing", Maximum: "stable" });
    expect(statistics.predictive_insights).toEqual({ Score: "Performance is consistent." });
  });

  it("keeps a caller's own numeric columns for statistics", () => {
    const { statistics, subjects } = analyzeReport(
      {
        kind: "table",
        table: {
          columns: ["Section", "Label", "Score", "Maximum"],
          rows: [
            { Section: "Subjects", Label: "Mathematics", Score: 60, Maximum: 100 },
            { Section: "Subjects", Label: "Science", Score: 80, Maximum: 100 },
          ],
        },
      },
      { config }
    );
    expect(statistics.numeric_columns).toEqual(["Score", "Maximum"]);
    expect(statistics.trends).toEqual({ Score: "increasing", Maximum: "stable" });
    expect(subjects.strength).toBe("Science");
  });

  it("flags input with nothing to extract", () => {
    const bundle = analyzeReport({ kind: "text", text: "   " }, { config });
    expect(bundle.records).toEqual([]);
    expect(bundle.hasExtractableData).toBe(false);
    expect(bundle.issues.map((i) => `${i.code}:${i.scope}`)).toEqual([
      "NO_MATCH:metadata",
      "NO_MATCH:subjects",
      "NO_MATCH:behaviour",
    ]);
    expect(bundle.statistics.counts).toEqual({ Score: 0, Maximum: 0 });
  });
});

describe("recover", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("turns a throw into the fallback and an INTERNAL issue", () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const issues: ExtractionIssue[] = [];
    const value = recover<string[]>(
      "ranking",
      [],
      () => {
        throw new Error("boom");
      },
      issues
    );
    expect(value).toEqual([]);
    expect(issues).toEqual([{ code: "INTERNAL", scope: "ranking", message: "boom" }]);
  });

  it("returns the stage result when nothing throws", () => {
    expect(recover("subjects", 0, () => 42)).toBe(42);
  });
});
