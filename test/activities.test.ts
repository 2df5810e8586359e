import { describe, expect, it } from "vitest";

import { extractActivities } from "@/lib/reports/extractors/activities";
import type { CanonicalRecord } from "@/lib/reports/types";

function label(Section: string, Label: string): CanonicalRecord {
  return { Section, Label, Score: null, Maximum: null, Value: null, Notes: null };
}

describe("extractActivities", () => {
  it("splits on pipes and slashes and de-duplicates", () => {
    expect(
      extractActivities([
        label("Misc", "Chess Club Member | Debate Team"),
        label("Misc", "chess club member/Football"),
        label("Subjects", "Mathematics"),
      ])
    ).toEqual(["Chess Club Member", "Debate Team"]);
  });

  it("accepts any non-metadata part inside a co-curricular section", () => {
    expect(
      extractActivities([label("Co-curricular", "Scouts"), label("Co-curricular", "Student Name Ali")])
    ).toEqual(["Scouts"]);
  });
});
