export type SectionTag = "Student Details" | "Subjects" | "Behaviour" | "Co-curricular" | "Misc";

export type CanonicalRating = "Excellent" | "Very Good" | "Good" | "Fair" | "Poor" | "Bad";

/**
 * One normalized row. Field names are part of the output contract; downstream
 * presentation code reads them verbatim.
 */
export type CanonicalRecord = {
  /** One of {@link SectionTag} from the classifier; pass-through tables may carry their own names. */
  Section: string;
  Label: string;
  Score: number | null;
  Maximum: number | null;
  Value: string | null;
  Notes: string | null;
};

export const CANONICAL_COLUMNS = ["Section", "Label", "Score", "Maximum", "Value", "Notes"] as const;
export type CanonicalColumn = (typeof CANONICAL_COLUMNS)[number];

export type Cell = string | number | boolean | null;
export type TableRow = Record<string, Cell>;

/**
 * Rows with named columns, as produced by a spreadsheet/CSV loader or handed
 * in by a caller. `numericColumns` pins the numeric columns; when omitted they
 * are inferred from the values.
 */
export type DataTable = {
  columns: string[];
  rows: TableRow[];
  numericColumns?: string[];
};

export type Gender = "Male" | "Female";

export type StudentMetadata = {
  Name: string | null;
  Gender: Gender | null;
  State: string | null;
  /** Free-form fields (Nationality, Form, School Level, ...). */
  extra: Record<string, string>;
};

export type SubjectScoreMap = Map<string, number>;

export type SubjectSummary = {
  scores: Record<string, number>;
  strength: string | null;
  weakness: string | null;
};

export type BehaviourTraitMap = Record<string, CanonicalRating>;

export type RankingEntry = {
  Label: string;
  Score: number;
};

export type Trend = "increasing" | "decreasing" | "stable";

export type PredictiveInsight =
  | "Recent performance is above average."
  | "Recent performance is below average."
  | "Performance is consistent.";

export type StatisticsBundle = {
  row_count: number;
  column_count: number;
  numeric_columns: string[];
  averages: Record<string, number>;
  medians: Record<string, number>;
  std_dev: Record<string, number>;
  counts: Record<string, number>;
  trends: Record<string, Trend>;
  predictive_insights: Record<string, PredictiveInsight>;
};

export type TextSource = "ocr" | "pdf" | "plain";

export type ReportInput =
  | {
      kind: "table";
      table: DataTable;
      /** Label/value pairs found above the data table. */
      metadata?: Record<string, string>;
      /** First sheet row as read, when it differs from the detected header row. */
      columnHeaders?: string[];
    }
  | { kind: "text"; text: string; source?: TextSource };
