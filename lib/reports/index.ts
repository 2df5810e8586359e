import { createOpsLogger } from "@/lib/ops/eventLog";
import { readReportConfig, type ReportConfig } from "@/lib/reports/config";
import { extractActivities } from "@/lib/reports/extractors/activities";
import { extractBehaviour, groupTraitsByRating } from "@/lib/reports/extractors/behaviour";
import { emptyMetadata, hasMetadata, resolveStudentMetadata } from "@/lib/reports/extractors/entities";
import { extractTopRanking } from "@/lib/reports/extractors/ranking";
import { resolveSubjects } from "@/lib/reports/extractors/subjects";
import { normalizeTable, normalizeText, prepareTextLines } from "@/lib/reports/parsers/sections";
import { noteIssue, recover, type ExtractionIssue } from "@/lib/reports/recovery";
import { computeStatistics } from "@/lib/reports/stats/statistics";
import { inferNumericColumns, recordsToTable, tableToLines } from "@/lib/reports/table";
import type {
  BehaviourTraitMap,
  CanonicalRating,
  CanonicalRecord,
  RankingEntry,
  ReportInput,
  StatisticsBundle,
  StudentMetadata,
  SubjectSummary,
} from "@/lib/reports/types";

export type ReportBundle = {
  records: CanonicalRecord[];
  metadata: StudentMetadata;
  statistics: StatisticsBundle;
  subjects: SubjectSummary;
  behaviour: BehaviourTraitMap;
  behaviourByRating: Partial<Record<CanonicalRating, string[]>>;
  ranking: RankingEntry[];
  activities: string[];
  issues: ExtractionIssue[];
  /** False when neither records nor metadata came out of the input. */
  hasExtractableData: boolean;
};

export type AnalyzeOptions = {
  config?: ReportConfig;
};

const log = createOpsLogger("reports");

function emptyStatistics(): StatisticsBundle {
  return {
    row_count: 0,
    column_count: 0,
    numeric_columns: [],
    averages: {},
    medians: {},
    std_dev: {},
    counts: {},
    trends: {},
    predictive_insights: {},
  };
}

/**
 * Run every extraction stage over one document. Stages fail independently:
 * a throw in one yields its empty value and an INTERNAL issue, the rest still run.
 */
export function analyzeReport(input: ReportInput, opts: AnalyzeOptions = {}): ReportBundle {
  const config = opts.config ?? readReportConfig();
  const issues: ExtractionIssue[] = [];

  const records = recover<CanonicalRecord[]>(
    "normalize",
    [],
    () => (input.kind === "table" ? normalizeTable(input.table, issues) : normalizeText(input.text, input.source)),
    issues
  );

  const text = recover<string>(
    "text",
    "",
    () => (input.kind === "table" ? tableToLines(input.table) : prepareTextLines(input.text, input.source)).join("\n"),
    issues
  );

  const metadata = recover<StudentMetadata>(
    "metadata",
    emptyMetadata(),
    () =>
      resolveStudentMetadata(
        input.kind === "table"
          ? { records, origin: "table", columnHeaders: input.columnHeaders ?? input.table.columns, explicit: input.metadata, text }
          : { records, origin: "text", text },
        issues
      ),
    issues
  );

  const subjects = recover<SubjectSummary>(
    "subjects",
    { scores: {}, strength: null, weakness: null },
    () => resolveSubjects(records),
    issues
  );
  if (!Object.keys(subjects.scores).length) noteIssue(issues, "NO_MATCH", "subjects", "no known subject with a score");

  const behaviour = recover<BehaviourTraitMap>("behaviour", {}, () => extractBehaviour({ records, text }), issues);
  if (!Object.keys(behaviour).length) noteIssue(issues, "NO_MATCH", "behaviour", "no behaviour ratings found");

  const ranking = recover<RankingEntry[]>("ranking", [], () => extractTopRanking(records, config.rankingLimit), issues);
  const activities = recover<string[]>("activities", [], () => extractActivities(records), issues);

  // A caller's own numeric columns (terms, attempts) are kept; otherwise stats run on Score/Maximum.
  const statistics = recover<StatisticsBundle>(
    "statistics",
    emptyStatistics(),
    () =>
      computeStatistics(
        input.kind === "table" && inferNumericColumns(input.table).length ? input.table : recordsToTable(records)
      ),
    issues
  );

  const hasExtractableData = records.length > 0 || hasMetadata(metadata);

  log.debug("report analyzed", {
    kind: input.kind,
    records: records.length,
    subjects: Object.keys(subjects.scores).length,
    behaviour: Object.keys(behaviour).length,
    issues: issues.length,
  });

  return {
    records,
    metadata,
    statistics,
    subjects,
    behaviour,
    behaviourByRating: recover<ReportBundle["behaviourByRating"]>("behaviourByRating", {}, () => groupTraitsByRating(behaviour), issues),
    ranking,
    activities,
    issues,
    hasExtractableData,
  };
}

export type { ExtractionIssue, ExtractionIssueCode } from "@/lib/reports/recovery";
