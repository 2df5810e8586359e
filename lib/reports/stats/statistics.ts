import { inferNumericColumns, toNumber } from "@/lib/reports/table";
import type { DataTable, PredictiveInsight, StatisticsBundle, Trend } from "@/lib/reports/types";

export function mean(values: readonly number[]): number | null {
  if (!values.length) return null;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

export function median(values: readonly number[]): number | null {
  if (!values.length) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

/** Population standard deviation (divides by n). */
export function populationStdDev(values: readonly number[]): number | null {
  const avg = mean(values);
  if (avg === null) return null;
  return Math.sqrt(values.reduce((acc, v) => acc + (v - avg) ** 2, 0) / values.length);
}

/** Non-null values of a column in row order. */
export function columnSeries(table: DataTable, column: string): number[] {
  const out: number[] = [];
  for (const row of table.rows) {
    const n = toNumber(row[column]);
    if (n !== null) out.push(n);
  }
  return out;
}

/** First vs last value in existing order; null below two values. */
export function trendOf(series: readonly number[]): Trend | null {
  if (series.length < 2) return null;
  const first = series[0];
  const last = series[series.length - 1];
  if (last > first) return "increasing";
  if (last < first) return "decreasing";
  return "stable";
}

/** Mean of the last three values against the overall mean; null below three values. */
export function insightOf(series: readonly number[]): PredictiveInsight | null {
  if (series.length < 3) return null;
  const recent = mean(series.slice(-3));
  const overall = mean(series);
  if (recent === null || overall === null) return null;
  if (recent > overall) return "Recent performance is above average.";
  if (recent < overall) return "Recent performance is below average.";
  return "Performance is consistent.";
}

export function detectTrends(table: DataTable): Record<string, Trend> {
  const out: Record<string, Trend> = {};
  for (const col of inferNumericColumns(table)) {
    const trend = trendOf(columnSeries(table, col));
    if (trend) out[col] = trend;
  }
  return out;
}

export function generatePredictiveInsights(table: DataTable): Record<string, PredictiveInsight> {
  const out: Record<string, PredictiveInsight> = {};
  for (const col of inferNumericColumns(table)) {
    const insight = insightOf(columnSeries(table, col));
    if (insight) out[col] = insight;
  }
  return out;
}

/**
 * Per numeric column: mean, median, population std and non-null count, plus
 * trend and recent-performance insight. A column with no values reports a
 * count of 0 and nothing else.
 */
export function computeStatistics(table: DataTable): StatisticsBundle {
  const numeric = inferNumericColumns(table);
  const bundle: StatisticsBundle = {
    row_count: table.rows.length,
    column_count: table.columns.length,
    numeric_columns: numeric,
    averages: {},
    medians: {},
    std_dev: {},
    counts: {},
    trends: detectTrends(table),
    predictive_insights: generatePredictiveInsights(table),
  };

  for (const col of numeric) {
    const series = columnSeries(table, col);
    bundle.counts[col] = series.length;
    const avg = mean(series);
    const mid = median(series);
    const std = populationStdDev(series);
    if (avg !== null) bundle.averages[col] = avg;
    if (mid !== null) bundle.medians[col] = mid;
    if (std !== null) bundle.std_dev[col] = std;
  }
  return bundle;
}
