import {
  METRIC_ORDER,
  type IncidentRecord,
  type MetricResult,
  type MetricRow,
  type MetricsSet,
  type MetricName,
  type NamedMetric,
  type SummaryMetrics,
} from '../types/discipline.types';
import {
  DEFAULT_TOP_AUTHORS,
  DEFAULT_TOP_STUDENTS,
  countByDate,
  countByGrade,
  countByHour,
  countByLocation,
  countBySubtype,
  hourlyLocation,
  topAuthors,
  topStudents,
} from './incident-metrics.service';

export interface SummaryMetricsOptions {
  topStudents?: number;
  topAuthors?: number;
}

/**
 * Runs every incident metric over one record collection. Key order of the
 * returned object is the report order.
 */
export function calculateSummaryMetrics(
  records: readonly IncidentRecord[],
  options: SummaryMetricsOptions = {}
): SummaryMetrics {
  return {
    incidents_by_grade: countByGrade(records),
    incidents_by_location: countByLocation(records),
    incidents_by_hour: countByHour(records),
    incidents_by_date: countByDate(records),
    incidents_by_subtype: countBySubtype(records),
    top_students: topStudents(records, options.topStudents ?? DEFAULT_TOP_STUDENTS),
    top_authors: topAuthors(records, options.topAuthors ?? DEFAULT_TOP_AUTHORS),
    incidents_by_loc_hour: hourlyLocation(records),
  };
}

function table(name: string, rows: readonly MetricRow[]): MetricResult {
  return { kind: 'table', table: { name, rows } };
}

function toMetricResult(summary: SummaryMetrics, name: MetricName): MetricResult {
  switch (name) {
    case 'incidents_by_date':
      // Averages always come before the per-date counts
      return {
        kind: 'paired',
        first: { name: 'day_of_week_avg', rows: summary.incidents_by_date.day_of_week_avg },
        second: { name: 'date_counts', rows: summary.incidents_by_date.date_counts },
      };
    case 'incidents_by_grade':
      return table(name, summary.incidents_by_grade);
    case 'incidents_by_location':
      return table(name, summary.incidents_by_location);
    case 'incidents_by_hour':
      return table(name, summary.incidents_by_hour);
    case 'incidents_by_subtype':
      return table(name, summary.incidents_by_subtype);
    case 'top_students':
      return table(name, summary.top_students);
    case 'top_authors':
      return table(name, summary.top_authors);
    case 'incidents_by_loc_hour':
      return table(name, summary.incidents_by_loc_hour);
  }
}

/** Sink-facing view of a summary: tagged results in fixed metric order. */
export function toMetricsSet(summary: SummaryMetrics): MetricsSet {
  return METRIC_ORDER.map((name): NamedMetric => ({ name, result: toMetricResult(summary, name) }));
}

export function buildMetricsSet(records: readonly IncidentRecord[], options: SummaryMetricsOptions = {}): MetricsSet {
  return toMetricsSet(calculateSummaryMetrics(records, options));
}
