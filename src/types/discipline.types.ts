/**
 * Discipline log types: normalized incident records, per-metric row shapes,
 * the metrics bundle and the reports handed to a sink.
 */

export type IncidentFieldValue = string | number | boolean | null | undefined;

/**
 * One normalized discipline-log entry. Known fields are optional at the source;
 * loaders may pass any extra columns through untouched.
 */
export interface IncidentRecord {
  readonly student_name?: IncidentFieldValue;
  readonly entry_author?: IncidentFieldValue;
  readonly grade_level?: IncidentFieldValue;
  readonly incident_location?: IncidentFieldValue;
  readonly subtype_name?: IncidentFieldValue;
  readonly incident_time?: IncidentFieldValue;
  readonly incident_date?: IncidentFieldValue;
  readonly student_school?: IncidentFieldValue;
  readonly [column: string]: IncidentFieldValue;
}

export type CategoricalField =
  | 'student_name'
  | 'entry_author'
  | 'grade_level'
  | 'incident_location'
  | 'subtype_name'
  | 'student_school';

export const UNKNOWN = 'Unknown';
export const UNKNOWN_BUILDING = 'Unknown Building';

export type HourBucket = string;

export const WEEKDAYS = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'] as const;
export type Weekday = (typeof WEEKDAYS)[number];

// Row shapes are type aliases so they satisfy MetricRow's index signature
export type GradeCountRow = {
  Grade: string;
  Count: number;
};

export type LocationCountRow = {
  Location: string;
  Count: number;
};

export type HourCountRow = {
  Hour: HourBucket;
  Count: number;
};

export type DateCountRow = {
  Date: string;
  Count: number;
};

export type DayOfWeekAverageRow = {
  'Day of Week': Weekday;
  'Average Incidents': number;
};

export type SubtypeCountRow = {
  Subtype: string;
  Count: number;
};

export type TopStudentRow = {
  Student: string;
  Incidents: number;
};

export type TopAuthorRow = {
  Author: string;
  Logs: number;
};

export type HourLocationRow = {
  Hour: HourBucket;
  Location: string;
  Count: number;
};

export interface IncidentsByDate {
  day_of_week_avg: DayOfWeekAverageRow[];
  date_counts: DateCountRow[];
}

/** Typed result of one aggregation run; key order is the report order. */
export interface SummaryMetrics {
  incidents_by_grade: GradeCountRow[];
  incidents_by_location: LocationCountRow[];
  incidents_by_hour: HourCountRow[];
  incidents_by_date: IncidentsByDate;
  incidents_by_subtype: SubtypeCountRow[];
  top_students: TopStudentRow[];
  top_authors: TopAuthorRow[];
  incidents_by_loc_hour: HourLocationRow[];
}

export type MetricName = keyof SummaryMetrics;

export const METRIC_ORDER: readonly MetricName[] = [
  'incidents_by_grade',
  'incidents_by_location',
  'incidents_by_hour',
  'incidents_by_date',
  'incidents_by_subtype',
  'top_students',
  'top_authors',
  'incidents_by_loc_hour',
];

// Sink-facing shapes
export type MetricCell = string | number;
export type MetricRow = Readonly<Record<string, MetricCell>>;

export interface MetricTable {
  name: string;
  rows: readonly MetricRow[];
}

export type MetricResult =
  | { kind: 'table'; table: MetricTable }
  | { kind: 'paired'; first: MetricTable; second: MetricTable };

export interface NamedMetric {
  name: MetricName;
  result: MetricResult;
}

export type MetricsSet = readonly NamedMetric[];

export type ReportScope = 'district' | 'building';

export interface DisciplineReport {
  scope: ReportScope;
  label: string;
  metrics: MetricsSet;
  records: readonly IncidentRecord[];
}

export interface ReportOptions {
  topStudents?: number;
  topAuthors?: number;
  districtLabel?: string;
}

export interface ReportRunSummary {
  reportCount: number;
  buildingCount: number;
  recordCount: number;
}
