/**
 * Incident metric reducers.
 *
 * Each function reads the whole (already partitioned) record collection and
 * returns one table. None of them mutates a record or shares state with another;
 * malformed values are bucketed as "Unknown" or skipped, never thrown.
 */

import {
  UNKNOWN,
  WEEKDAYS,
  type CategoricalField,
  type DateCountRow,
  type DayOfWeekAverageRow,
  type GradeCountRow,
  type HourBucket,
  type HourCountRow,
  type HourLocationRow,
  type IncidentRecord,
  type IncidentsByDate,
  type LocationCountRow,
  type SubtypeCountRow,
  type TopAuthorRow,
  type TopStudentRow,
  type Weekday,
} from '../types/discipline.types';
import { reportDataQuality } from '../utils/data-quality';
import { compareHourBuckets, parseHourBucket } from '../utils/hour-bucket.utils';
import { parseIncidentDate } from '../utils/incident-date.utils';
import { readCategory, tallyBy } from '../utils/record-fields.utils';

export const DEFAULT_TOP_STUDENTS = 15;
export const DEFAULT_TOP_AUTHORS = 10;

function countByField(records: readonly IncidentRecord[], field: CategoricalField): Array<[string, number]> {
  return Array.from(tallyBy(records, (record) => readCategory(record, field)));
}

/**
 * Counts per key, sorted by count descending, truncated to `limit`.
 * Array.prototype.sort is stable, so ties keep first-appearance order.
 */
function rankByField(records: readonly IncidentRecord[], field: CategoricalField, limit: number): Array<[string, number]> {
  const n = Math.max(0, Math.floor(limit));
  return countByField(records, field)
    .sort((a, b) => b[1] - a[1])
    .slice(0, n);
}

function hourBucketOf(record: IncidentRecord, metric: string): HourBucket {
  const result = parseHourBucket(record.incident_time);
  if (result.status === 'unparseable') {
    reportDataQuality({ kind: 'unparseable_time', field: 'incident_time', value: record.incident_time, metric });
  }
  return result.bucket;
}

export function countByGrade(records: readonly IncidentRecord[]): GradeCountRow[] {
  return countByField(records, 'grade_level').map(([Grade, Count]) => ({ Grade, Count }));
}

export function countByLocation(records: readonly IncidentRecord[]): LocationCountRow[] {
  return countByField(records, 'incident_location').map(([Location, Count]) => ({ Location, Count }));
}

export function countBySubtype(records: readonly IncidentRecord[]): SubtypeCountRow[] {
  return countByField(records, 'subtype_name').map(([Subtype, Count]) => ({ Subtype, Count }));
}

/** Hour tallies in chronological order. The "Unknown" row is always present and last. */
export function countByHour(records: readonly IncidentRecord[]): HourCountRow[] {
  const counts = tallyBy(records, (record) => hourBucketOf(record, 'incidents_by_hour'));
  if (!counts.has(UNKNOWN)) counts.set(UNKNOWN, 0);

  return Array.from(counts.keys())
    .sort(compareHourBuckets)
    .map((Hour) => ({ Hour, Count: counts.get(Hour) ?? 0 }));
}

/**
 * Per-date incident counts plus the average number of incidents per weekday,
 * where the average divides by the number of distinct dates seen on that weekday.
 */
export function countByDate(records: readonly IncidentRecord[]): IncidentsByDate {
  const dateCounts = new Map<string, number>();
  const dateWeekday = new Map<string, Weekday>();

  for (const record of records) {
    const result = parseIncidentDate(record.incident_date);
    if (result.status !== 'parsed') {
      reportDataQuality({
        kind: result.status === 'missing' ? 'missing_date' : 'unparseable_date',
        field: 'incident_date',
        value: record.incident_date,
        metric: 'incidents_by_date',
      });
      continue;
    }
    const { key, weekday } = result.date;
    dateCounts.set(key, (dateCounts.get(key) ?? 0) + 1);
    dateWeekday.set(key, weekday);
  }

  const totals = new Map<Weekday, { incidents: number; dates: number }>();
  for (const [key, count] of dateCounts) {
    const weekday = dateWeekday.get(key);
    if (!weekday) continue;
    const entry = totals.get(weekday) ?? { incidents: 0, dates: 0 };
    entry.incidents += count;
    entry.dates += 1;
    totals.set(weekday, entry);
  }

  const dayOfWeekAvg: DayOfWeekAverageRow[] = [];
  for (const day of WEEKDAYS) {
    const entry = totals.get(day);
    if (!entry || entry.dates === 0) continue;
    dayOfWeekAvg.push({ 'Day of Week': day, 'Average Incidents': roundTo2(entry.incidents / entry.dates) });
  }

  const dateRows: DateCountRow[] = Array.from(dateCounts, ([date, count]) => ({ Date: date, Count: count }));
  return { day_of_week_avg: dayOfWeekAvg, date_counts: dateRows };
}

export function topStudents(records: readonly IncidentRecord[], topN: number = DEFAULT_TOP_STUDENTS): TopStudentRow[] {
  return rankByField(records, 'student_name', topN).map(([Student, Incidents]) => ({ Student, Incidents }));
}

export function topAuthors(records: readonly IncidentRecord[], topN: number = DEFAULT_TOP_AUTHORS): TopAuthorRow[] {
  return rankByField(records, 'entry_author', topN).map(([Author, Logs]) => ({ Author, Logs }));
}

/**
 * Hour x location cross-tab as flat rows, grouped by hour chronologically
 * ("Unknown" last). Within an hour, locations keep first-seen order.
 */
export function hourlyLocation(records: readonly IncidentRecord[]): HourLocationRow[] {
  const byHour = new Map<HourBucket, Map<string, number>>();
  for (const record of records) {
    const hour = hourBucketOf(record, 'incidents_by_loc_hour');
    const location = readCategory(record, 'incident_location');
    const locations = byHour.get(hour) ?? new Map<string, number>();
    locations.set(location, (locations.get(location) ?? 0) + 1);
    byHour.set(hour, locations);
  }

  const rows: HourLocationRow[] = [];
  for (const hour of Array.from(byHour.keys()).sort(compareHourBuckets)) {
    for (const [Location, Count] of byHour.get(hour) ?? []) {
      rows.push({ Hour: hour, Location, Count });
    }
  }
  return rows;
}

/**
 * Rounds to two decimals on the exact binary value, ties to even (2.125 -> 2.12).
 * An exact tie needs a value that is a multiple of 1/8; toFixed handles the rest.
 */
export function roundTo2(value: number): number {
  const eighths = value * 8;
  if (Number.isInteger(eighths)) {
    const thousandths = eighths * 125;
    if (Math.abs(thousandths % 10) === 5) {
      const lower = Math.floor(thousandths / 10);
      return (lower % 2 === 0 ? lower : lower + 1) / 100;
    }
  }
  return Number(value.toFixed(2));
}
