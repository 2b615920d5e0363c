import { format, isValid, parse } from 'date-fns';
import { UNKNOWN, type HourBucket, type IncidentFieldValue } from '../types/discipline.types';

// Tried in order; the first pattern that parses wins.
export const TIME_PATTERNS = ['hh:mm:ss a', 'hh:mm a', 'HH:mm'] as const;

const REFERENCE_DATE = new Date(2000, 0, 1);
// Only AM/PM meridiems; date-fns `a` also takes "p", "noon", "in the afternoon"
const TIME_SHAPE = /^(\d{1,2}:\d{1,2}(:\d{1,2})? [AaPp][Mm]|\d{1,2}:\d{1,2})$/;
const BUCKET_LABEL = /^(\d{1,2})(am|pm)$/;

export type HourBucketResult =
  | { status: 'parsed'; bucket: HourBucket }
  | { status: 'missing'; bucket: typeof UNKNOWN }
  | { status: 'unparseable'; bucket: typeof UNKNOWN };

/**
 * Canonicalizes a free-form incident time into an hour bucket such as "2pm".
 * Missing or blank values and values no pattern accepts map to "Unknown".
 */
export function parseHourBucket(raw: IncidentFieldValue): HourBucketResult {
  if (typeof raw !== 'string') return { status: 'missing', bucket: UNKNOWN };
  const trimmed = raw.trim().replace(/\s+/g, ' ');
  if (trimmed === '') return { status: 'missing', bucket: UNKNOWN };
  if (!TIME_SHAPE.test(trimmed)) return { status: 'unparseable', bucket: UNKNOWN };

  for (const pattern of TIME_PATTERNS) {
    const parsed = parse(trimmed, pattern, REFERENCE_DATE);
    if (isValid(parsed)) {
      return { status: 'parsed', bucket: format(parsed, 'ha').toLowerCase() };
    }
  }
  return { status: 'unparseable', bucket: UNKNOWN };
}

/** Hour of day (0-23) for a bucket label; "12am" is 0. Unknown labels yield null. */
export function hourOfDay(bucket: HourBucket): number | null {
  const match = BUCKET_LABEL.exec(bucket);
  if (!match) return null;
  const hour = Number(match[1]) % 12;
  return match[2] === 'pm' ? hour + 12 : hour;
}

/** Chronological comparator; "Unknown" (or any unrecognized label) sorts last. */
export function compareHourBuckets(a: HourBucket, b: HourBucket): number {
  const ha = hourOfDay(a);
  const hb = hourOfDay(b);
  if (ha === null && hb === null) return 0;
  if (ha === null) return 1;
  if (hb === null) return -1;
  return ha - hb;
}
