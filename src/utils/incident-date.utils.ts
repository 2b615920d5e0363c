import { format, isValid, parse } from 'date-fns';
import { WEEKDAYS, type IncidentFieldValue, type Weekday } from '../types/discipline.types';

export const DATE_PATTERNS = ['MM/dd/yyyy', 'MM-dd-yyyy'] as const;

// date-fns reads `yyyy` as 1-4 digits; the year must be exactly four
const DATE_SHAPE = /^\d{1,2}([/-])\d{1,2}\1\d{4}$/;

export interface CalendarDate {
  /** Always "MM/DD/YYYY", whichever separator the source used. */
  key: string;
  weekday: Weekday;
}

export type CalendarDateResult =
  | { status: 'parsed'; date: CalendarDate }
  | { status: 'missing' }
  | { status: 'unparseable' };

const REFERENCE_DATE = new Date(2000, 0, 1);

// getDay() is 0 for Sunday
const WEEKDAY_BY_JS_DAY: readonly Weekday[] = [WEEKDAYS[6], ...WEEKDAYS.slice(0, 6)];

export function parseIncidentDate(raw: IncidentFieldValue): CalendarDateResult {
  if (typeof raw !== 'string' || raw.trim() === '') return { status: 'missing' };
  const trimmed = raw.trim();
  if (!DATE_SHAPE.test(trimmed)) return { status: 'unparseable' };

  for (const pattern of DATE_PATTERNS) {
    const parsed = parse(trimmed, pattern, REFERENCE_DATE);
    if (isValid(parsed)) {
      return {
        status: 'parsed',
        date: { key: format(parsed, 'MM/dd/yyyy'), weekday: WEEKDAY_BY_JS_DAY[parsed.getDay()] },
      };
    }
  }
  return { status: 'unparseable' };
}
