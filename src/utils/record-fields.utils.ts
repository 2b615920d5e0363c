import { UNKNOWN, UNKNOWN_BUILDING, type CategoricalField, type IncidentFieldValue, type IncidentRecord } from '../types/discipline.types';

/**
 * Resolves a categorical field to its display value. Strings are trimmed,
 * finite numbers are stringified (loaders hand grades over as numbers), and
 * anything else, including blank strings, falls back to `fallback`.
 */
export function resolveCategory(value: IncidentFieldValue, fallback: string = UNKNOWN): string {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' ? fallback : trimmed;
  }
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return fallback;
}

export function readCategory(record: IncidentRecord, field: CategoricalField): string {
  const fallback = field === 'student_school' ? UNKNOWN_BUILDING : UNKNOWN;
  return resolveCategory(record[field], fallback);
}

/** Ordered tally: keys keep first-seen order. */
export function tallyBy<K>(items: readonly IncidentRecord[], keyOf: (record: IncidentRecord) => K): Map<K, number> {
  const counts = new Map<K, number>();
  for (const item of items) {
    const key = keyOf(item);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return counts;
}
