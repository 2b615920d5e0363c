import { getDataQualityEventCounter, type DataQualityKind } from '../metrics/discipline.metrics';
import { logger } from './logger';

export interface DataQualityEvent {
  kind: DataQualityKind;
  field: 'incident_time' | 'incident_date';
  value: unknown;
  metric: string;
}

/**
 * Records a non-fatal data-quality diagnostic. Only the offending field value is
 * logged, never the whole record.
 */
export function reportDataQuality(event: DataQualityEvent): void {
  getDataQualityEventCounter().inc({ kind: event.kind, metric: event.metric }, 1);
  logger.warn('Incident data-quality issue', {
    kind: event.kind,
    field: event.field,
    value: event.value === undefined ? null : event.value,
    metric: event.metric,
  });
}
