import * as client from 'prom-client';

export type DataQualityKind = 'unparseable_time' | 'unparseable_date' | 'missing_date';

export function getDataQualityEventCounter() {
  const existing = client.register.getSingleMetric('discipline_data_quality_events_total') as client.Counter<string> | undefined;
  if (existing) return existing;
  return new client.Counter({
    name: 'discipline_data_quality_events_total',
    help: 'Incident record values that could not be parsed and were bucketed or skipped',
    labelNames: ['kind', 'metric'] as const,
  });
}

export function getReportsBuiltCounter() {
  const existing = client.register.getSingleMetric('discipline_reports_built_total') as client.Counter<string> | undefined;
  if (existing) return existing;
  return new client.Counter({
    name: 'discipline_reports_built_total',
    help: 'Total number of metrics sets built for discipline reports',
    labelNames: ['scope'] as const, // scope = district | building
  });
}
