export * from './types/discipline.types';
export {
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
} from './services/incident-metrics.service';
export { buildMetricsSet, calculateSummaryMetrics, toMetricsSet } from './services/summary-metrics.service';
export type { SummaryMetricsOptions } from './services/summary-metrics.service';
export {
  buildDisciplineReports,
  partitionByBuilding,
  publishDisciplineReports,
} from './services/building-report.service';
export type { BuildingPartition } from './services/building-report.service';
export type { DisciplineReportSink } from './services/report-sink.port';
export {
  DETAIL_SHEET,
  NO_DATA_PLACEHOLDER,
  SUMMARY_SHEET,
  flattenMetricsToCsv,
  layoutDetailSheet,
  layoutReportSheets,
  layoutSummarySheet,
} from './services/report-layout.service';
export type { DetailSheet, ReportLayout, SheetCell, SheetSection, SummarySheet } from './services/report-layout.service';
export { InMemoryReportSink } from './adapters/report-sink.memory';
export { compareHourBuckets, hourOfDay, parseHourBucket } from './utils/hour-bucket.utils';
export type { HourBucketResult } from './utils/hour-bucket.utils';
export { parseIncidentDate } from './utils/incident-date.utils';
export type { CalendarDate, CalendarDateResult } from './utils/incident-date.utils';
export { readCategory, resolveCategory } from './utils/record-fields.utils';
export { parseIncidentRecords } from './utils/validation.schemas';
export { AppError, ConfigurationError, ReportSinkError, ValidationError } from './utils/errors';
export { getReportConfig, loadReportConfig, resetReportConfigForTests, resolveReportOptions } from './config/report.config';
export type { ReportConfig } from './config/report.config';
export { logger } from './utils/logger';
