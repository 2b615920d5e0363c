/**
 * Building report driver.
 *
 * Splits the district's incident records by `student_school` and builds one
 * metrics set for the whole district plus one per building. Reports are handed
 * to a sink in order: district first, then buildings in first-seen order.
 */

import { resolveReportOptions } from '../config/report.config';
import { getReportsBuiltCounter } from '../metrics/discipline.metrics';
import type {
  DisciplineReport,
  IncidentRecord,
  ReportOptions,
  ReportRunSummary,
  ReportScope,
} from '../types/discipline.types';
import { ReportSinkError } from '../utils/errors';
import { logger } from '../utils/logger';
import { readCategory } from '../utils/record-fields.utils';
import type { DisciplineReportSink } from './report-sink.port';
import { buildMetricsSet } from './summary-metrics.service';

export interface BuildingPartition {
  building: string;
  records: readonly IncidentRecord[];
}

/** Groups records by building; every record lands in exactly one partition. */
export function partitionByBuilding(records: readonly IncidentRecord[]): BuildingPartition[] {
  const groups = new Map<string, IncidentRecord[]>();
  for (const record of records) {
    const building = readCategory(record, 'student_school');
    const bucket = groups.get(building);
    if (bucket) bucket.push(record);
    else groups.set(building, [record]);
  }
  return Array.from(groups, ([building, members]) => ({ building, records: members }));
}

export function buildDisciplineReports(
  records: readonly IncidentRecord[],
  options: ReportOptions = {}
): DisciplineReport[] {
  const config = resolveReportOptions(options);
  const metricOptions = { topStudents: config.topStudents, topAuthors: config.topAuthors };
  const counter = getReportsBuiltCounter();

  const build = (scope: ReportScope, label: string, subset: readonly IncidentRecord[]): DisciplineReport => {
    const report: DisciplineReport = { scope, label, metrics: buildMetricsSet(subset, metricOptions), records: subset };
    counter.inc({ scope }, 1);
    return report;
  };

  const reports: DisciplineReport[] = [build('district', config.districtLabel, records)];
  for (const partition of partitionByBuilding(records)) {
    reports.push(build('building', partition.building, partition.records));
  }

  logger.debug('Discipline reports built', {
    recordCount: records.length,
    buildingCount: reports.length - 1,
  });
  return reports;
}

/**
 * Builds every report and delivers them one at a time. A rejected delivery
 * stops the run with a ReportSinkError; earlier deliveries are not undone.
 */
export async function publishDisciplineReports(
  records: readonly IncidentRecord[],
  sink: DisciplineReportSink,
  options: ReportOptions = {}
): Promise<ReportRunSummary> {
  const reports = buildDisciplineReports(records, options);

  for (const report of reports) {
    try {
      await sink.write(report);
    } catch (err) {
      logger.error('Report sink rejected report', {
        label: report.label,
        scope: report.scope,
        error: err instanceof Error ? err.message : String(err),
      });
      throw new ReportSinkError(report.label, err);
    }
  }

  if (sink.flush) {
    try {
      await sink.flush();
    } catch (err) {
      throw new ReportSinkError('flush', err);
    }
  }

  const summary: ReportRunSummary = {
    reportCount: reports.length,
    buildingCount: reports.length - 1,
    recordCount: records.length,
  };
  logger.info('Discipline reports published', { ...summary });
  return summary;
}
