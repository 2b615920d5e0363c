/**
 * Lays a discipline report out as abstract named sheets: a "Summary" sheet with
 * one section per metric and a "Detailed Log Entries" sheet with the raw records.
 * Cell styling and file formats belong to whichever sink consumes these.
 */

import type {
  DisciplineReport,
  IncidentFieldValue,
  IncidentRecord,
  MetricCell,
  MetricTable,
  MetricsSet,
} from '../types/discipline.types';

export const SUMMARY_SHEET = 'Summary';
export const DETAIL_SHEET = 'Detailed Log Entries';
export const NO_DATA_PLACEHOLDER = 'No Data Available';

export type SheetCell = MetricCell | boolean | null;

export interface SheetSection {
  title: string;
  header: string[];
  rows: SheetCell[][];
  /** Set when the source table had no rows; `rows` then holds the placeholder. */
  empty: boolean;
}

export interface SummarySheet {
  name: typeof SUMMARY_SHEET;
  sections: SheetSection[];
}

export interface DetailSheet {
  name: typeof DETAIL_SHEET;
  header: string[];
  rows: SheetCell[][];
}

export interface ReportLayout {
  scope: DisciplineReport['scope'];
  label: string;
  summary: SummarySheet;
  detail: DetailSheet;
}

function tableSection(title: string, table: MetricTable): SheetSection {
  const [first] = table.rows;
  if (!first) {
    return { title, header: [], rows: [[NO_DATA_PLACEHOLDER]], empty: true };
  }
  const header = Object.keys(first);
  return {
    title,
    header,
    rows: table.rows.map((row) => header.map((column) => row[column] ?? null)),
    empty: false,
  };
}

export function layoutSummarySheet(metrics: MetricsSet): SummarySheet {
  const sections: SheetSection[] = [];
  for (const metric of metrics) {
    const { result } = metric;
    if (result.kind === 'table') {
      sections.push(tableSection(metric.name, result.table));
    } else {
      sections.push(tableSection(`${metric.name} / ${result.first.name}`, result.first));
      sections.push(tableSection(`${metric.name} / ${result.second.name}`, result.second));
    }
  }
  return { name: SUMMARY_SHEET, sections };
}

function toCell(value: IncidentFieldValue): SheetCell {
  if (value === undefined) return null;
  if (typeof value === 'number' && !Number.isFinite(value)) return null;
  return value;
}

export function layoutDetailSheet(records: readonly IncidentRecord[]): DetailSheet {
  const header: string[] = [];
  const seen = new Set<string>();
  for (const record of records) {
    for (const column of Object.keys(record)) {
      if (seen.has(column)) continue;
      seen.add(column);
      header.push(column);
    }
  }
  return {
    name: DETAIL_SHEET,
    header,
    rows: records.map((record) => header.map((column) => toCell(record[column]))),
  };
}

export function layoutReportSheets(report: DisciplineReport): ReportLayout {
  return {
    scope: report.scope,
    label: report.label,
    summary: layoutSummarySheet(report.metrics),
    detail: layoutDetailSheet(report.records),
  };
}

function csvCell(value: MetricCell): string {
  const text = String(value);
  return /[",\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

function csvBlock(table: MetricTable): string {
  const [first] = table.rows;
  if (!first) return '';
  const header = Object.keys(first);
  const lines = [header.map(csvCell).join(',')];
  for (const row of table.rows) {
    lines.push(header.map((column) => csvCell(row[column] ?? '')).join(','));
  }
  return `${lines.join('\n')}\n\n`;
}

/**
 * Consolidated CSV export: one block per table (header, rows, blank line).
 * Empty tables are skipped.
 */
export function flattenMetricsToCsv(metrics: MetricsSet): string {
  let out = '';
  for (const { result } of metrics) {
    if (result.kind === 'table') out += csvBlock(result.table);
    else out += csvBlock(result.first) + csvBlock(result.second);
  }
  return out;
}
