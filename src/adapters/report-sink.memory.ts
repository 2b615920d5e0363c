import type { DisciplineReportSink } from '../services/report-sink.port';
import { layoutReportSheets, type ReportLayout } from '../services/report-layout.service';
import type { DisciplineReport } from '../types/discipline.types';

/** Keeps laid-out reports in memory, in delivery order. */
export class InMemoryReportSink implements DisciplineReportSink {
  private readonly layouts: ReportLayout[] = [];
  private flushed = false;

  async write(report: DisciplineReport): Promise<void> {
    this.layouts.push(layoutReportSheets(report));
  }

  async flush(): Promise<void> {
    this.flushed = true;
  }

  getReports(): readonly ReportLayout[] {
    return this.layouts;
  }

  getReport(label: string): ReportLayout | undefined {
    return this.layouts.find((layout) => layout.label === label);
  }

  isFlushed(): boolean {
    return this.flushed;
  }

  clear(): void {
    this.layouts.length = 0;
    this.flushed = false;
  }
}
