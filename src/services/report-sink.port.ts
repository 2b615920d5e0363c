import type { DisciplineReport } from '../types/discipline.types';

export interface DisciplineReportSink {
  write(report: DisciplineReport): Promise<void>;
  flush?(): Promise<void>;
}
