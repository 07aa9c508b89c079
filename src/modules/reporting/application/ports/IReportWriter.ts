import type { CalendarDate } from '../../../../shared/value-objects/CalendarDate';

/**
 * IReportWriter Port Interface
 *
 * Persists the finalized run report and returns where it was written.
 */
export interface IReportWriter {
  write(outputDir: string, date: CalendarDate, reportText: string): Promise<string>;
}
