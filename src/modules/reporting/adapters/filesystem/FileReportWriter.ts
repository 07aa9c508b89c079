import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import type { IReportWriter } from '../../application/ports/IReportWriter';
import type { ILogger } from '../../../../shared/logger';
import type { CalendarDate } from '../../../../shared/value-objects/CalendarDate';

/**
 * `daily_report_YYYYMMDD.txt`
 */
export function reportFileName(date: CalendarDate): string {
  return `daily_report_${date.toCompactString()}.txt`;
}

/**
 * Writes run reports as UTF-8 text files. A re-run on the same day replaces
 * that day's report.
 */
export class FileReportWriter implements IReportWriter {
  public constructor(private readonly logger: ILogger) {}

  public async write(outputDir: string, date: CalendarDate, reportText: string): Promise<string> {
    await mkdir(outputDir, { recursive: true });
    const reportPath = join(outputDir, reportFileName(date));
    await writeFile(reportPath, reportText, 'utf-8');

    this.logger.info({ msg: 'Daily report saved', path: reportPath });
    return reportPath;
  }
}
