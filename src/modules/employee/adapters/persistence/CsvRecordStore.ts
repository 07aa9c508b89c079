import { createReadStream, existsSync } from 'fs';
import csv from 'csv-parser';
import { EmployeeRecord } from '../../domain/entities/EmployeeRecord';
import type { IRecordStore, RecordLoadResult } from '../../application/ports/IRecordStore';
import { CalendarDate } from '../../../../shared/value-objects/CalendarDate';
import {
  EmployeeRowSchema,
  REQUIRED_EMPLOYEE_COLUMNS,
  type EmployeeRow,
} from '../../../../shared/validation/schemas';
import { NotFoundError } from '../../../../domain/errors/NotFoundError';
import { SchemaError } from '../../../../domain/errors/SchemaError';
import { ParseError } from '../../../../domain/errors/ParseError';
import type { ILogger } from '../../../../shared/logger';

interface RawTable {
  headers: string[];
  rows: unknown[];
}

/**
 * CsvRecordStore - IRecordStore implementation over a comma-delimited file
 *
 * **File Format:**
 * - Header row naming the columns: first_name,last_name,email,birthday[,anniversary]
 * - Extra columns are ignored
 * - Dates in ISO-8601 (YYYY-MM-DD); any other shape is treated as unparseable
 *
 * **Date Handling:**
 * - birthday: empty or unparseable → null, with a warning and a ParseError
 * - anniversary: empty → null silently; unparseable → null, with a warning and a ParseError
 *
 * The file is read afresh on every call; nothing is cached between loads.
 */
export class CsvRecordStore implements IRecordStore {
  public constructor(private readonly logger: ILogger) {}

  public async load(filePath: string): Promise<EmployeeRecord[]> {
    const { records } = await this.loadWithIssues(filePath);
    return records;
  }

  /**
   * Loads every data row and reports the date cells that could not be parsed
   *
   * @throws NotFoundError - The file does not exist
   * @throws SchemaError - A required column is missing from the header row
   */
  public async loadWithIssues(filePath: string): Promise<RecordLoadResult> {
    if (!existsSync(filePath)) {
      throw new NotFoundError('employee-file', filePath);
    }

    const table = await this.readTable(filePath);

    const missingColumns = REQUIRED_EMPLOYEE_COLUMNS.filter(
      (column) => !table.headers.includes(column)
    );
    if (missingColumns.length > 0) {
      throw new SchemaError(filePath, missingColumns);
    }

    const records: EmployeeRecord[] = [];
    const parseErrors: ParseError[] = [];

    table.rows.forEach((rawRow, index) => {
      // Header is line 1, first data row is line 2
      const rowNumber = index + 2;
      const row = EmployeeRowSchema.parse(rawRow);

      const birthday = this.parseDateCell('birthday', row.birthday, rowNumber, row, parseErrors);
      const anniversary =
        row.anniversary === ''
          ? null
          : this.parseDateCell('anniversary', row.anniversary, rowNumber, row, parseErrors);

      records.push(
        new EmployeeRecord({
          rowNumber,
          firstName: row.first_name,
          lastName: row.last_name,
          email: row.email,
          birthday,
          anniversary,
        })
      );
    });

    this.logger.info({
      msg: 'Loaded employee records',
      path: filePath,
      recordCount: records.length,
      invalidDateCount: parseErrors.length,
    });

    return { records, parseErrors };
  }

  private parseDateCell(
    field: 'birthday' | 'anniversary',
    value: string,
    rowNumber: number,
    row: EmployeeRow,
    parseErrors: ParseError[]
  ): CalendarDate | null {
    const parsed = CalendarDate.parse(value);
    if (parsed) {
      return parsed;
    }

    const error = new ParseError(field, value, rowNumber);
    parseErrors.push(error);
    this.logger.warn({
      msg: `Invalid ${field} date, field treated as absent`,
      rowNumber,
      email: row.email,
      value,
    });
    return null;
  }

  private readTable(filePath: string): Promise<RawTable> {
    return new Promise((resolve, reject) => {
      let headers: string[] = [];
      const rows: unknown[] = [];

      createReadStream(filePath)
        .on('error', reject)
        .pipe(
          csv({
            mapHeaders: ({ header }) => header.replace(/^\uFEFF/, '').trim(),
          })
        )
        .on('headers', (parsedHeaders: string[]) => {
          headers = parsedHeaders;
        })
        .on('data', (row: unknown) => {
          rows.push(row);
        })
        .on('error', reject)
        .on('end', () => {
          resolve({ headers, rows });
        });
    });
  }
}
