import type { EmployeeRecord } from '../../domain/entities/EmployeeRecord';
import type { ParseError } from '../../../../domain/errors/ParseError';

/**
 * Result of a load that also reports the recoverable problems found on the way
 */
export interface RecordLoadResult {
  /** Every data row of the file, in file order */
  records: EmployeeRecord[];

  /** One entry per date cell that could not be parsed (field left absent) */
  parseErrors: ParseError[];
}

/**
 * IRecordStore Port Interface
 *
 * Loads employee records from a delimited file.
 *
 * **Error Handling:**
 * - Missing file: Throw NotFoundError
 * - Missing required column: Throw SchemaError
 * - Unparseable date: never thrown; the field is null and a ParseError is reported
 */
export interface IRecordStore {
  load(filePath: string): Promise<EmployeeRecord[]>;

  loadWithIssues(filePath: string): Promise<RecordLoadResult>;
}
