import { DomainError } from './DomainError';

/**
 * Thrown when the employee file lacks one or more required columns.
 * Fatal for the load call that raised it.
 */
export class SchemaError extends DomainError {
  public readonly missingColumns: string[];

  public constructor(filePath: string, missingColumns: string[]) {
    super(`Missing required columns in ${filePath}: ${missingColumns.join(', ')}`);
    this.missingColumns = missingColumns;
  }
}
