import { DomainError } from './DomainError';

/**
 * Thrown (or collected) when a date cell cannot be parsed.
 * Recoverable: the field becomes absent on that record and the row is kept.
 */
export class ParseError extends DomainError {
  public constructor(
    public readonly field: string,
    public readonly value: string,
    public readonly rowNumber: number
  ) {
    super(`Invalid ${field} date "${value}" on row ${rowNumber}. Must be a valid date in YYYY-MM-DD format.`);
  }
}
