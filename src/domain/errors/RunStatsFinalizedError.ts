import { DomainError } from './DomainError';

/**
 * Thrown when run statistics are changed or finalized after the report was
 * produced. Statistics are consumed exactly once per run.
 */
export class RunStatsFinalizedError extends DomainError {
  public constructor(operation: string) {
    super(`Cannot ${operation}: run statistics are already finalized`);
  }
}
