import { DomainError } from './DomainError';

/**
 * ConfigError
 *
 * Thrown when required settings (template paths, employee file, numeric or
 * colour settings) are missing or malformed.
 *
 * Fatal: the run aborts before any record is processed.
 */
export class ConfigError extends DomainError {
  public readonly issues: string[];

  public constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.issues = issues;
  }
}
