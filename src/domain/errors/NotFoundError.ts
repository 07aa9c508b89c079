import { DomainError } from './DomainError';

export type MissingResourceType = 'employee-file' | 'template';

/**
 * NotFoundError
 *
 * Thrown when a file the run depends on does not exist on disk.
 *
 * A missing employee file is fatal for the load; a missing template only
 * skips the one event that needed it.
 */
export class NotFoundError extends DomainError {
  public constructor(
    public readonly resourceType: MissingResourceType,
    public readonly path: string
  ) {
    super(`${NotFoundError.describe(resourceType)} not found: ${path}`);
  }

  private static describe(resourceType: MissingResourceType): string {
    switch (resourceType) {
      case 'employee-file':
        return 'Employee file';
      case 'template':
        return 'Template image';
    }
  }
}
