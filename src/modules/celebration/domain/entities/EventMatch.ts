import type { EmployeeRecord } from '../../../employee/domain/entities/EmployeeRecord';

/**
 * Event categories, also used as the output file name prefix
 */
export type EventCategory = 'birthday' | 'anniversary';

export interface BirthdayMatch {
  readonly kind: 'birthday';
  readonly record: EmployeeRecord;
  /** today.year - birthday.year */
  readonly age: number;
}

export interface AnniversaryMatch {
  readonly kind: 'anniversary';
  readonly record: EmployeeRecord;
  /** today.year - anniversary.year */
  readonly years: number;
}

/**
 * An employee whose birthday or anniversary falls on the day being processed
 */
export type EventMatch = BirthdayMatch | AnniversaryMatch;

/**
 * Short human-readable description used in logs and the run report,
 * e.g. "Jane Smith (jane.smith@example.com) - Age: 34"
 */
export function describeMatch(match: EventMatch): string {
  const who = `${match.record.fullName} (${match.record.email})`;
  switch (match.kind) {
    case 'birthday':
      return `${who} - Age: ${match.age}`;
    case 'anniversary':
      return `${who} - ${match.years} ${match.years === 1 ? 'year' : 'years'}`;
  }
}
