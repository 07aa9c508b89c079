import type { EmployeeRecord } from '../../../employee/domain/entities/EmployeeRecord';
import type { CalendarDate } from '../../../../shared/value-objects/CalendarDate';
import type { AnniversaryMatch, BirthdayMatch } from '../entities/EventMatch';
import type { ILogger } from '../../../../shared/logger';

export interface MatchResult {
  birthdays: BirthdayMatch[];
  anniversaries: AnniversaryMatch[];
}

/**
 * EventMatcher - finds the records whose birthday or anniversary is today
 *
 * **Matching Rule:**
 * A date field matches when its month and day equal today's; the year is ignored.
 * Records whose field is absent (null) never match on that field.
 *
 * **Derived Values:**
 * age / years = today.year - field.year. This is only correct because a match
 * always happens on the exact month and day, so there is no "has the day
 * passed yet" adjustment.
 *
 * **Leap Day:**
 * A Feb 29 date only matches on Feb 29. In a non-leap year it matches neither
 * Feb 28 nor Mar 1.
 *
 * Output preserves input order; nothing is sorted or de-duplicated.
 */
export class EventMatcher {
  public constructor(private readonly logger: ILogger) {}

  public match(records: readonly EmployeeRecord[], today: CalendarDate): MatchResult {
    const birthdays: BirthdayMatch[] = [];
    const anniversaries: AnniversaryMatch[] = [];

    for (const record of records) {
      if (record.birthday && record.birthday.sharesMonthDayWith(today)) {
        birthdays.push({ kind: 'birthday', record, age: today.yearsSince(record.birthday) });
      }
      if (record.anniversary && record.anniversary.sharesMonthDayWith(today)) {
        anniversaries.push({
          kind: 'anniversary',
          record,
          years: today.yearsSince(record.anniversary),
        });
      }
    }

    this.logger.info({
      msg: 'Matched events for today',
      date: today.toString(),
      recordCount: records.length,
      birthdayCount: birthdays.length,
      anniversaryCount: anniversaries.length,
    });

    return { birthdays, anniversaries };
  }
}
