import { DateTime } from 'luxon';

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * CalendarDate value object
 * A day on the calendar with no time-of-day or zone attached.
 *
 * Employee birthdays, anniversaries and "today" are all CalendarDates; the one
 * canonical text form is ISO-8601 (YYYY-MM-DD).
 */
export class CalendarDate {
  public readonly year: number;
  public readonly month: number;
  public readonly day: number;

  private constructor(value: DateTime) {
    this.year = value.year;
    this.month = value.month;
    this.day = value.day;
  }

  /**
   * Parses a strict YYYY-MM-DD string.
   * Returns null for any other shape or an impossible date (2023-02-29).
   */
  public static parse(text: string): CalendarDate | null {
    const trimmed = text.trim();
    if (!ISO_DATE_PATTERN.test(trimmed)) {
      return null;
    }
    const parsed = DateTime.fromFormat(trimmed, 'yyyy-MM-dd', { zone: 'utc' });
    return parsed.isValid ? new CalendarDate(parsed) : null;
  }

  public static of(year: number, month: number, day: number): CalendarDate {
    const value = DateTime.utc(year, month, day);
    if (!value.isValid) {
      throw new RangeError(`Invalid calendar date: ${year}-${month}-${day}`);
    }
    return new CalendarDate(value);
  }

  /**
   * The calendar day of an instant, as seen in the instant's own zone.
   */
  public static fromDateTime(dateTime: DateTime): CalendarDate {
    return CalendarDate.of(dateTime.year, dateTime.month, dateTime.day);
  }

  /**
   * Today's date in the given IANA zone (system zone when omitted).
   */
  public static today(zone?: string): CalendarDate {
    const now = zone ? DateTime.now().setZone(zone) : DateTime.now();
    return CalendarDate.fromDateTime(now);
  }

  /**
   * True when both dates fall on the same month and day, whatever the year.
   */
  public sharesMonthDayWith(other: CalendarDate): boolean {
    return this.month === other.month && this.day === other.day;
  }

  /**
   * Plain difference of calendar years (this.year - earlier.year).
   * No check of whether the month/day has been reached yet.
   */
  public yearsSince(earlier: CalendarDate): number {
    return this.year - earlier.year;
  }

  /**
   * Returns the date in ISO format (YYYY-MM-DD)
   */
  public toString(): string {
    return this.toDateTime().toFormat('yyyy-MM-dd');
  }

  /**
   * Returns the date as YYYYMMDD, used in output file names
   */
  public toCompactString(): string {
    return this.toDateTime().toFormat('yyyyMMdd');
  }

  /**
   * Returns the date as e.g. "October 12, 2024"
   */
  public toLongString(): string {
    return this.toDateTime().setLocale('en-US').toFormat('MMMM dd, yyyy');
  }

  public equals(other: CalendarDate): boolean {
    return this.year === other.year && this.month === other.month && this.day === other.day;
  }

  private toDateTime(): DateTime {
    return DateTime.utc(this.year, this.month, this.day);
  }
}
