import { DateTime } from 'luxon';
import type { CategoryCounters, ErrorEntry, RunStats } from '../entities/RunStats';
import { formatRunReport } from './RunReportFormatter';
import type { EventCategory, EventMatch } from '../../../celebration/domain/entities/EventMatch';
import { RunStatsFinalizedError } from '../../../../domain/errors/RunStatsFinalizedError';
import { describeError } from '../../../../shared/logger';
import type { CalendarDate } from '../../../../shared/value-objects/CalendarDate';

export type Clock = () => DateTime;

/**
 * RunStatsAggregator - the single accumulator of one run
 *
 * **Lifecycle:**
 * - Created at run start (start time stamped from the clock)
 * - Mutated by the batch loop: counters only increase, lists only grow
 * - finalize() stamps the end time and produces the report, exactly once
 *
 * Any mutation after finalize() throws RunStatsFinalizedError.
 */
export class RunStatsAggregator {
  private readonly startedAt: DateTime;
  private endedAt: DateTime | null = null;
  private readonly counters: Record<EventCategory, CategoryCounters> = {
    birthday: { cardsGenerated: 0, succeeded: 0, failed: 0 },
    anniversary: { cardsGenerated: 0, succeeded: 0, failed: 0 },
  };
  private readonly matches: EventMatch[] = [];
  private readonly errors: ErrorEntry[] = [];

  public constructor(
    private readonly date: CalendarDate,
    private readonly clock: Clock = () => DateTime.now()
  ) {
    this.startedAt = clock();
  }

  public recordMatch(match: EventMatch): void {
    this.assertOpen('record a match');
    this.matches.push(match);
  }

  public recordCardGenerated(category: EventCategory): void {
    this.assertOpen('record a generated card');
    this.counters[category].cardsGenerated++;
  }

  public recordSuccess(category: EventCategory): void {
    this.assertOpen('record a success');
    this.counters[category].succeeded++;
  }

  /**
   * Counts a failed event and keeps the reason as an error entry
   */
  public recordFailure(category: EventCategory, reason: string, exception?: unknown): void {
    this.assertOpen('record a failure');
    this.counters[category].failed++;
    this.appendError(reason, exception);
  }

  public recordError(message: string, exception?: unknown): void {
    this.assertOpen('record an error');
    this.appendError(message, exception);
  }

  public get isFinalized(): boolean {
    return this.endedAt !== null;
  }

  /**
   * Current state; counters and lists are copies
   */
  public get snapshot(): RunStats {
    return {
      date: this.date,
      startedAt: this.startedAt,
      endedAt: this.endedAt,
      counters: {
        birthday: { ...this.counters.birthday },
        anniversary: { ...this.counters.anniversary },
      },
      matches: [...this.matches],
      errors: [...this.errors],
    };
  }

  /**
   * Stamps the end time and renders the plain-text run report
   */
  public finalize(): string {
    this.assertOpen('finalize');
    const endedAt = this.clock();
    this.endedAt = endedAt;
    return formatRunReport({ ...this.snapshot, endedAt });
  }

  private appendError(message: string, exception: unknown): void {
    this.errors.push({
      timestamp: this.clock(),
      message,
      exception: exception === undefined ? null : describeError(exception),
    });
  }

  private assertOpen(operation: string): void {
    if (this.endedAt !== null) {
      throw new RunStatsFinalizedError(operation);
    }
  }
}
