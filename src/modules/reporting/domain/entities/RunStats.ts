import type { DateTime } from 'luxon';
import type { EventCategory, EventMatch } from '../../../celebration/domain/entities/EventMatch';
import type { CalendarDate } from '../../../../shared/value-objects/CalendarDate';

export interface CategoryCounters {
  cardsGenerated: number;
  succeeded: number;
  failed: number;
}

export interface ErrorEntry {
  timestamp: DateTime;
  message: string;
  /** Text of the underlying exception, when there was one */
  exception: string | null;
}

/**
 * Everything accumulated over one run
 */
export interface RunStats {
  /** The day being processed */
  date: CalendarDate;
  startedAt: DateTime;
  /** Set by finalize() */
  endedAt: DateTime | null;
  counters: Readonly<Record<EventCategory, Readonly<CategoryCounters>>>;
  matches: readonly EventMatch[];
  errors: readonly ErrorEntry[];
}
