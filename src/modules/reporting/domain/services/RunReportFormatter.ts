import type { DateTime } from 'luxon';
import type { RunStats } from '../entities/RunStats';
import { describeMatch } from '../../../celebration/domain/entities/EventMatch';

const RULE = '='.repeat(64);
const TIMESTAMP_FORMAT = "yyyy-MM-dd'T'HH:mm:ss.SSSZZ";

export type FinalizedRunStats = RunStats & { endedAt: DateTime };

/**
 * Renders the human-readable run report.
 *
 * Deterministic for given stats. Sections listing today's birthdays,
 * anniversaries and errors are left out when empty.
 */
export function formatRunReport(stats: FinalizedRunStats): string {
  const { birthday, anniversary } = stats.counters;
  const birthdays = stats.matches.filter((match) => match.kind === 'birthday');
  const anniversaries = stats.matches.filter((match) => match.kind === 'anniversary');

  const lines: string[] = [
    `Daily Celebration Run Report - ${stats.date.toLongString()}`,
    RULE,
    '',
    'EXECUTION SUMMARY:',
    `- Start Time: ${stats.startedAt.toFormat('HH:mm:ss')}`,
    `- End Time: ${stats.endedAt.toFormat('HH:mm:ss')}`,
    `- Duration: ${stats.endedAt.diff(stats.startedAt).toFormat('hh:mm:ss')}`,
    '',
    'BIRTHDAY PROCESSING:',
    `- Cards Generated: ${birthday.cardsGenerated}`,
    `- Sent Successfully: ${birthday.succeeded}`,
    `- Failed: ${birthday.failed}`,
    `- Birthdays Today: ${birthdays.length}`,
    '',
    'ANNIVERSARY PROCESSING:',
    `- Cards Generated: ${anniversary.cardsGenerated}`,
    `- Sent Successfully: ${anniversary.succeeded}`,
    `- Failed: ${anniversary.failed}`,
    `- Anniversaries Today: ${anniversaries.length}`,
    '',
    'TOTAL SUMMARY:',
    `- Total Cards Generated: ${birthday.cardsGenerated + anniversary.cardsGenerated}`,
    `- Total Sent: ${birthday.succeeded + anniversary.succeeded}`,
    `- Total Failed: ${birthday.failed + anniversary.failed}`,
    `- Total Errors: ${stats.errors.length}`,
  ];

  if (birthdays.length > 0) {
    lines.push('', 'BIRTHDAYS TODAY:', ...birthdays.map((match) => `- ${describeMatch(match)}`));
  }

  if (anniversaries.length > 0) {
    lines.push(
      '',
      'ANNIVERSARIES TODAY:',
      ...anniversaries.map((match) => `- ${describeMatch(match)}`)
    );
  }

  if (stats.errors.length > 0) {
    lines.push('', `ERRORS ENCOUNTERED (${stats.errors.length}):`);
    stats.errors.forEach((entry, index) => {
      lines.push(`${index + 1}. ${entry.timestamp.toFormat(TIMESTAMP_FORMAT)} - ${entry.message}`);
      if (entry.exception !== null) {
        lines.push(`   Exception: ${entry.exception}`);
      }
    });
  }

  return `${lines.join('\n')}\n`;
}
