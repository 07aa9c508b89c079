import type { CalendarDate } from '../../../../shared/value-objects/CalendarDate';

export const CARD_FILE_EXTENSION = 'jpg';

const PATH_SEPARATORS = /[\\/]/g;

// Keeps the card inside the output folder whatever the names contain.
function toFileNamePart(value: string): string {
  return value.replace(PATH_SEPARATORS, '_');
}

/**
 * `{category}_{firstName}_{lastName}_{YYYYMMDD}.jpg`
 *
 * Two people with the same name celebrating on the same day get the same file
 * name; the later card overwrites the earlier one. Slashes and backslashes
 * in a name become underscores.
 */
export function buildCardFileName(
  category: string,
  firstName: string,
  lastName: string,
  date: CalendarDate
): string {
  return `${category}_${toFileNamePart(firstName)}_${toFileNamePart(lastName)}_${date.toCompactString()}.${CARD_FILE_EXTENSION}`;
}
