import type { EventMatch } from '../entities/EventMatch';

export interface Greeting {
  /** Text drawn on the card; may contain a line break */
  cardText: string;
  /** Whether cardText is laid out line by line */
  multiline: boolean;
  subject: string;
}

/**
 * Card text and email subject for a matched event
 *
 * @example
 * composeGreeting(birthdayMatch);
 * // { cardText: 'Happy Birthday Jane', multiline: false, subject: 'Happy Birthday, Jane! 🎉' }
 */
export function composeGreeting(match: EventMatch): Greeting {
  const firstName = match.record.firstName;
  switch (match.kind) {
    case 'birthday':
      return {
        cardText: `Happy Birthday ${firstName}`,
        multiline: false,
        subject: `Happy Birthday, ${firstName}! 🎉`,
      };
    case 'anniversary':
      return {
        cardText: `Happy Anniversary\n${firstName}`,
        multiline: true,
        subject: `Happy Anniversary, ${firstName}! 💕`,
      };
  }
}
