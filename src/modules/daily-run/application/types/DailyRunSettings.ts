import type { EventCategory } from '../../../celebration/domain/entities/EventMatch';

/**
 * Template and text styling for one event category
 */
export interface CardSettings {
  templatePath: string;
  position: { x: number; y: number };
  fontSize: number;
  fontColor: string;
  customFontPath?: string;
  centerAlign: boolean;
}

export interface DailyRunSettings {
  employeeFile: string;
  /** Cards and the daily report are written here */
  outputDir: string;
  cards: Record<EventCategory, CardSettings>;
  /** IANA zone that decides which day "today" is; system zone when absent */
  timezone?: string;
}
