import type { Calendar, ParseOptions } from '../types/calendar.js';

/**
 * Interface for adapters that retrieve and parse a calendar feed
 */
export interface CalendarAdapter {
  /**
   * Fetch the raw document behind a feed locator
   */
  fetchCalendarText(locator: string): Promise<string>;

  /**
   * Fetch and parse a feed into a calendar
   */
  fetchCalendar(locator: string, options?: ParseOptions): Promise<Calendar>;
}
