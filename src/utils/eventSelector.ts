/**
 * Upcoming-event selection over a parsed calendar
 */

import type { Calendar, CalendarEvent, EventTime } from '../types/calendar.js';

export type SelectableEvent = Readonly<CalendarEvent> & { readonly start: EventTime };

/**
 * Events starting at or after `reference`, earliest first. Events sharing a
 * start time keep their calendar order; events without a start are skipped.
 */
export function upcoming(calendar: Calendar, reference: Date): SelectableEvent[] {
  const threshold = reference.getTime();

  return calendar.events
    .filter(hasStart)
    .filter(event => event.start.epochMillis >= threshold)
    // Array.prototype.sort is stable
    .sort((a, b) => a.start.epochMillis - b.start.epochMillis);
}

/**
 * Same as {@link upcoming}, truncated to `maxCount` entries when given
 */
export function upcomingLimited(calendar: Calendar, reference: Date, maxCount?: number): SelectableEvent[] {
  const events = upcoming(calendar, reference);
  if (maxCount === undefined) {
    return events;
  }
  return events.slice(0, Math.max(0, Math.floor(maxCount)));
}

export function hasStart(event: Readonly<CalendarEvent>): event is SelectableEvent {
  return event.start !== undefined;
}
