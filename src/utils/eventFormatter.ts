/**
 * Human-readable rendering of events and of the status text posted for them
 */

import type { CalendarEvent } from '../types/calendar.js';
import { isSupportedTimeZone, toZonedDateTime } from './timezone.js';

export const DATE_TIME_FORMAT = 'ccc d LLL yyyy, HH:mm';
export const DATE_FORMAT = 'ccc d LLL yyyy';

export interface DisplayOptions {
  locale?: string;
  /** Zone UTC timestamps are shown in; zoned and floating times keep their own */
  displayTimeZone?: string;
}

export interface AnnouncementOptions extends DisplayOptions {
  heading?: string;
  emptyMessage?: string;
  /** Mastodon's default status limit */
  maxLength?: number;
}

export const DEFAULT_HEADING = 'Upcoming events:';
export const DEFAULT_EMPTY_MESSAGE = 'No upcoming events.';
export const DEFAULT_MAX_LENGTH = 500;

const UNTITLED = 'Untitled event';
const NO_DATE = 'Date to be announced';

/**
 * True when Intl can format dates for the tag; malformed tags such as
 * `en_US` make Intl throw
 */
export function isSupportedLocale(locale: string): boolean {
  try {
    return Intl.DateTimeFormat.supportedLocalesOf(locale).length > 0;
  } catch {
    return false;
  }
}

/**
 * Renders the start of an event, or undefined when it has none
 */
export function display(event: Readonly<CalendarEvent>, options: DisplayOptions = {}): string | undefined {
  if (!event.start) {
    return undefined;
  }

  const utcZone = options.displayTimeZone && isSupportedTimeZone(options.displayTimeZone)
    ? options.displayTimeZone
    : 'UTC';

  const locale = options.locale && isSupportedLocale(options.locale) ? options.locale : 'en';

  const dt = toZonedDateTime(event.start, utcZone).setLocale(locale);
  return dt.toFormat(event.start.dateOnly ? DATE_FORMAT : DATE_TIME_FORMAT);
}

/**
 * One entry of an announcement: "<when>: <summary> @ <location>" and the URL
 * on its own line
 */
export function formatEventEntry(event: Readonly<CalendarEvent>, options: DisplayOptions = {}): string {
  let entry = `${display(event, options) ?? NO_DATE}: ${event.summary ?? UNTITLED}`;
  if (event.location) {
    entry += ` @ ${event.location}`;
  }
  if (event.url) {
    entry += `\n${event.url}`;
  }
  return entry;
}

/**
 * Builds the status text for a list of upcoming events. Entries that would
 * push the text past `maxLength` are left out.
 */
export function composeAnnouncement(events: readonly Readonly<CalendarEvent>[], options: AnnouncementOptions = {}): string {
  const maxLength = options.maxLength ?? DEFAULT_MAX_LENGTH;

  if (events.length === 0) {
    return truncate(options.emptyMessage ?? DEFAULT_EMPTY_MESSAGE, maxLength);
  }

  let text = options.heading ?? DEFAULT_HEADING;
  let included = 0;

  for (const event of events) {
    const candidate = `${text}\n\n${formatEventEntry(event, options)}`;
    if (characterCount(candidate) > maxLength) {
      if (included === 0) {
        text = truncate(candidate, maxLength);
      }
      break;
    }
    text = candidate;
    included++;
  }

  return text;
}

// Mastodon counts code points, not UTF-16 units
function characterCount(text: string): number {
  return Array.from(text).length;
}

function truncate(text: string, maxLength: number): string {
  const characters = Array.from(text);
  if (characters.length <= maxLength) {
    return text;
  }
  return `${characters.slice(0, Math.max(0, maxLength - 1)).join('')}…`;
}
