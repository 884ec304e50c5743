/**
 * Timezone and date/time utilities for iCalendar DATE and DATE-TIME values
 */

import { DateTime, Info } from 'luxon';
import type { EventTime } from '../types/calendar.js';

const DATE_TIME_PATTERN = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})(Z?)$/;
const DATE_PATTERN = /^(\d{4})(\d{2})(\d{2})$/;

export interface DateTimeOptions {
  /** TZID parameter of the property, if any */
  tzid?: string;
  /** Zone floating values are resolved in; defaults to the host zone */
  floatingTimeZone?: string;
  /** Receives non-fatal notices such as an unknown TZID */
  onWarning?: (message: string) => void;
}

interface WallClock {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

/**
 * Returns true when luxon can resolve the zone name
 */
export function isSupportedTimeZone(zone: string): boolean {
  return zone === 'local' || Info.isValidIANAZone(zone);
}

/**
 * Parses an iCalendar DATE or DATE-TIME value.
 *
 * `20240115T100000Z` is an absolute UTC instant, a value with a TZID is
 * local time in that zone, and anything else is floating and gets resolved
 * in `floatingTimeZone`. A TZID luxon cannot resolve degrades to floating.
 *
 * @throws Error when the value matches none of the supported forms
 */
export function parseICalDateTime(value: string, options: DateTimeOptions = {}): EventTime {
  if (!value) {
    throw new Error('DateTime value is required');
  }

  const dateTimeMatch = DATE_TIME_PATTERN.exec(value);
  const dateMatch = dateTimeMatch ? null : DATE_PATTERN.exec(value);

  let wallClock: WallClock;
  let isUtc = false;

  if (dateTimeMatch) {
    wallClock = {
      year: Number(dateTimeMatch[1]),
      month: Number(dateTimeMatch[2]),
      day: Number(dateTimeMatch[3]),
      hour: Number(dateTimeMatch[4]),
      minute: Number(dateTimeMatch[5]),
      second: Number(dateTimeMatch[6])
    };
    isUtc = dateTimeMatch[7] === 'Z';
  } else if (dateMatch) {
    wallClock = {
      year: Number(dateMatch[1]),
      month: Number(dateMatch[2]),
      day: Number(dateMatch[3]),
      hour: 0,
      minute: 0,
      second: 0
    };
  } else {
    throw new Error(`Invalid date format: ${value}`);
  }

  const dateOnly = dateMatch !== null;

  if (isUtc) {
    const dt = resolve(wallClock, 'UTC', value);
    return { kind: 'utc', epochMillis: dt.toMillis(), value, dateOnly };
  }

  const tzid = options.tzid?.trim();
  if (tzid) {
    if (Info.isValidIANAZone(tzid)) {
      const dt = resolve(wallClock, tzid, value);
      return { kind: 'zoned', tzid, epochMillis: dt.toMillis(), value, dateOnly };
    }
    options.onWarning?.(`Timezone ${tzid} not supported, treating ${value} as floating time`);
  }

  const dt = resolve(wallClock, options.floatingTimeZone ?? 'local', value);
  return { kind: 'floating', zone: dt.zoneName ?? 'UTC', epochMillis: dt.toMillis(), value, dateOnly };
}

/**
 * Parses a reference time such as `20240115T100000Z` with the same rules
 * as event timestamps.
 *
 * @throws Error when the value cannot be parsed
 */
export function parseReferenceTime(value: string, floatingTimeZone?: string): Date {
  const time = parseICalDateTime(value.trim(), { floatingTimeZone });
  return new Date(time.epochMillis);
}

/**
 * Converts an event time to a Date for callers that need one
 */
export function toDate(time: EventTime): Date {
  return new Date(time.epochMillis);
}

/**
 * Luxon DateTime positioned in the zone the time was interpreted in at parse time
 */
export function toZonedDateTime(time: EventTime, utcDisplayZone: string = 'UTC'): DateTime {
  const zone = time.kind === 'zoned' ? time.tzid : time.kind === 'floating' ? time.zone : utcDisplayZone;
  return DateTime.fromMillis(time.epochMillis, { zone });
}

function resolve(wallClock: WallClock, zone: string, value: string): DateTime {
  const dt = DateTime.fromObject(wallClock, { zone });
  if (!dt.isValid) {
    throw new Error(`Invalid date format: ${value} (${dt.invalidExplanation ?? dt.invalidReason ?? 'out of range'})`);
  }
  return dt;
}
