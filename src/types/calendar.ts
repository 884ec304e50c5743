/**
 * Core calendar types shared by the parser, selector and formatter
 */

interface EventTimeBase {
  /** Instant used for ordering and comparison */
  epochMillis: number;
  /** Property value as it appeared in the feed */
  value: string;
  /** True for VALUE=DATE (all-day) values */
  dateOnly: boolean;
}

export interface UtcEventTime extends EventTimeBase {
  kind: 'utc';
}

export interface ZonedEventTime extends EventTimeBase {
  kind: 'zoned';
  tzid: string;
}

/**
 * A wall-clock time with no zone in the feed. `zone` is the zone it was
 * resolved in when the calendar was parsed.
 */
export interface FloatingEventTime extends EventTimeBase {
  kind: 'floating';
  zone: string;
}

export type EventTime = UtcEventTime | ZonedEventTime | FloatingEventTime;

export interface CalendarEvent {
  uid?: string;
  summary?: string;
  location?: string;
  description?: string;
  url?: string;
  start?: EventTime;
  end?: EventTime;
}

export interface ParseDiagnostic {
  /** 1-based index of the logical (unfolded) line */
  line: number;
  message: string;
  uid?: string;
}

export interface Calendar {
  readonly events: readonly Readonly<CalendarEvent>[];
  readonly diagnostics: readonly Readonly<ParseDiagnostic>[];
}

/**
 * One unfolded content line: NAME;PARAM=VALUE:VALUE
 */
export interface ContentLine {
  name: string;
  params: Map<string, string>;
  value: string;
}

export interface ParseOptions {
  /** IANA zone floating times are resolved in; defaults to the host zone */
  floatingTimeZone?: string;
}
