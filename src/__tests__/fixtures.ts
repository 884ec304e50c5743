/**
 * Shared test fixtures: a small community calendar and an in-memory adapter
 */

import type { CalendarAdapter } from '../interfaces/CalendarAdapter.js';
import type { StatusPublisher } from '../interfaces/StatusPublisher.js';
import type { Calendar, ParseOptions } from '../types/calendar.js';
import type { PostedStatus, StatusOptions } from '../types/mastodon.js';
import { parseCalendar } from '../utils/icalParser.js';
import { FetchError } from '../utils/errors.js';

export const FEED_URL = 'https://example.com/community.ics';

/** 2024-01-15T12:00:00Z, a Monday */
export const REFERENCE = new Date(Date.UTC(2024, 0, 15, 12));

export const COMMUNITY_ICS = [
  'BEGIN:VCALENDAR',
  'VERSION:2.0',
  'BEGIN:VEVENT',
  'UID:yesterday',
  "SUMMARY:Yesterday's meetup",
  'DTSTART:20240114T120000Z',
  'END:VEVENT',
  'BEGIN:VEVENT',
  'UID:hack-night',
  'SUMMARY:Hack night',
  'LOCATION:Makerspace',
  'URL:https://example.com/hack',
  'DTSTART;TZID=Europe/Berlin:20240116T190000',
  'DTEND;TZID=Europe/Berlin:20240116T220000',
  'END:VEVENT',
  'BEGIN:VEVENT',
  'UID:broken',
  'SUMMARY:Mystery event',
  'DTSTART:soon',
  'END:VEVENT',
  'BEGIN:VEVENT',
  'UID:picnic',
  'SUMMARY:Picnic',
  'DTSTART;VALUE=DATE:20240120',
  'END:VEVENT',
  'BEGIN:VEVENT',
  'UID:talk',
  'SUMMARY:Lightning talks',
  'DTSTART:20240115T130000Z',
  'END:VEVENT',
  'END:VCALENDAR'
].join('\r\n');

/** Entries of COMMUNITY_ICS after REFERENCE, as formatEventEntry renders them */
export const COMMUNITY_ENTRIES = [
  'Mon 15 Jan 2024, 13:00: Lightning talks',
  'Tue 16 Jan 2024, 19:00: Hack night @ Makerspace\nhttps://example.com/hack',
  'Sat 20 Jan 2024: Picnic'
];

/**
 * Serves documents from memory; unknown locators answer like a 404
 */
export class MockCalendarAdapter implements CalendarAdapter {
  readonly requests: Array<{ locator: string; options?: ParseOptions }> = [];
  private failure?: Error;

  constructor(private readonly documents: Record<string, string> = { [FEED_URL]: COMMUNITY_ICS }) {}

  setFailure(error?: Error): void {
    this.failure = error;
  }

  async fetchCalendarText(locator: string): Promise<string> {
    if (this.failure) {
      throw this.failure;
    }
    const document = this.documents[locator];
    if (document === undefined) {
      throw new FetchError('http-status', locator, 'HTTP 404: Not Found', { status: 404 });
    }
    return document;
  }

  async fetchCalendar(locator: string, options?: ParseOptions): Promise<Calendar> {
    this.requests.push({ locator, options });
    return parseCalendar(await this.fetchCalendarText(locator), options);
  }
}

export class MockPublisher implements StatusPublisher {
  readonly posted: Array<{ status: string; options?: StatusOptions }> = [];

  async postStatus(status: string, options?: StatusOptions): Promise<PostedStatus> {
    this.posted.push({ status, options });
    return { id: String(this.posted.length), url: `https://mastodon.example/@events/${this.posted.length}` };
  }
}
