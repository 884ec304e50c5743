import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ICalAdapter } from '../ICalAdapter.js';
import { FetchError } from '../../utils/errors.js';

const SAMPLE_ICS = [
  'BEGIN:VCALENDAR',
  'VERSION:2.0',
  'PRODID:-//Test//Test//EN',
  'BEGIN:VEVENT',
  'UID:test-event-1',
  'DTSTART:20240115T100000Z',
  'DTEND:20240115T110000Z',
  'SUMMARY:Test Event',
  'LOCATION:Test Location',
  'END:VEVENT',
  'END:VCALENDAR'
].join('\r\n');

const calendarResponse = (body: string, contentType = 'text/calendar; charset=utf-8'): Response =>
  new Response(body, { status: 200, headers: { 'content-type': contentType } });

describe('ICalAdapter', () => {
  const mockFetch = vi.fn<typeof fetch>();
  let adapter: ICalAdapter;

  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
    adapter = new ICalAdapter();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('normalizeCalendarUrl', () => {
    it('should rewrite webcal and webcals to https', () => {
      expect(adapter.normalizeCalendarUrl('webcal://example.com/calendar.ics')).toBe('https://example.com/calendar.ics');
      expect(adapter.normalizeCalendarUrl('webcals://example.com/calendar.ics')).toBe('https://example.com/calendar.ics');
      expect(adapter.normalizeCalendarUrl('WEBCAL://Example.com/calendar.ics')).toBe('https://example.com/calendar.ics');
    });

    it('should keep http and https URLs', () => {
      expect(adapter.normalizeCalendarUrl('http://example.com/a.ics?key=1')).toBe('http://example.com/a.ics?key=1');
      expect(adapter.normalizeCalendarUrl('  https://example.com/a.ics ')).toBe('https://example.com/a.ics');
    });

    it('should reject locators that are not URLs', () => {
      expect(() => adapter.normalizeCalendarUrl('not a url')).toThrow(FetchError);
      expect(() => adapter.normalizeCalendarUrl('not a url')).toThrow('Invalid calendar URL: not a url');
    });

    it('should reject other schemes', () => {
      try {
        adapter.normalizeCalendarUrl('ftp://example.com/calendar.ics');
        expect.fail('expected normalizeCalendarUrl to throw');
      } catch (error) {
        expect(error).toBeInstanceOf(FetchError);
        expect(error).toMatchObject({ kind: 'invalid-locator', message: 'Unsupported calendar URL scheme: ftp:' });
      }
    });
  });

  describe('fetchCalendar', () => {
    it('should fetch and parse a webcal feed', async () => {
      mockFetch.mockResolvedValueOnce(calendarResponse(SAMPLE_ICS));

      const calendar = await adapter.fetchCalendar('webcal://example.com/calendar.ics');

      expect(mockFetch).toHaveBeenCalledTimes(1);
      expect(mockFetch).toHaveBeenCalledWith('https://example.com/calendar.ics', expect.objectContaining({
        headers: {
          'User-Agent': 'ical-to-masto/1.0',
          'Accept': 'text/calendar, text/plain, */*'
        }
      }));
      expect(calendar.events).toHaveLength(1);
      expect(calendar.events[0]).toMatchObject({
        uid: 'test-event-1',
        summary: 'Test Event',
        location: 'Test Location'
      });
    });

    it('should pass parse options through', async () => {
      mockFetch.mockResolvedValueOnce(calendarResponse('BEGIN:VEVENT\r\nDTSTART:20240115T090000\r\nEND:VEVENT'));

      const calendar = await adapter.fetchCalendar('https://example.com/calendar.ics', { floatingTimeZone: 'Asia/Tokyo' });

      expect(calendar.events[0].start).toMatchObject({ kind: 'floating', zone: 'Asia/Tokyo', epochMillis: Date.UTC(2024, 0, 15, 0) });
    });

    it('should warn about unexpected content types but still parse', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      mockFetch.mockResolvedValueOnce(calendarResponse(SAMPLE_ICS, 'text/html'));

      const calendar = await adapter.fetchCalendar('https://example.com/calendar.ics');

      expect(calendar.events).toHaveLength(1);
      expect(warn).toHaveBeenCalledWith('Unexpected content type from https://example.com/calendar.ics: text/html');
    });

    it('should report HTTP errors without retrying', async () => {
      mockFetch.mockResolvedValueOnce(new Response('gone', { status: 404, statusText: 'Not Found' }));

      const result = adapter.fetchCalendar('https://example.com/missing.ics');

      await expect(result).rejects.toBeInstanceOf(FetchError);
      await expect(result).rejects.toMatchObject({
        kind: 'http-status',
        status: 404,
        locator: 'https://example.com/missing.ics',
        message: 'HTTP 404: Not Found'
      });
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('should report network failures', async () => {
      mockFetch.mockRejectedValueOnce(new TypeError('getaddrinfo ENOTFOUND example.invalid'));

      await expect(adapter.fetchCalendar('https://example.invalid/calendar.ics')).rejects.toMatchObject({
        kind: 'network',
        message: 'Failed to fetch https://example.invalid/calendar.ics: getaddrinfo ENOTFOUND example.invalid'
      });
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('should report an empty document', async () => {
      mockFetch.mockResolvedValueOnce(calendarResponse('  \r\n'));

      await expect(adapter.fetchCalendar('https://example.com/calendar.ics')).rejects.toMatchObject({
        kind: 'empty-body',
        message: 'Empty calendar document from https://example.com/calendar.ics'
      });
    });

    it('should report invalid locators before fetching', async () => {
      await expect(adapter.fetchCalendar('mailto:someone@example.com')).rejects.toMatchObject({ kind: 'invalid-locator' });
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('should time out slow servers', async () => {
      const slowAdapter = new ICalAdapter({ httpTimeout: 10 });
      mockFetch.mockImplementationOnce((_input, init) => new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new DOMException('This operation was aborted', 'AbortError')));
      }));

      await expect(slowAdapter.fetchCalendar('https://example.com/slow.ics')).rejects.toMatchObject({
        kind: 'timeout',
        message: 'Timed out after 10ms fetching https://example.com/slow.ics'
      });
    });
  });
});
