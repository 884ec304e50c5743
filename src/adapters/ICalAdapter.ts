import { CalendarAdapter } from '../interfaces/CalendarAdapter.js';
import type { Calendar, ParseOptions } from '../types/calendar.js';
import { parseCalendar } from '../utils/icalParser.js';
import { FetchError, errorMessage } from '../utils/errors.js';

export interface ICalAdapterOptions {
  /** Milliseconds before the request is aborted */
  httpTimeout?: number;
  userAgent?: string;
}

/**
 * Calendar adapter for iCal (.ics) feeds served over HTTP(S) or webcal
 */
export class ICalAdapter implements CalendarAdapter {
  private readonly httpTimeout: number;
  private readonly userAgent: string;

  constructor(options: ICalAdapterOptions = {}) {
    this.httpTimeout = options.httpTimeout ?? 30000; // 30 seconds
    this.userAgent = options.userAgent ?? 'ical-to-masto/1.0';
  }

  /**
   * Fetch and parse an iCal feed
   */
  async fetchCalendar(locator: string, options: ParseOptions = {}): Promise<Calendar> {
    const icalData = await this.fetchCalendarText(locator);
    return parseCalendar(icalData, options);
  }

  /**
   * Fetch iCal data with a single request. Failures are reported as
   * FetchError and never retried here.
   */
  async fetchCalendarText(locator: string): Promise<string> {
    const fetchUrl = this.normalizeCalendarUrl(locator);

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.httpTimeout);

    try {
      let response: Response;
      try {
        response = await fetch(fetchUrl, {
          signal: controller.signal,
          headers: {
            'User-Agent': this.userAgent,
            'Accept': 'text/calendar, text/plain, */*'
          }
        });
      } catch (error) {
        throw this.transportError(locator, error, timedOut);
      }

      if (!response.ok) {
        throw new FetchError('http-status', locator, `HTTP ${response.status}: ${response.statusText || 'Request failed'}`, {
          status: response.status
        });
      }

      const contentType = response.headers.get('content-type') || '';
      if (!contentType.includes('text/calendar') && !contentType.includes('text/plain')) {
        console.warn(`Unexpected content type from ${fetchUrl}: ${contentType || 'none'}`);
      }

      let body: string;
      try {
        body = await response.text();
      } catch (error) {
        throw this.transportError(locator, error, timedOut);
      }

      if (body.trim() === '') {
        throw new FetchError('empty-body', locator, `Empty calendar document from ${fetchUrl}`);
      }

      return body;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Normalize calendar URLs by converting webcal:// and webcals:// to https://
   *
   * @throws FetchError when the locator is not an http(s) or webcal URL
   */
  normalizeCalendarUrl(locator: string): string {
    const trimmed = locator.trim();
    const rewritten = trimmed.replace(/^webcals?:\/\//i, 'https://');

    let url: URL;
    try {
      url = new URL(rewritten);
    } catch (error) {
      throw new FetchError('invalid-locator', locator, `Invalid calendar URL: ${locator}`, { cause: error });
    }

    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      throw new FetchError('invalid-locator', locator, `Unsupported calendar URL scheme: ${url.protocol}`);
    }

    return url.toString();
  }

  private transportError(locator: string, error: unknown, timedOut: boolean): FetchError {
    if (timedOut) {
      return new FetchError('timeout', locator, `Timed out after ${this.httpTimeout}ms fetching ${locator}`, { cause: error });
    }
    return new FetchError('network', locator, `Failed to fetch ${locator}: ${errorMessage(error)}`, { cause: error });
  }
}
