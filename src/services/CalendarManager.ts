/**
 * Calendar Manager - fetches the configured feed, selects upcoming events
 * and turns them into the status text that gets posted
 */

import { CalendarAdapter } from '../interfaces/CalendarAdapter.js';
import { StatusPublisher } from '../interfaces/StatusPublisher.js';
import { ICalAdapter } from '../adapters/ICalAdapter.js';
import type { Calendar } from '../types/calendar.js';
import type { AppConfig } from '../types/config.js';
import type { PostedStatus, StatusVisibility } from '../types/mastodon.js';
import { upcomingLimited, type SelectableEvent } from '../utils/eventSelector.js';
import { composeAnnouncement, type AnnouncementOptions } from '../utils/eventFormatter.js';

export interface CalendarManagerConfig extends AnnouncementOptions {
  /** Feed used when a query names none */
  defaultLocator: string;
  floatingTimeZone?: string;
  /** Limit applied when a query gives none; undefined means unlimited */
  maxEvents?: number;
  visibility?: StatusVisibility;
}

export interface UpcomingQuery {
  locator?: string;
  reference?: Date;
  limit?: number;
}

export interface UpcomingResult {
  locator: string;
  reference: Date;
  calendar: Calendar;
  events: SelectableEvent[];
}

export interface AnnouncementResult extends UpcomingResult {
  text: string;
  posted?: PostedStatus;
}

export class CalendarManager {
  private readonly config: CalendarManagerConfig;
  private readonly adapter: CalendarAdapter;
  private readonly now: () => Date;

  constructor(config: CalendarManagerConfig, adapter?: CalendarAdapter, now: () => Date = () => new Date()) {
    this.config = config;
    this.adapter = adapter ?? new ICalAdapter();
    this.now = now;
  }

  static fromConfig(config: AppConfig, adapter?: CalendarAdapter): CalendarManager {
    return new CalendarManager(
      {
        defaultLocator: config.webcal,
        floatingTimeZone: config.floatingTimeZone,
        displayTimeZone: config.displayTimeZone,
        locale: config.locale,
        maxEvents: config.maxEvents,
        heading: config.heading,
        emptyMessage: config.emptyMessage,
        visibility: config.visibility
      },
      adapter ?? new ICalAdapter({ httpTimeout: config.fetchTimeout })
    );
  }

  getConfig(): CalendarManagerConfig {
    return { ...this.config };
  }

  /**
   * Fetch and parse a feed, logging whatever the parser had to recover from
   */
  async loadCalendar(locator: string = this.config.defaultLocator): Promise<Calendar> {
    const startTime = Date.now();
    const calendar = await this.adapter.fetchCalendar(locator, {
      floatingTimeZone: this.config.floatingTimeZone
    });

    console.error(`Fetched ${calendar.events.length} events from ${locator} in ${Date.now() - startTime}ms`);
    for (const diagnostic of calendar.diagnostics) {
      const uid = diagnostic.uid ? ` (${diagnostic.uid})` : '';
      console.warn(`Calendar line ${diagnostic.line}${uid}: ${diagnostic.message}`);
    }

    return calendar;
  }

  /**
   * Upcoming events of a feed relative to `reference` (defaults to now)
   */
  async getUpcomingEvents(query: UpcomingQuery = {}): Promise<UpcomingResult> {
    const locator = query.locator ?? this.config.defaultLocator;
    const reference = query.reference ?? this.now();
    const calendar = await this.loadCalendar(locator);
    const events = upcomingLimited(calendar, reference, query.limit ?? this.config.maxEvents);

    return { locator, reference, calendar, events };
  }

  /**
   * Compose the status text for the upcoming events of a feed
   */
  async composeAnnouncement(query: UpcomingQuery = {}): Promise<AnnouncementResult> {
    const result = await this.getUpcomingEvents(query);
    return { ...result, text: composeAnnouncement(result.events, this.config) };
  }

  /**
   * Compose the announcement and publish it
   */
  async announce(publisher: StatusPublisher, query: UpcomingQuery = {}): Promise<AnnouncementResult> {
    const announcement = await this.composeAnnouncement(query);
    const posted = await publisher.postStatus(announcement.text, { visibility: this.config.visibility });
    console.error(`Posted announcement of ${announcement.events.length} events as status ${posted.id}`);
    return { ...announcement, posted };
  }
}
