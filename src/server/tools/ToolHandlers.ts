/**
 * MCP Tool Handlers - Implementation of tool logic
 */

import type {
  AnnouncementResponse,
  MCPError,
  MCPResponse,
  SerializedEvent,
  UpcomingEventsParams,
  UpcomingEventsResponse
} from '../../types/mcp.js';
import type { CalendarEvent } from '../../types/calendar.js';
import { CalendarManager } from '../../services/CalendarManager.js';
import { display, type DisplayOptions } from '../../utils/eventFormatter.js';
import { parseReferenceTime, toDate } from '../../utils/timezone.js';
import { FetchError, errorMessage } from '../../utils/errors.js';

/**
 * Handler for get_upcoming_events tool
 */
export async function handleGetUpcomingEvents(
  params: Record<string, unknown>,
  calendarManager: CalendarManager
): Promise<MCPResponse<UpcomingEventsResponse>> {
  const query = readUpcomingParams(params);
  const reference = resolveReference(query, calendarManager);
  if ('error' in reference) {
    return reference;
  }

  try {
    const result = await calendarManager.getUpcomingEvents({
      locator: query.calendar_url,
      reference: reference.date,
      limit: query.limit
    });
    const config = calendarManager.getConfig();
    const events = result.events.map(event => convertEventToSerializable(event, config));

    return {
      content: {
        events,
        total_count: events.length,
        calendar_url: result.locator,
        reference_time: result.reference.toISOString(),
        parsed_event_count: result.calendar.events.length,
        diagnostics_count: result.calendar.diagnostics.length,
        message: events.length === 0
          ? `No upcoming events after ${result.reference.toISOString()}`
          : `Found ${events.length} upcoming events`
      }
    };
  } catch (error) {
    console.error('Error in handleGetUpcomingEvents:', error);
    return fetchFailure(error, query);
  }
}

/**
 * Handler for compose_announcement tool
 */
export async function handleComposeAnnouncement(
  params: Record<string, unknown>,
  calendarManager: CalendarManager
): Promise<MCPResponse<AnnouncementResponse>> {
  const query = readUpcomingParams(params);
  const reference = resolveReference(query, calendarManager);
  if ('error' in reference) {
    return reference;
  }

  try {
    const result = await calendarManager.composeAnnouncement({
      locator: query.calendar_url,
      reference: reference.date,
      limit: query.limit
    });

    return {
      content: {
        text: result.text,
        event_count: result.events.length,
        calendar_url: result.locator,
        reference_time: result.reference.toISOString()
      }
    };
  } catch (error) {
    console.error('Error in handleComposeAnnouncement:', error);
    return fetchFailure(error, query);
  }
}

/**
 * Convert an event to the JSON shape returned by the tools
 */
export function convertEventToSerializable(event: Readonly<CalendarEvent>, options: DisplayOptions = {}): SerializedEvent {
  return {
    uid: event.uid ?? null,
    summary: event.summary ?? null,
    location: event.location ?? null,
    description: event.description ?? null,
    url: event.url ?? null,
    start: event.start ? toDate(event.start).toISOString() : null,
    end: event.end ? toDate(event.end).toISOString() : null,
    time_kind: event.start?.kind ?? null,
    tzid: event.start?.kind === 'zoned' ? event.start.tzid : null,
    all_day: event.start?.dateOnly ?? false,
    display: display(event, options) ?? null
  };
}

function readUpcomingParams(params: Record<string, unknown>): UpcomingEventsParams {
  const { calendar_url, reference_time, limit } = params;
  return {
    calendar_url: typeof calendar_url === 'string' ? calendar_url : undefined,
    reference_time: typeof reference_time === 'string' ? reference_time : undefined,
    limit: typeof limit === 'number' ? limit : undefined
  };
}

function resolveReference(
  query: UpcomingEventsParams,
  calendarManager: CalendarManager
): { date: Date | undefined } | { error: MCPError } {
  if (!query.reference_time) {
    return { date: undefined };
  }

  try {
    return { date: parseReferenceTime(query.reference_time, calendarManager.getConfig().floatingTimeZone) };
  } catch (error) {
    return {
      error: {
        code: 'INVALID_REFERENCE_TIME',
        message: 'Invalid reference_time. Use YYYYMMDDTHHMMSSZ format.',
        details: { reference_time: query.reference_time, error: errorMessage(error) }
      }
    };
  }
}

function fetchFailure(error: unknown, query: UpcomingEventsParams): MCPResponse<never> {
  if (error instanceof FetchError) {
    return {
      error: {
        code: 'FETCH_ERROR',
        message: error.message,
        details: { kind: error.kind, calendar_url: error.locator, status: error.status }
      }
    };
  }

  return {
    error: {
      code: 'CALENDAR_ERROR',
      message: 'Failed to read calendar',
      details: { calendar_url: query.calendar_url, error: errorMessage(error) }
    }
  };
}
