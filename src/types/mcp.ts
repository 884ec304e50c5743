/**
 * MCP-specific types and interfaces
 */

export interface UpcomingEventsParams {
  calendar_url?: string;
  reference_time?: string;
  limit?: number;
}

export interface MCPError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

export interface MCPResponse<T = unknown> {
  content?: T;
  error?: MCPError;
}

export interface SerializedEvent {
  uid: string | null;
  summary: string | null;
  location: string | null;
  description: string | null;
  url: string | null;
  start: string | null;
  end: string | null;
  time_kind: 'utc' | 'zoned' | 'floating' | null;
  tzid: string | null;
  all_day: boolean;
  display: string | null;
}

export interface UpcomingEventsResponse {
  events: SerializedEvent[];
  total_count: number;
  calendar_url: string;
  reference_time: string;
  parsed_event_count: number;
  diagnostics_count: number;
  message: string;
}

export interface AnnouncementResponse {
  text: string;
  event_count: number;
  calendar_url: string;
  reference_time: string;
}
