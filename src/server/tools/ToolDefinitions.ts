/**
 * MCP Tool Definitions - Defines the schema and metadata for all MCP tools
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';

const UPCOMING_QUERY_PROPERTIES = {
  calendar_url: {
    type: 'string',
    pattern: '^(https?|webcals?)://',
    description: 'Calendar feed to read (http, https, webcal or webcals); defaults to the configured feed'
  },
  reference_time: {
    type: 'string',
    pattern: '^\\d{8}(T\\d{6}Z?)?$',
    description: 'Instant to look ahead from, e.g. 20240115T100000Z; defaults to now'
  },
  limit: {
    type: 'integer',
    minimum: 0,
    description: 'Maximum number of events; defaults to the configured maxEvents'
  }
};

export const GET_UPCOMING_EVENTS_TOOL: Tool = {
  name: 'get_upcoming_events',
  description: 'List the next events of a calendar feed, earliest first',
  inputSchema: {
    type: 'object',
    properties: UPCOMING_QUERY_PROPERTIES,
    additionalProperties: false
  }
};

export const COMPOSE_ANNOUNCEMENT_TOOL: Tool = {
  name: 'compose_announcement',
  description: 'Compose the status text that would be posted for the upcoming events',
  inputSchema: {
    type: 'object',
    properties: UPCOMING_QUERY_PROPERTIES,
    additionalProperties: false
  }
};

export const ALL_TOOLS: Tool[] = [
  GET_UPCOMING_EVENTS_TOOL,
  COMPOSE_ANNOUNCEMENT_TOOL
];
