/**
 * Server module exports
 */

export { MCPProtocolHandler } from './MCPProtocolHandler.js';
export { ToolRegistry, type ToolHandler, type ValidationResult } from './ToolRegistry.js';
export {
  GET_UPCOMING_EVENTS_TOOL,
  COMPOSE_ANNOUNCEMENT_TOOL,
  ALL_TOOLS
} from './tools/ToolDefinitions.js';
export {
  handleGetUpcomingEvents,
  handleComposeAnnouncement,
  convertEventToSerializable
} from './tools/ToolHandlers.js';
