/**
 * MCP server startup: loads configuration, registers the calendar tools and
 * serves them over stdio
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  MCPProtocolHandler,
  GET_UPCOMING_EVENTS_TOOL,
  COMPOSE_ANNOUNCEMENT_TOOL,
  handleGetUpcomingEvents,
  handleComposeAnnouncement
} from './server/index.js';
import { ConfigManager } from './services/ConfigManager.js';
import { CalendarManager } from './services/CalendarManager.js';

export const SERVER_NAME = 'ical-to-masto';
export const SERVER_VERSION = '1.0.0';

export interface ServerContext {
  configManager: ConfigManager;
  calendarManager: CalendarManager;
  mcpHandler: MCPProtocolHandler;
  isShuttingDown: boolean;
}

/**
 * Register MCP tools with their handlers
 */
export function registerMCPTools(mcpHandler: MCPProtocolHandler, calendarManager: CalendarManager): void {
  const toolRegistry = mcpHandler.getToolRegistry();

  toolRegistry.registerTool(GET_UPCOMING_EVENTS_TOOL, params => handleGetUpcomingEvents(params, calendarManager));
  toolRegistry.registerTool(COMPOSE_ANNOUNCEMENT_TOOL, params => handleComposeAnnouncement(params, calendarManager));

  console.error(`Registered ${toolRegistry.getToolCount()} MCP tools`);
}

/**
 * Build every service the server needs without connecting a transport
 */
export async function initializeServer(configPath?: string): Promise<ServerContext> {
  console.error('Initializing core services...');

  const configManager = new ConfigManager(configPath);
  const config = await configManager.loadConfig();
  const calendarManager = CalendarManager.fromConfig(config);
  const mcpHandler = new MCPProtocolHandler(SERVER_NAME, SERVER_VERSION);

  registerMCPTools(mcpHandler, calendarManager);

  return { configManager, calendarManager, mcpHandler, isShuttingDown: false };
}

/**
 * Set up graceful shutdown handlers
 */
export function setupShutdownHandlers(context: ServerContext): void {
  const shutdown = async (signal: string): Promise<void> => {
    if (context.isShuttingDown) {
      console.error('Shutdown already in progress...');
      return;
    }

    console.error(`Received ${signal}, shutting down gracefully...`);
    context.isShuttingDown = true;

    try {
      await context.mcpHandler.close();
      console.error('Shutdown completed successfully');
      process.exit(0);
    } catch (error) {
      console.error('Error during shutdown:', error);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

/**
 * Start the MCP server on stdio
 */
export async function startServer(configPath?: string): Promise<ServerContext> {
  const context = await initializeServer(configPath);

  const transport = new StdioServerTransport();
  transport.onerror = (error: Error) => {
    console.error('MCP transport error:', error);
  };

  await context.mcpHandler.connect(transport);
  setupShutdownHandlers(context);

  console.error(`${SERVER_NAME} MCP server ready (feed: ${context.calendarManager.getConfig().defaultLocator})`);
  return context;
}
