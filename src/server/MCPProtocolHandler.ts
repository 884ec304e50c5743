/**
 * MCP Protocol Handler - Implements standard MCP server interface
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  ErrorCode,
  McpError
} from '@modelcontextprotocol/sdk/types.js';
import { ToolRegistry } from './ToolRegistry.js';
import { errorMessage } from '../utils/errors.js';
import type { MCPResponse } from '../types/mcp.js';

export class MCPProtocolHandler {
  private server: Server;
  private toolRegistry: ToolRegistry;

  constructor(name: string, version: string) {
    this.server = new Server(
      { name, version },
      { capabilities: { tools: {} } }
    );

    this.toolRegistry = new ToolRegistry();
    this.setupHandlers();
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      const tools = this.toolRegistry.getTools();
      console.error(`Returning ${tools.length} tools`);
      return { tools };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args = {} } = request.params;
      return this.callTool(name, args);
    });
  }

  /**
   * Validate, execute and wrap a tool call the way call_tool requests are answered
   */
  async callTool(name: string, args: Record<string, unknown>): Promise<CallToolResult> {
    console.error(`Executing tool: ${name} with args:`, JSON.stringify(args));

    if (!this.toolRegistry.hasTool(name)) {
      throw new McpError(ErrorCode.MethodNotFound, `Tool '${name}' not found`);
    }

    const validationResult = this.toolRegistry.validateToolParameters(name, args);
    if (!validationResult.valid) {
      throw new McpError(
        ErrorCode.InvalidParams,
        `Invalid parameters for tool '${name}': ${validationResult.errors.join(', ')}`
      );
    }

    let result: MCPResponse;
    try {
      result = await this.toolRegistry.executeTool(name, args);
    } catch (error) {
      throw new McpError(ErrorCode.InternalError, errorMessage(error));
    }

    if (result.error) {
      throw new McpError(
        ErrorCode.InternalError,
        result.error.message || 'Tool execution failed',
        { code: result.error.code, ...result.error.details }
      );
    }

    const response: CallToolResult = {
      content: [
        {
          type: 'text',
          text: JSON.stringify(result.content ?? null, null, 2)
        }
      ]
    };
    console.error(`Tool ${name} executed successfully`);
    return response;
  }

  /**
   * Get the tool registry for registering tools
   */
  getToolRegistry(): ToolRegistry {
    return this.toolRegistry;
  }

  /**
   * Connect the server to a transport
   */
  async connect(transport: Transport): Promise<void> {
    await this.server.connect(transport);
  }

  /**
   * Close the server connection
   */
  async close(): Promise<void> {
    await this.server.close();
  }
}
