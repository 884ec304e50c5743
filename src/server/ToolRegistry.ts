/**
 * Tool Registry - tool definitions, their handlers and compiled input validators
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { Ajv, type ValidateFunction } from 'ajv';
import type { MCPResponse } from '../types/mcp.js';

export type ToolHandler = (params: Record<string, unknown>) => Promise<MCPResponse>;

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

interface RegisteredTool {
  tool: Tool;
  handler: ToolHandler;
  validate: ValidateFunction;
}

export class ToolRegistry {
  private readonly entries = new Map<string, RegisteredTool>();
  private readonly ajv = new Ajv({ allErrors: true });

  /**
   * Register a tool; its input schema is compiled once here
   */
  registerTool(tool: Tool, handler: ToolHandler): void {
    this.entries.set(tool.name, { tool, handler, validate: this.ajv.compile(tool.inputSchema) });
  }

  hasTool(name: string): boolean {
    return this.entries.has(name);
  }

  /**
   * Definitions in registration order, as list_tools reports them
   */
  getTools(): Tool[] {
    return Array.from(this.entries.values(), entry => entry.tool);
  }

  getToolCount(): number {
    return this.entries.size;
  }

  /**
   * Check arguments against the tool's input schema. Unknown tools have no
   * schema and pass.
   */
  validateToolParameters(toolName: string, params: unknown): ValidationResult {
    const entry = this.entries.get(toolName);
    if (!entry || entry.validate(params)) {
      return { valid: true, errors: [] };
    }

    const errors = (entry.validate.errors ?? []).map(error => `${error.instancePath || 'root'}: ${error.message}`);
    return { valid: false, errors: errors.length > 0 ? errors : ['Unknown validation error'] };
  }

  async executeTool(name: string, params: Record<string, unknown> = {}): Promise<MCPResponse> {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new Error(`No handler registered for tool '${name}'`);
    }
    return entry.handler(params);
  }
}
