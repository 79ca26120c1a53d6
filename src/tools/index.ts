/**
 * Tool registration and dispatch
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult } from '../types/index.js';
import type { TimecardContext } from '../services/context.js';
import {
  sessionStartTool,
  sessionStartHandler,
  sessionStatusTool,
  sessionStatusHandler,
  sessionFinishTool,
  sessionFinishHandler,
  sessionAbandonTool,
  sessionAbandonHandler,
} from './session.js';
import {
  recordAddTool,
  recordAddHandler,
  recordUpdateTool,
  recordUpdateHandler,
  recordDeleteTool,
  recordDeleteHandler,
} from './records.js';
import { historyTool, historyHandler } from './history.js';
import { summaryTool, summaryHandler } from './summary.js';
import { companiesTool, companiesHandler } from './companies.js';

export type ToolHandler = (
  args: Record<string, unknown>,
  context: TimecardContext
) => Promise<ToolResult>;

// Tool registry
const tools: Map<string, Tool> = new Map();
const handlers: Map<string, ToolHandler> = new Map();

function register(tool: Tool, handler: ToolHandler): void {
  tools.set(tool.name, tool);
  handlers.set(tool.name, handler);
}

/**
 * Register all tools
 */
export function registerTools(): void {
  // Session lifecycle
  register(sessionStartTool, sessionStartHandler);
  register(sessionStatusTool, sessionStatusHandler);
  register(sessionFinishTool, sessionFinishHandler);
  register(sessionAbandonTool, sessionAbandonHandler);

  // Records
  register(recordAddTool, recordAddHandler);
  register(recordUpdateTool, recordUpdateHandler);
  register(recordDeleteTool, recordDeleteHandler);

  // Views
  register(historyTool, historyHandler);
  register(summaryTool, summaryHandler);

  register(companiesTool, companiesHandler);
}

/**
 * Get all tool definitions
 */
export function getToolDefinitions(): Tool[] {
  if (tools.size === 0) {
    registerTools();
  }
  return Array.from(tools.values());
}

/**
 * Handle a tool call
 */
export async function handleToolCall(
  name: string,
  args: Record<string, unknown>,
  context: TimecardContext
): Promise<ToolResult> {
  if (handlers.size === 0) {
    registerTools();
  }

  const handler = handlers.get(name);
  if (!handler) {
    return {
      success: false,
      error: `Unknown tool: ${name}`,
      code: 'UNKNOWN_TOOL',
    };
  }

  return handler(args, context);
}
