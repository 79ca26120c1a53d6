#!/usr/bin/env node

/**
 * Timecard MCP Server
 *
 * Personal work-hour tracking over the Model Context Protocol: start and
 * finish sessions, browse history and summarize hours per week or month.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { logger } from './utils/logger.js';
import { getConfig } from './config/index.js';
import { handleToolCall, getToolDefinitions } from './tools/index.js';
import { createContext, closeContext, flushContext } from './services/context.js';
import type { TimecardContext } from './services/context.js';
import { startHttpTransport, stopHttpTransport, isHttpEnabled } from './transports/index.js';

let context: TimecardContext | null = null;

async function main(): Promise<void> {
  const config = getConfig();
  logger.setLevel(config.settings.log_level);

  logger.info('Starting Timecard MCP Server', {
    storage: config.storage.path,
    logLevel: config.settings.log_level,
    weekStartsOn: config.settings.week_starts_on,
    geocoding: config.geocoding.enabled,
  });

  const ctx = createContext(config);
  context = ctx;

  const server = new Server(
    {
      name: 'timecard-mcp',
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: getToolDefinitions(),
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    logger.debug(`Tool call: ${name}`, args);

    try {
      const result = await handleToolCall(name, args ?? {}, ctx);
      return {
        content: [
          {
            type: 'text',
            text: JSON.stringify(result, null, 2),
          },
        ],
        ...(result.success ? {} : { isError: true }),
      };
    } catch (error) {
      logger.error(`Tool error: ${name}`, error);
      return {
        content: [
          {
            type: 'text',
            text: JSON.stringify({
              success: false,
              error: error instanceof Error ? error.message : String(error),
            }),
          },
        ],
        isError: true,
      };
    }
  });

  if (isHttpEnabled()) {
    await startHttpTransport(ctx);
    logger.info('Server running with HTTP transport');
  } else {
    const transport = new StdioServerTransport();
    await server.connect(transport);
    logger.info('Server connected with stdio transport');
  }
}

// Persist everything before the process goes away
async function shutdown(signal: string): Promise<void> {
  logger.info(`Shutting down (${signal})...`);
  if (isHttpEnabled()) {
    await stopHttpTransport();
  }
  let exitCode = 0;
  if (context) {
    try {
      closeContext(context);
    } catch (error) {
      logger.error('Failed to flush state on shutdown', error);
      exitCode = 1;
    }
    context = null;
  }
  logger.info('Shutdown complete');
  process.exit(exitCode);
}

function onSignal(signal: string): void {
  shutdown(signal).catch((error) => {
    logger.error('Shutdown failed', error);
    process.exit(1);
  });
}

process.on('SIGINT', () => onSignal('SIGINT'));
process.on('SIGTERM', () => onSignal('SIGTERM'));
process.on('beforeExit', () => {
  if (context) {
    try {
      flushContext(context);
    } catch (error) {
      logger.error('Failed to flush state before exit', error);
    }
  }
});

main().catch((error) => {
  logger.error('Fatal error', error);
  process.exit(1);
});
