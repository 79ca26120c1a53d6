/**
 * HTTP/SSE transport
 *
 * Alternative to stdio for web clients. Tool calls arrive on POST /message;
 * every committed store change is pushed to SSE subscribers.
 */

import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import type { Server as HttpServer } from 'http';
import { randomUUID } from 'crypto';
import { logger } from '../utils/logger.js';
import { handleToolCall, getToolDefinitions } from '../tools/index.js';
import type { TimecardContext } from '../services/context.js';
import type { StoreChangeEvent } from '../types/index.js';

interface SSEClient {
  id: string;
  response: Response;
}

export interface HttpTransportConfig {
  port: number;
  corsOrigin: string;
}

let clients: SSEClient[] = [];
let httpServer: HttpServer | null = null;
let unsubscribers: Array<() => void> = [];

/**
 * Get HTTP transport configuration from environment
 */
export function getHttpConfig(): HttpTransportConfig {
  return {
    port: parseInt(process.env.TIMECARD_HTTP_PORT || '3000', 10),
    corsOrigin: process.env.TIMECARD_HTTP_CORS_ORIGIN || '*',
  };
}

export function isHttpEnabled(): boolean {
  return process.env.TIMECARD_HTTP_ENABLED === 'true';
}

function broadcast(event: string, data: unknown): void {
  const message = `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
  for (const client of clients) {
    client.response.write(message);
  }
}

/**
 * Build the express app. Exposed separately so it can be mounted or tested.
 */
export function createHttpApp(context: TimecardContext, config: HttpTransportConfig): express.Express {
  const app = express();

  app.use(cors({ origin: config.corsOrigin }));
  app.use(express.json());

  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.debug(`HTTP ${req.method} ${req.path}`);
    next();
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      transport: 'http',
      clients: clients.length,
      records: context.store.size,
      in_progress: context.store.inProgress() !== null,
      timestamp: new Date().toISOString(),
    });
  });

  app.get('/sse', (req: Request, res: Response) => {
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no');

    const clientId = `client-${randomUUID()}`;
    res.write(`event: connected\ndata: ${JSON.stringify({ clientId })}\n\n`);

    clients.push({ id: clientId, response: res });
    logger.info(`SSE client connected: ${clientId} (total: ${clients.length})`);

    const heartbeat = setInterval(() => {
      res.write(`event: heartbeat\ndata: ${JSON.stringify({ timestamp: Date.now() })}\n\n`);
    }, 30000);

    req.on('close', () => {
      clearInterval(heartbeat);
      clients = clients.filter((c) => c.id !== clientId);
      logger.info(`SSE client disconnected: ${clientId} (total: ${clients.length})`);
    });
  });

  app.get('/tools', (_req: Request, res: Response) => {
    res.json({ tools: getToolDefinitions() });
  });

  app.post('/message', async (req: Request, res: Response) => {
    const body: unknown = req.body;
    const method = isRecord(body) ? body.method : undefined;
    const params = isRecord(body) && isRecord(body.params) ? body.params : {};

    if (method === 'tools/list') {
      res.json({ result: { tools: getToolDefinitions() } });
      return;
    }

    if (method === 'tools/call') {
      const name = params.name;
      if (typeof name !== 'string' || !name) {
        res.status(400).json({ error: 'Tool name is required' });
        return;
      }
      const args = isRecord(params.arguments) ? params.arguments : {};

      try {
        const result = await handleToolCall(name, args, context);
        broadcast('tool_result', { name, result });

        res.json({
          result: {
            content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
            ...(result.success ? {} : { isError: true }),
          },
        });
      } catch (error) {
        const errorMessage = error instanceof Error ? error.message : String(error);
        logger.error(`Tool error: ${name}`, error);
        res.status(500).json({
          error: errorMessage,
          result: {
            content: [{ type: 'text', text: JSON.stringify({ success: false, error: errorMessage }) }],
            isError: true,
          },
        });
      }
      return;
    }

    res.status(400).json({ error: `Unknown method: ${String(method)}` });
  });

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    logger.error('HTTP error', err);
    res.status(500).json({ error: err.message });
  });

  return app;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Create and start the HTTP server
 */
export async function startHttpTransport(context: TimecardContext): Promise<void> {
  const config = getHttpConfig();
  const app = createHttpApp(context, config);

  const forward = (event: StoreChangeEvent): void => broadcast('store_changed', event);
  unsubscribers = [context.store.subscribe(forward), context.companies.subscribe(forward)];

  return new Promise((resolve) => {
    httpServer = app.listen(config.port, () => {
      logger.info(`HTTP transport listening on port ${config.port}`);
      resolve();
    });
  });
}

/**
 * Stop the HTTP server
 */
export async function stopHttpTransport(): Promise<void> {
  for (const unsubscribe of unsubscribers) {
    unsubscribe();
  }
  unsubscribers = [];

  if (!httpServer) return;

  for (const client of clients) {
    client.response.end();
  }
  clients = [];

  return new Promise((resolve) => {
    httpServer?.close(() => {
      logger.info('HTTP transport stopped');
      httpServer = null;
      resolve();
    });
  });
}
