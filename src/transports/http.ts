import express, { Request, Response } from 'express';
import type { Server as HttpServer } from 'node:http';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { MetadataCache } from '../cache.js';
import { AppConfig } from '../config.js';
import { MissingApiKeyError, RequestContext, seedFromHeaders } from '../context.js';
import { logger } from '../logging/index.js';
import { OpenProjectClient, USER_AGENT } from '../openproject-client.js';
import { createServer } from '../server.js';
import { ToolRegistry } from '../tools/index.js';

export interface HttpServerOptions {
  config: AppConfig;
  registry: ToolRegistry;
  cache: MetadataCache;
  version: string;
}

function rpcError(res: Response, status: number, code: number, message: string): void {
  res.status(status).json({ jsonrpc: '2.0', error: { code, message }, id: null });
}

function contextFor(req: Request, res: Response, config: AppConfig): RequestContext | null {
  try {
    return seedFromHeaders(req.headers, config);
  } catch (error) {
    if (error instanceof MissingApiKeyError) {
      rpcError(res, 401, -32001, error.message);
      return null;
    }
    throw error;
  }
}

export function createHttpApp(options: HttpServerOptions): express.Express {
  const { config, registry, cache, version } = options;
  const app = express();

  app.use('/mcp', express.json());

  app.get('/healthz', (_req, res) => {
    res.json({ status: 'ok', version });
  });

  // Stateless: every POST gets its own server, client and transport
  app.post('/mcp', async (req: Request, res: Response) => {
    const context = contextFor(req, res, config);
    if (!context) return;

    const client = new OpenProjectClient({
      baseUrl: context.baseUrl,
      apiKey: context.apiKey,
      timeoutMs: config.requestTimeoutMs,
      retry: {
        maxRetries: config.maxRetries,
        backoffBaseMs: config.retryBackoffMs,
        retryOn429: config.retryOn429,
      },
      maxConcurrentRequests: config.maxConcurrentRequests,
      userAgent: context.userAgent ? `${USER_AGENT} (${context.userAgent})` : USER_AGENT,
    });
    const server = createServer({ registry, client, cache, requestId: context.requestId, version });
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });

    res.on('close', () => {
      Promise.all([transport.close(), server.close()]).catch((error: unknown) => {
        logger.warning('Failed to close MCP transport', { request_id: context.requestId, error: String(error) }, 'http');
      });
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
      logger.debug('StreamableHTTP request handled', { request_id: context.requestId }, 'http');
    } catch (error) {
      logger.error('StreamableHTTP request failed', { request_id: context.requestId, error: String(error) }, 'http');
      if (!res.headersSent) {
        rpcError(res, 500, -32603, 'Internal server error');
      }
    }
  });

  app.get('/mcp', (_req, res) => {
    rpcError(res, 405, -32000, 'Method not allowed in stateless mode');
  });

  app.delete('/mcp', (_req, res) => {
    rpcError(res, 405, -32000, 'Method not allowed in stateless mode');
  });

  return app;
}

export async function startHttpServer(options: HttpServerOptions): Promise<HttpServer> {
  const app = createHttpApp(options);
  const { httpHost, httpPort } = options.config;

  return new Promise((resolve, reject) => {
    const httpServer = app.listen(httpPort, httpHost, () => {
      logger.info('HTTP server listening', { host: httpHost, port: httpPort }, 'http');
      resolve(httpServer);
    });
    httpServer.on('error', reject);
  });
}
