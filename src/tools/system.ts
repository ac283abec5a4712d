import { performance } from 'node:perf_hooks';
import { AppConfig } from '../config.js';
import { readInteger, readString } from '../hal.js';
import { LoggerConfig, logger } from '../logging/index.js';
import { EmptySchema, SetLogLevelSchema } from '../schemas.js';
import { LOCAL, READ_ONLY, RegisteredTool, ToolContext, defineTool } from './registry.js';

export interface PingResult {
  status: 'ok';
  latency_ms: number;
  user_name: string;
  user_id: number | null;
  instance_url: string;
}

export async function systemPing(ctx: ToolContext): Promise<PingResult> {
  const start = performance.now();
  const me = await ctx.client.get('/api/v3/users/me', { tool: 'system_ping', signal: ctx.signal });
  const latency = performance.now() - start;

  return {
    status: 'ok',
    latency_ms: Math.round(latency * 100) / 100,
    user_name: readString(me, 'name') ?? 'Unknown',
    user_id: readInteger(me, 'id'),
    instance_url: ctx.client.baseUrl,
  };
}

export interface SystemToolsOptions {
  version: string;
  config: AppConfig;
}

export function systemTools(options: SystemToolsOptions): RegisteredTool[] {
  const { version, config } = options;

  return [
    defineTool({
      name: 'system_ping',
      title: 'Ping',
      description: `Check connectivity and credentials. Calls /api/v3/users/me.

RETURNS: { status: "ok", latency_ms, user_name, user_id, instance_url }.
A 401 here means the API key is wrong or expired.`,
      schema: EmptySchema,
      annotations: READ_ONLY,
      handler: async (_args, ctx) => systemPing(ctx),
    }),

    defineTool({
      name: 'cache_clear',
      title: 'Clear Metadata Cache',
      description: 'Drop cached types, statuses and priorities so the next lookup refetches them.',
      schema: EmptySchema,
      annotations: LOCAL,
      handler: async (_args, ctx) => {
        ctx.cache.clear();
        return { message: 'Metadata cache cleared', cache: ctx.cache.getStats() };
      },
    }),

    defineTool({
      name: 'get_status',
      title: 'Server Status',
      description: 'Get server status (config/cache/queue/logging/metrics)',
      schema: EmptySchema,
      annotations: READ_ONLY,
      handler: async (_args, ctx) => ({
        version,
        request_id: ctx.requestId,
        config: {
          base_url: config.baseUrl,
          transport: config.transport,
          request_timeout_ms: config.requestTimeoutMs,
          max_retries: config.maxRetries,
          retry_backoff_ms: config.retryBackoffMs,
          retry_on_429: config.retryOn429,
          max_concurrent_requests: config.maxConcurrentRequests,
          cache_ttl_seconds: config.cacheTtlSeconds,
        },
        cache: ctx.cache.getStats(),
        queue: ctx.client.getQueueStatus(),
        logging: logger.getConfig(),
        metrics: logger.getMetrics(),
      }),
    }),

    defineTool({
      name: 'set_log_level',
      title: 'Set Log Level',
      description: 'Change logging config at runtime',
      schema: SetLogLevelSchema,
      annotations: LOCAL,
      handler: async (args) => {
        const update: Partial<LoggerConfig> =
          args.level === 'off' ? { enabled: false } : { enabled: true, level: args.level };

        if (args.enable_mcp_logs !== undefined) update.mcpEnabled = args.enable_mcp_logs;
        if (args.enable_file_logs !== undefined) update.fileEnabled = args.enable_file_logs;
        if (args.enable_request_logs !== undefined) update.requestsEnabled = args.enable_request_logs;
        if (args.enable_metrics !== undefined) update.metricsEnabled = args.enable_metrics;

        logger.updateConfig(update);

        return {
          message: 'Logging configuration updated successfully',
          config: logger.getConfig(),
        };
      },
    }),
  ];
}
