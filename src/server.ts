import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  CallToolResult,
  GetPromptRequestSchema,
  ListPromptsRequestSchema,
  ListToolsRequestSchema,
  Prompt,
} from '@modelcontextprotocol/sdk/types.js';
import { performance } from 'node:perf_hooks';
import { z } from 'zod';
import { MetadataCache } from './cache.js';
import { OpenProjectClientError } from './errors.js';
import { logger } from './logging/index.js';
import { OpenProjectClient } from './openproject-client.js';
import { ToolRegistry } from './tools/index.js';
import { truncateResponse } from './utils.js';

export const SERVER_NAME = 'openproject-mcp-server';

// ============================================
// PROMPT
// ============================================

export const usagePrompt: Prompt = {
  name: 'openproject-usage',
  description: 'How to work with OpenProject through this server',
  arguments: [],
};

export const usagePromptInstructions = `You are connected to an OpenProject instance through its API v3.

NAMES AND IDS:
- Projects, types, statuses, priorities and users can be given by name. Names are matched case-insensitively, exactly first, then as a substring.
- When a name matches several items the error lists the candidates with their ids; ask the user or retry with an id.
- Use resolve_* tools to check a name before writing, and list_types / list_statuses / list_priorities to see what exists.
- Types are resolved against the project's enabled types (resolve_type_for_project).

PAGING:
- List tools take offset (0-based, a multiple of page_size) and page_size (1..200).
- Continue with next_offset until it is null.

WRITING:
- update_work_package and update_status read the lockVersion first. On "lockVersion is outdated" re-fetch and retry.
- description and append_description are exclusive; use append_work_package_description to add text without replacing it.
- log_time takes durations such as "2h", "30m" or "1h 30m".

FILES:
- attach_file, download_attachment read and write on the machine running this server, not on the user's machine.

TROUBLESHOOTING:
- system_ping checks connectivity and the API key.
- get_status shows configuration, cache, queue and per-tool metrics; set_log_level changes logging at runtime.
- cache_clear drops cached types, statuses and priorities after an administrator changed them.`;

// ============================================
// ERROR FORMATTING
// ============================================

function errorResult(error: Record<string, unknown>): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify({ error }, null, 2) }],
    isError: true,
  };
}

export function toErrorResult(error: unknown): CallToolResult {
  if (error instanceof z.ZodError) {
    return errorResult({
      type: 'VALIDATION_ERROR',
      message: 'Invalid request parameters',
      details: error.errors.map((err) => ({
        path: err.path.join('.'),
        message: err.message,
        code: err.code,
      })),
    });
  }

  if (error instanceof OpenProjectClientError) {
    return errorResult(error.toJSON());
  }

  return errorResult({
    type: 'UNKNOWN_ERROR',
    message: error instanceof Error ? error.message : String(error),
  });
}

// ============================================
// SERVER
// ============================================

export interface ServerOptions {
  registry: ToolRegistry;
  client: OpenProjectClient;
  cache: MetadataCache;
  requestId: string;
  version: string;
}

/** One MCP server bound to one client; stdio builds it once, HTTP once per request. */
export function createServer(options: ServerOptions): Server {
  const { registry, client, cache, requestId, version } = options;

  const server = new Server(
    { name: SERVER_NAME, version },
    {
      capabilities: {
        tools: {},
        prompts: {},
        logging: {},
      },
      instructions: usagePromptInstructions,
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: registry.list() };
  });

  server.setRequestHandler(ListPromptsRequestSchema, async () => {
    return { prompts: [usagePrompt] };
  });

  server.setRequestHandler(GetPromptRequestSchema, async (request) => {
    if (request.params.name === usagePrompt.name) {
      return {
        messages: [
          {
            role: 'user' as const,
            content: { type: 'text' as const, text: usagePromptInstructions },
          },
        ],
      };
    }
    throw new Error(`Prompt not found: ${request.params.name}`);
  });

  server.setRequestHandler(CallToolRequestSchema, async (request, extra): Promise<CallToolResult> => {
    const { name, arguments: args } = request.params;
    const start = performance.now();

    try {
      const result = await registry.call(name, args, { client, cache, requestId, signal: extra.signal });
      const latency = performance.now() - start;

      logger.recordMetric({ tool: name, latency_ms: latency, success: true, timestamp: new Date().toISOString() });
      logger.debug('Tool call completed', { tool: name, request_id: requestId, latency_ms: Math.round(latency) }, 'server');

      return {
        content: [{ type: 'text', text: truncateResponse(JSON.stringify(result, null, 2)) }],
      };
    } catch (error) {
      const latency = performance.now() - start;
      const message = error instanceof Error ? error.message : String(error);

      logger.recordMetric({
        tool: name,
        latency_ms: latency,
        success: false,
        timestamp: new Date().toISOString(),
        error: message,
      });
      logger.warning('Tool call failed', { tool: name, request_id: requestId, error: message }, 'server');

      return toErrorResult(error);
    }
  });

  return server;
}
