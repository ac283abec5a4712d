import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { Tool, ToolAnnotations } from '@modelcontextprotocol/sdk/types.js';
import { MetadataCache } from '../cache.js';
import { ValidationError } from '../errors.js';
import { isRecord } from '../hal.js';
import { OpenProjectClient } from '../openproject-client.js';

// ============================================
// TOOL CONTEXT
// ============================================

/** Everything a handler may touch; nothing is read from globals. */
export interface ToolContext {
  client: OpenProjectClient;
  cache: MetadataCache;
  requestId: string;
  signal?: AbortSignal;
}

// ============================================
// ANNOTATIONS
// ============================================

export const READ_ONLY: ToolAnnotations = {
  readOnlyHint: true,
  destructiveHint: false,
  idempotentHint: true,
  openWorldHint: true,
};

export const CREATE: ToolAnnotations = {
  readOnlyHint: false,
  destructiveHint: false,
  idempotentHint: false,
  openWorldHint: true,
};

export const UPDATE: ToolAnnotations = {
  readOnlyHint: false,
  destructiveHint: false,
  idempotentHint: true,
  openWorldHint: true,
};

export const LOCAL: ToolAnnotations = {
  readOnlyHint: false,
  destructiveHint: false,
  idempotentHint: true,
  openWorldHint: false,
};

// ============================================
// DEFINITIONS
// ============================================

export interface ToolDefinition<S extends z.ZodTypeAny> {
  name: string;
  title: string;
  description: string;
  schema: S;
  annotations: ToolAnnotations;
  handler: (args: z.output<S>, ctx: ToolContext) => Promise<unknown>;
}

/** A definition with its argument type erased behind the schema. */
export interface RegisteredTool {
  name: string;
  descriptor: Tool;
  run: (rawArgs: unknown, ctx: ToolContext) => Promise<unknown>;
}

export function defineTool<S extends z.ZodTypeAny>(definition: ToolDefinition<S>): RegisteredTool {
  return {
    name: definition.name,
    descriptor: {
      name: definition.name,
      title: definition.title,
      description: definition.description,
      inputSchema: toInputSchema(definition.schema),
      annotations: { title: definition.title, ...definition.annotations },
    },
    run: async (rawArgs, ctx) => definition.handler(definition.schema.parse(rawArgs ?? {}), ctx),
  };
}

export function toInputSchema(schema: z.ZodTypeAny): Tool['inputSchema'] {
  const json: unknown = zodToJsonSchema(schema, { $refStrategy: 'none', target: 'jsonSchema7' });

  const properties = isRecord(json) && isRecord(json.properties) ? json.properties : {};
  const required =
    isRecord(json) && Array.isArray(json.required)
      ? json.required.filter((key): key is string => typeof key === 'string')
      : [];

  return required.length > 0 ? { type: 'object', properties, required } : { type: 'object', properties };
}

// ============================================
// REGISTRY
// ============================================

export class ToolRegistry {
  private tools = new Map<string, RegisteredTool>();

  register(...tools: RegisteredTool[]): this {
    for (const tool of tools) {
      if (this.tools.has(tool.name)) {
        throw new Error(`Tool already registered: ${tool.name}`);
      }
      this.tools.set(tool.name, tool);
    }
    return this;
  }

  list(): Tool[] {
    return [...this.tools.values()].map((tool) => tool.descriptor);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get size(): number {
    return this.tools.size;
  }

  async call(name: string, rawArgs: unknown, ctx: ToolContext): Promise<unknown> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new ValidationError(`Unknown tool: ${name}`, { available: [...this.tools.keys()] });
    }
    return tool.run(rawArgs, ctx);
  }
}
