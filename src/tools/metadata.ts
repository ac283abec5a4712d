import { z } from 'zod';
import { parseReferenceItems } from '../cache.js';
import { OpenProjectErrorType, OpenProjectHttpError, ResolutionError } from '../errors.js';
import { readInteger } from '../hal.js';
import { ProjectRef, ProjectRefSchema, TypeRef, TypeRefSchema, UserRef, UserRefSchema } from '../models.js';
import { resolveFromItems, resolveProjectFromItems, resolveUserFromItems } from '../resolver.js';
import {
  EmptySchema,
  ResolveNameSchema,
  ResolveProjectSchema,
  ResolveTypeForProjectSchema,
  ResolveUserSchema,
} from '../schemas.js';
import { MAX_PAGE_SIZE } from '../utils.js';
import { READ_ONLY, RegisteredTool, ToolContext, defineTool } from './registry.js';

export const TYPES_ENDPOINT = '/api/v3/types';
export const STATUSES_ENDPOINT = '/api/v3/statuses';
export const PRIORITIES_ENDPOINT = '/api/v3/priorities';

// Resolution searches this many pages of 200 before giving up
const RESOLVE_MAX_PAGES = 3;

// ============================================
// PAGINATED FETCH
// ============================================

export interface PaginatedFetchOptions {
  maxPages: number;
  pageSize?: number;
  params?: Record<string, unknown>;
  tool?: string;
}

/**
 * Walk pages 1..maxPages of a collection. Stops early on a short page or once
 * `total` items have been seen.
 */
export async function fetchPaginated<T>(
  ctx: ToolContext,
  endpoint: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  kind: string,
  options: PaginatedFetchOptions
): Promise<T[]> {
  const pageSize = options.pageSize ?? MAX_PAGE_SIZE;
  const items: T[] = [];

  for (let page = 1; page <= options.maxPages; page++) {
    const payload = await ctx.client.get(endpoint, {
      params: { ...options.params, offset: page, pageSize },
      tool: options.tool ?? 'metadata',
      signal: ctx.signal,
    });
    const batch = parseReferenceItems(payload, schema, kind, endpoint);
    items.push(...batch);

    const total = readInteger(payload, 'total');
    if (batch.length < pageSize || (total !== null && items.length >= total)) {
      break;
    }
  }

  return items;
}

/** 42 and "42" are ids; anything else is a name. */
export function numericRef(ref: string | number): number | null {
  if (typeof ref === 'number') return ref;
  const trimmed = ref.trim();
  return /^\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : null;
}

// ============================================
// CACHED REFERENCE LISTS
// ============================================

export async function listTypes(ctx: ToolContext): Promise<readonly TypeRef[]> {
  return ctx.cache.types.fetch(ctx.client, TYPES_ENDPOINT, { signal: ctx.signal });
}

export async function resolveTypeId(ctx: ToolContext, name: string): Promise<number> {
  return resolveFromItems(name, await listTypes(ctx));
}

export async function resolveStatusId(ctx: ToolContext, name: string): Promise<number> {
  const statuses = await ctx.cache.statuses.fetch(ctx.client, STATUSES_ENDPOINT, { signal: ctx.signal });
  return resolveFromItems(name, statuses);
}

export async function resolvePriorityId(ctx: ToolContext, name: string): Promise<number> {
  const priorities = await ctx.cache.priorities.fetch(ctx.client, PRIORITIES_ENDPOINT, { signal: ctx.signal });
  return resolveFromItems(name, priorities);
}

// ============================================
// PROJECTS & USERS
// ============================================

export async function resolveProject(ctx: ToolContext, ref: string | number): Promise<number> {
  const id = numericRef(ref);
  if (id !== null) return id;

  const projects: ProjectRef[] = await fetchPaginated(ctx, '/api/v3/projects', ProjectRefSchema, 'project', {
    maxPages: RESOLVE_MAX_PAGES,
  });
  return resolveProjectFromItems(String(ref), projects);
}

export async function resolveUser(ctx: ToolContext, ref: string | number): Promise<number> {
  const id = numericRef(ref);
  if (id !== null) return id;

  const query = String(ref);
  let users: UserRef[];
  try {
    users = await fetchPaginated(ctx, '/api/v3/users', UserRefSchema, 'user', { maxPages: RESOLVE_MAX_PAGES });
  } catch (error) {
    if (error instanceof OpenProjectHttpError) {
      if (error.statusCode === 401 || error.statusCode === 403) {
        throw new ResolutionError(
          'User listing unavailable: insufficient permissions. Provide a numeric user id.',
          query,
          OpenProjectErrorType.RESOLUTION_ERROR,
          { status: error.statusCode }
        );
      }
      if ([404, 405, 501].includes(error.statusCode)) {
        throw new ResolutionError(
          'User listing endpoint not available on this OpenProject instance. Provide a numeric user id.',
          query,
          OpenProjectErrorType.RESOLUTION_ERROR,
          { status: error.statusCode }
        );
      }
    }
    throw error;
  }

  return resolveUserFromItems(query, users);
}

// ============================================
// PROJECT-SCOPED TYPES
// ============================================

/** Types enabled in the project, or null when the instance has no such endpoint. */
export async function fetchProjectTypes(ctx: ToolContext, projectId: number): Promise<TypeRef[] | null> {
  const endpoint = `/api/v3/projects/${projectId}/types`;
  try {
    const payload = await ctx.client.get(endpoint, { tool: 'metadata', signal: ctx.signal });
    return parseReferenceItems(payload, TypeRefSchema, 'type', endpoint);
  } catch (error) {
    if (error instanceof OpenProjectHttpError && [404, 405, 501].includes(error.statusCode)) {
      return null;
    }
    throw error;
  }
}

export async function resolveTypeForProject(
  ctx: ToolContext,
  project: string | number,
  typeName: string
): Promise<number> {
  const projectId = await resolveProject(ctx, project);
  const scoped = await fetchProjectTypes(ctx, projectId);
  return resolveFromItems(typeName, scoped ?? (await listTypes(ctx)));
}

// ============================================
// TOOLS
// ============================================

export const metadataTools: RegisteredTool[] = [
  defineTool({
    name: 'list_types',
    title: 'List Types',
    description: `List all work package types of the instance (Task, Bug, Feature, ...).

RETURNS: { items: [{ id, name }] }. Cached per instance (OPENPROJECT_CACHE_TTL_SECONDS, default 600); use cache_clear after changing types in OpenProject.`,
    schema: EmptySchema,
    annotations: READ_ONLY,
    handler: async (_args, ctx) => {
      const types = await listTypes(ctx);
      return { items: types.map((type) => ({ id: type.id, name: type.name })) };
    },
  }),

  defineTool({
    name: 'list_statuses',
    title: 'List Statuses',
    description: `List all work package statuses.

RETURNS: { items: [{ id, name, is_closed }] }. Cached like list_types.`,
    schema: EmptySchema,
    annotations: READ_ONLY,
    handler: async (_args, ctx) => {
      const statuses = await ctx.cache.statuses.fetch(ctx.client, STATUSES_ENDPOINT, { signal: ctx.signal });
      return {
        items: statuses.map((status) => ({ id: status.id, name: status.name, is_closed: status.isClosed })),
      };
    },
  }),

  defineTool({
    name: 'list_priorities',
    title: 'List Priorities',
    description: 'List all work package priorities. RETURNS: { items: [{ id, name }] }. Cached like list_types.',
    schema: EmptySchema,
    annotations: READ_ONLY,
    handler: async (_args, ctx) => {
      const priorities = await ctx.cache.priorities.fetch(ctx.client, PRIORITIES_ENDPOINT, { signal: ctx.signal });
      return { items: priorities.map((priority) => ({ id: priority.id, name: priority.name })) };
    },
  }),

  defineTool({
    name: 'resolve_type',
    title: 'Resolve Type',
    description: `Map a type name to its numeric id.

MATCHING: case-insensitive, whitespace-normalized. An exact name wins; otherwise a unique substring match is accepted.

ERRORS:
- NOT_FOUND: no type matches; details.available lists every type name.
- AMBIGUOUS: several types contain the text; details.candidates lists them.`,
    schema: ResolveNameSchema,
    annotations: READ_ONLY,
    handler: async (args, ctx) => ({ id: await resolveTypeId(ctx, args.name) }),
  }),

  defineTool({
    name: 'resolve_status',
    title: 'Resolve Status',
    description: 'Map a status name to its numeric id. Same matching and errors as resolve_type.',
    schema: ResolveNameSchema,
    annotations: READ_ONLY,
    handler: async (args, ctx) => ({ id: await resolveStatusId(ctx, args.name) }),
  }),

  defineTool({
    name: 'resolve_priority',
    title: 'Resolve Priority',
    description: 'Map a priority name to its numeric id. Same matching and errors as resolve_type.',
    schema: ResolveNameSchema,
    annotations: READ_ONLY,
    handler: async (args, ctx) => ({ id: await resolvePriorityId(ctx, args.name) }),
  }),

  defineTool({
    name: 'resolve_project',
    title: 'Resolve Project',
    description: `Map a project identifier or name to its numeric id.

MATCHING: a numeric value is returned as is. Otherwise exact identifier, then exact name, then a unique name substring. Only the first 600 projects (3 pages of 200) are searched.`,
    schema: ResolveProjectSchema,
    annotations: READ_ONLY,
    handler: async (args, ctx) => ({ id: await resolveProject(ctx, args.project) }),
  }),

  defineTool({
    name: 'resolve_user',
    title: 'Resolve User',
    description: `Map a user's display name, login or email to a numeric id.

MATCHING: exact display name first; the substring pass also looks at login and email. Listing users needs admin rights on most instances; without them this fails with RESOLUTION_ERROR and you should pass a numeric id.`,
    schema: ResolveUserSchema,
    annotations: READ_ONLY,
    handler: async (args, ctx) => ({ id: await resolveUser(ctx, args.user) }),
  }),

  defineTool({
    name: 'resolve_type_for_project',
    title: 'Resolve Type for Project',
    description: `Map a type name to its id among the types enabled in a project. Falls back to the global type list when the instance has no per-project endpoint.`,
    schema: ResolveTypeForProjectSchema,
    annotations: READ_ONLY,
    handler: async (args, ctx) => ({ id: await resolveTypeForProject(ctx, args.project, args.type) }),
  }),
];
