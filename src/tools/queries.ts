import { HalPayload, embeddedElements, getEmbedded, getLinkHref, isRecord, parseIdFromHref, readBoolean, readInteger, readString } from '../hal.js';
import { Page, WorkPackageSummary } from '../models.js';
import { ListQueriesSchema, RunQuerySchema } from '../schemas.js';
import { filtersParam, pageParams, pageWindow, readTotal, toPage } from '../utils.js';
import { READ_ONLY, RegisteredTool, ToolContext, defineTool } from './registry.js';
import { remapHttpError } from './remap.js';
import { toWorkPackageSummary } from './work-packages.js';

export interface QuerySummary {
  id: number | null;
  name: string | null;
  href: string | null;
  project_id: number | null;
  public: boolean | null;
  starred: boolean | null;
}

export function toQuerySummary(payload: HalPayload): QuerySummary {
  return {
    id: readInteger(payload, 'id'),
    name: readString(payload, 'name'),
    href: getLinkHref(payload, 'self'),
    project_id: parseIdFromHref(getLinkHref(payload, 'project')),
    public: readBoolean(payload, 'public'),
    starred: readBoolean(payload, 'starred'),
  };
}

export async function listQueries(
  ctx: ToolContext,
  args: { project_id?: number; offset?: number; page_size?: number }
): Promise<Page<QuerySummary>> {
  const window = pageWindow(args.offset, args.page_size);
  const params: Record<string, unknown> = pageParams(window);
  if (args.project_id !== undefined) {
    params.filters = filtersParam([{ project_id: { operator: '=', values: [String(args.project_id)] } }]);
  }

  const payload = await ctx.client.get('/api/v3/queries', { params, tool: 'list_queries', signal: ctx.signal });
  return toPage(embeddedElements(payload).map(toQuerySummary), window, readTotal(payload));
}

/** Work packages matched by a saved query, read from its embedded `results` collection. */
export async function runQuery(
  ctx: ToolContext,
  args: { id: number; offset?: number; page_size?: number }
): Promise<Page<WorkPackageSummary> & { query_id: number; count: number }> {
  const window = pageWindow(args.offset, args.page_size);

  let payload: HalPayload;
  try {
    payload = await ctx.client.get(`/api/v3/queries/${args.id}`, {
      params: pageParams(window),
      tool: 'run_query',
      signal: ctx.signal,
    });
  } catch (error) {
    throw remapHttpError(error, { 404: 'Query not found.' });
  }

  const embedded = getEmbedded(payload, 'results');
  const results = isRecord(embedded) ? embedded : {};
  const items = embeddedElements(results).map(toWorkPackageSummary);

  return {
    query_id: args.id,
    ...toPage(items, window, readTotal(results)),
    count: readInteger(results, 'count') ?? items.length,
  };
}

export const queryTools: RegisteredTool[] = [
  defineTool({
    name: 'list_queries',
    title: 'List Saved Queries',
    description: `List saved work package queries (views), optionally only those of one project.

RETURNS: { items: [{ id, name, href, project_id, public, starred }], offset, page_size, total, next_offset }`,
    schema: ListQueriesSchema,
    annotations: READ_ONLY,
    handler: async (args, ctx) => listQueries(ctx, args),
  }),

  defineTool({
    name: 'run_query',
    title: 'Run Saved Query',
    description: `Run a saved query and return one page of its work packages, using the query's own filters and sort order.

RETURNS: { query_id, items: [work package summary], offset, page_size, total, next_offset, count }

ERRORS:
- HTTP_ERROR 404: "Query not found." (or not visible to this API key)`,
    schema: RunQuerySchema,
    annotations: READ_ONLY,
    handler: async (args, ctx) => runQuery(ctx, args),
  }),
];
