import { parseReferenceItems } from '../cache.js';
import { Page, ProjectRefSchema } from '../models.js';
import { ListProjectsSchema } from '../schemas.js';
import { FilterClause, filtersParam, pageParams, pageWindow, readTotal, toPage } from '../utils.js';
import { READ_ONLY, RegisteredTool, ToolContext, defineTool } from './registry.js';

export interface ProjectSummary {
  id: number;
  name: string;
  identifier: string;
}

export async function listProjects(
  ctx: ToolContext,
  args: { offset?: number; page_size?: number; name_contains?: string }
): Promise<Page<ProjectSummary>> {
  const window = pageWindow(args.offset, args.page_size);

  const filters: FilterClause[] = [];
  const needle = args.name_contains?.trim();
  if (needle) {
    filters.push({ name_and_identifier: { operator: '~', values: [needle] } });
  }

  const endpoint = '/api/v3/projects';
  const payload = await ctx.client.get(endpoint, {
    params: { ...pageParams(window), ...(filters.length > 0 ? { filters: filtersParam(filters) } : {}) },
    tool: 'list_projects',
    signal: ctx.signal,
  });

  const projects = parseReferenceItems(payload, ProjectRefSchema, 'project', endpoint);
  return toPage(
    projects.map((project) => ({ id: project.id, name: project.name, identifier: project.identifier })),
    window,
    readTotal(payload)
  );
}

export const projectTools: RegisteredTool[] = [
  defineTool({
    name: 'list_projects',
    title: 'List Projects',
    description: `List projects visible to the API key, one page at a time.

PARAMETERS:
- offset (optional): 0-based item offset, a multiple of page_size. Default 0.
- page_size (optional): 1..200, default 50.
- name_contains (optional): server-side filter on name or identifier.

RETURNS: { items: [{ id, name, identifier }], offset, page_size, total, next_offset }.
next_offset is null on the last page; pass it back as offset to continue.`,
    schema: ListProjectsSchema,
    annotations: READ_ONLY,
    handler: async (args, ctx) => listProjects(ctx, args),
  }),
];
