import { toIsoDuration } from '../duration.js';
import { OpenProjectHttpError, ResolutionError, ValidationError } from '../errors.js';
import {
  HalPayload,
  embeddedElements,
  getEmbedded,
  getLinkHref,
  getLinkTitle,
  hasLink,
  isRecord,
  parseIdFromHref,
  readInteger,
  readFormattable,
  readString,
} from '../hal.js';
import { NamedRef, Page, UserRef, VersionRef, VersionRefSchema, WorkPackageSummary } from '../models.js';
import { resolveFromItems, resolveUserFromItems } from '../resolver.js';
import {
  AddCommentSchema,
  AppendDescriptionSchema,
  CreateWorkPackageSchema,
  GetWorkPackageSchema,
  ListWorkPackageVersionsSchema,
  ListWorkPackagesSchema,
  SearchWorkPackagesSchema,
  UpdateStatusSchema,
  UpdateWorkPackageSchema,
} from '../schemas.js';
import { FilterClause, MAX_PAGE_SIZE, filtersParam, pageParams, pageWindow, readTotal, toPage } from '../utils.js';
import { fetchMembershipPrincipals } from './memberships.js';
import {
  fetchPaginated,
  numericRef,
  resolvePriorityId,
  resolveProject,
  resolveStatusId,
  resolveTypeForProject,
  resolveTypeId,
  resolveUser,
} from './metadata.js';
import { CREATE, READ_ONLY, RegisteredTool, ToolContext, UPDATE, defineTool } from './registry.js';
import { remapHttpError, validationFailureMessage } from './remap.js';

const WORK_PACKAGES_ENDPOINT = '/api/v3/work_packages';
const SEARCH_FALLBACK_MAX_PAGES = 5;
const VERSION_MAX_PAGES = 10;
const ASSIGNEE_MAX_PAGES = 10;

type Href = { href: string | null };

const workPackagePath = (id: number) => `${WORK_PACKAGES_ENDPOINT}/${id}`;

// ============================================
// SUMMARY
// ============================================

function linkedRef(payload: HalPayload, rel: string): NamedRef {
  const embedded = getEmbedded(payload, rel);
  return {
    id: parseIdFromHref(getLinkHref(payload, rel)),
    name: getLinkTitle(payload, rel) ?? (isRecord(embedded) ? readString(embedded, 'name') : null),
  };
}

export function toWorkPackageSummary(payload: HalPayload): WorkPackageSummary {
  const assignee = linkedRef(payload, 'assignee');
  return {
    id: readInteger(payload, 'id'),
    subject: readString(payload, 'subject'),
    lock_version: readInteger(payload, 'lockVersion'),
    description: readFormattable(payload, 'description'),
    status: linkedRef(payload, 'status'),
    priority: linkedRef(payload, 'priority'),
    project: linkedRef(payload, 'project'),
    type: linkedRef(payload, 'type'),
    assignee: assignee.id !== null || assignee.name ? assignee : null,
    url: getLinkHref(payload, 'self'),
  };
}

// ============================================
// HELPERS
// ============================================

async function fetchWorkPackage(ctx: ToolContext, id: number, tool: string): Promise<HalPayload> {
  return ctx.client.get(workPackagePath(id), { tool, signal: ctx.signal });
}

function requireLockVersion(ctx: ToolContext, id: number, current: HalPayload): number {
  const lockVersion = readInteger(current, 'lockVersion');
  if (lockVersion === null) {
    throw new OpenProjectHttpError({
      statusCode: 422,
      method: 'GET',
      url: `${ctx.client.baseUrl}${workPackagePath(id)}`,
      message: 'lockVersion missing from work package response',
    });
  }
  return lockVersion;
}

function appendText(existing: string, text: string): string {
  const trimmed = existing.trimEnd();
  return trimmed ? `${trimmed}\n\n${text}` : text;
}

/** Entries of `_embedded.elements` as principals; entries without id or name are skipped. */
function collectPrincipals(payload: HalPayload): UserRef[] {
  return embeddedElements(payload).flatMap((element) => {
    const id = parseIdFromHref(getLinkHref(element, 'self')) ?? readInteger(element, 'id');
    const name = readString(element, 'name') ?? readString(element, 'fullName');
    if (id === null || !name) return [];
    return [{ id, name, login: readString(element, 'login'), mail: readString(element, 'mail') ?? readString(element, 'email') }];
  });
}

async function fetchAvailableAssignees(ctx: ToolContext, current: HalPayload): Promise<UserRef[] | null> {
  const href = getLinkHref(current, 'availableAssignees');
  if (!href) return null;

  const principals: UserRef[] = [];
  for (let page = 1; page <= ASSIGNEE_MAX_PAGES; page++) {
    const payload = await ctx.client.get(href, {
      params: { offset: page, pageSize: MAX_PAGE_SIZE },
      tool: 'update_work_package',
      signal: ctx.signal,
    });
    principals.push(...collectPrincipals(payload));

    const total = readInteger(payload, 'total');
    const pageSize = readInteger(payload, 'pageSize');
    if (total === null || pageSize === null || page * pageSize >= total) break;
  }
  return principals;
}

const isForbiddenOrMissing = (error: unknown): boolean =>
  error instanceof OpenProjectHttpError && (error.statusCode === 403 || error.statusCode === 404);

/**
 * Assignee/accountable lookup, narrowest list first: the work package's
 * available assignees, then project members, then every user.
 */
async function resolvePrincipalForWorkPackage(
  ctx: ToolContext,
  ref: string | number,
  current: HalPayload
): Promise<number> {
  const id = numericRef(ref);
  if (id !== null) return id;
  const query = String(ref);

  let available: UserRef[] | null = null;
  try {
    available = await fetchAvailableAssignees(ctx, current);
  } catch (error) {
    if (!isForbiddenOrMissing(error)) throw error;
  }
  if (available && available.length > 0) {
    try {
      return resolveUserFromItems(query, available);
    } catch (error) {
      if (!(error instanceof ResolutionError)) throw error;
    }
  }

  const projectId = parseIdFromHref(getLinkHref(current, 'project'));
  if (projectId !== null) {
    let members: UserRef[] = [];
    try {
      members = await fetchMembershipPrincipals(ctx, projectId, 'update_work_package');
    } catch (error) {
      if (!isForbiddenOrMissing(error)) throw error;
    }
    if (members.length > 0) {
      return resolveUserFromItems(query, members);
    }
  }

  return resolveUser(ctx, ref);
}

async function fetchProjectVersions(ctx: ToolContext, projectId: number, tool: string): Promise<VersionRef[]> {
  return fetchPaginated(ctx, `/api/v3/projects/${projectId}/versions`, VersionRefSchema, 'version', {
    maxPages: VERSION_MAX_PAGES,
    tool,
  });
}

async function resolveVersionForWorkPackage(ctx: ToolContext, ref: string | number, current: HalPayload): Promise<number> {
  const id = numericRef(ref);
  if (id !== null) return id;

  const projectId = parseIdFromHref(getLinkHref(current, 'project'));
  if (projectId === null) {
    throw new ValidationError('Cannot resolve version: work package project is unknown.');
  }

  let versions: VersionRef[];
  try {
    versions = await fetchProjectVersions(ctx, projectId, 'update_work_package');
  } catch (error) {
    const message = 'Version list unavailable for this project; provide a numeric version id or check permissions.';
    throw remapHttpError(error, { 403: message, 404: message });
  }
  return resolveFromItems(String(ref), versions);
}

// ============================================
// READ OPERATIONS
// ============================================

export async function getWorkPackage(ctx: ToolContext, id: number): Promise<WorkPackageSummary> {
  return toWorkPackageSummary(await fetchWorkPackage(ctx, id, 'get_work_package'));
}

export async function listWorkPackages(
  ctx: ToolContext,
  args: { offset?: number; page_size?: number; project?: string | number; subject_contains?: string }
): Promise<Page<WorkPackageSummary>> {
  const window = pageWindow(args.offset, args.page_size);

  const filters: FilterClause[] = [];
  if (args.project !== undefined) {
    const projectId = await resolveProject(ctx, args.project);
    filters.push({ project: { operator: '=', values: [String(projectId)] } });
  }
  const needle = args.subject_contains?.trim();
  if (needle) {
    filters.push({ subject: { operator: '~', values: [needle] } });
  }

  const payload = await ctx.client.get(WORK_PACKAGES_ENDPOINT, {
    // an empty filter list overrides the default "open only" filter
    params: { ...pageParams(window), filters: filtersParam(filters) },
    tool: 'list_work_packages',
    signal: ctx.signal,
  });

  return toPage(embeddedElements(payload).map(toWorkPackageSummary), window, readTotal(payload));
}

export type SearchScope = 'server_filtered' | 'client_filtered_paginated';

export async function searchWorkPackages(
  ctx: ToolContext,
  query: string
): Promise<{ items: WorkPackageSummary[]; scope: SearchScope; page_size: number }> {
  try {
    const payload = await ctx.client.get(WORK_PACKAGES_ENDPOINT, {
      params: {
        pageSize: MAX_PAGE_SIZE,
        filters: filtersParam([{ text: { operator: '~', values: [query] } }]),
      },
      tool: 'search_work_packages',
      signal: ctx.signal,
    });
    return {
      items: embeddedElements(payload).map(toWorkPackageSummary),
      scope: 'server_filtered',
      page_size: MAX_PAGE_SIZE,
    };
  } catch (error) {
    if (!(error instanceof OpenProjectHttpError) || ![400, 415, 422].includes(error.statusCode)) {
      throw error;
    }
  }

  // the instance rejected the text filter: scan a few pages locally
  const needle = query.trim().toLowerCase();
  const matches: HalPayload[] = [];
  for (let page = 1; page <= SEARCH_FALLBACK_MAX_PAGES; page++) {
    const payload = await ctx.client.get(WORK_PACKAGES_ENDPOINT, {
      params: { offset: page, pageSize: MAX_PAGE_SIZE },
      tool: 'search_work_packages',
      signal: ctx.signal,
    });
    const batch = embeddedElements(payload);
    matches.push(
      ...batch.filter(
        (element) =>
          (readString(element, 'subject') ?? '').toLowerCase().includes(needle) ||
          readFormattable(element, 'description').toLowerCase().includes(needle)
      )
    );

    const total = readInteger(payload, 'total');
    if (batch.length < MAX_PAGE_SIZE || (total !== null && page * MAX_PAGE_SIZE >= total)) break;
  }

  return { items: matches.map(toWorkPackageSummary), scope: 'client_filtered_paginated', page_size: MAX_PAGE_SIZE };
}

export async function listWorkPackageVersions(
  ctx: ToolContext,
  id: number
): Promise<{ items: Array<{ id: number; name: string }>; total: number; project_id: number; work_package_id: number }> {
  const current = await fetchWorkPackage(ctx, id, 'list_work_package_versions');
  const unprocessable = (message: string) =>
    new OpenProjectHttpError({
      statusCode: 422,
      method: 'GET',
      url: `${ctx.client.baseUrl}${workPackagePath(id)}`,
      message,
    });

  const projectHref = getLinkHref(current, 'project');
  if (!projectHref) {
    throw unprocessable('Cannot list versions: work package project is unknown.');
  }
  if (!hasLink(current, 'version')) {
    throw unprocessable('Version field is not available for this work package.');
  }
  const projectId = parseIdFromHref(projectHref);
  if (projectId === null) {
    throw unprocessable('Cannot list versions: project id is missing.');
  }

  let versions: VersionRef[];
  try {
    versions = await fetchProjectVersions(ctx, projectId, 'list_work_package_versions');
  } catch (error) {
    const message = 'Unable to list versions for this project; check permissions or project versions configuration.';
    throw remapHttpError(error, { 403: message, 404: message });
  }

  return {
    items: versions.map((version) => ({ id: version.id, name: version.name })),
    total: versions.length,
    project_id: projectId,
    work_package_id: id,
  };
}

// ============================================
// WRITE OPERATIONS
// ============================================

export interface CreateWorkPackageInput {
  project: string | number;
  subject: string;
  type: string;
  description?: string;
  priority?: string;
  status?: string;
}

export async function createWorkPackage(ctx: ToolContext, input: CreateWorkPackageInput): Promise<WorkPackageSummary> {
  const projectId = await resolveProject(ctx, input.project);
  const typeId = await resolveTypeForProject(ctx, projectId, input.type);

  const links: Record<string, Href> = {
    project: { href: `/api/v3/projects/${projectId}` },
    type: { href: `/api/v3/types/${typeId}` },
  };
  if (input.priority) {
    links.priority = { href: `/api/v3/priorities/${await resolvePriorityId(ctx, input.priority)}` };
  }
  if (input.status) {
    links.status = { href: `/api/v3/statuses/${await resolveStatusId(ctx, input.status)}` };
  }

  const created = await ctx.client.post(
    WORK_PACKAGES_ENDPOINT,
    { subject: input.subject, description: { raw: input.description ?? '' }, _links: links },
    { tool: 'create_work_package', signal: ctx.signal }
  );
  return toWorkPackageSummary(created);
}

export async function updateStatus(ctx: ToolContext, id: number, status: string): Promise<WorkPackageSummary> {
  const current = await fetchWorkPackage(ctx, id, 'update_status');
  const lockVersion = requireLockVersion(ctx, id, current);
  const statusId = await resolveStatusId(ctx, status);

  try {
    const patched = await ctx.client.patch(
      workPackagePath(id),
      { lockVersion, _links: { status: { href: `/api/v3/statuses/${statusId}` } } },
      { tool: 'update_status', signal: ctx.signal }
    );
    return toWorkPackageSummary(patched);
  } catch (error) {
    throw remapHttpError(error, { 409: 'Update conflict: lockVersion is outdated. Re-fetch and retry.' });
  }
}

export interface UpdateWorkPackageInput {
  id: number;
  subject?: string;
  description?: string;
  append_description?: string;
  start_date?: string | null;
  due_date?: string | null;
  percent_done?: number;
  estimated_time?: string;
  status?: string;
  priority?: string;
  type?: string;
  project?: string | number;
  assignee?: string | number | null;
  accountable?: string | number | null;
  version?: string | number | null;
}

/** Only the fields present in `input` change; `null` clears a link or date. */
export async function updateWorkPackage(ctx: ToolContext, input: UpdateWorkPackageInput): Promise<WorkPackageSummary> {
  if (input.description !== undefined && input.append_description !== undefined) {
    throw new ValidationError('Provide either description or append_description, not both.');
  }
  if (input.percent_done !== undefined && (input.percent_done < 0 || input.percent_done > 100)) {
    throw new ValidationError('percent_done must be between 0 and 100.', { percent_done: input.percent_done });
  }
  const estimatedTime = input.estimated_time !== undefined ? toIsoDuration(input.estimated_time) : undefined;

  const current = await fetchWorkPackage(ctx, input.id, 'update_work_package');
  const lockVersion = requireLockVersion(ctx, input.id, current);

  const payload: Record<string, unknown> = { lockVersion };
  const links: Record<string, Href> = {};

  if (input.subject !== undefined) payload.subject = input.subject;
  if (input.description !== undefined) {
    payload.description = { raw: input.description };
  } else if (input.append_description !== undefined) {
    payload.description = { raw: appendText(readFormattable(current, 'description'), input.append_description) };
  }
  if (input.start_date !== undefined) payload.startDate = input.start_date;
  if (input.due_date !== undefined) payload.dueDate = input.due_date;
  if (input.percent_done !== undefined) payload.percentageDone = input.percent_done;
  if (estimatedTime !== undefined) payload.estimatedTime = estimatedTime;

  if (input.status !== undefined) {
    links.status = { href: `/api/v3/statuses/${await resolveStatusId(ctx, input.status)}` };
  }
  if (input.priority !== undefined) {
    links.priority = { href: `/api/v3/priorities/${await resolvePriorityId(ctx, input.priority)}` };
  }

  if (input.version === null) {
    links.version = { href: null };
  } else if (input.version !== undefined) {
    if (!hasLink(current, 'version')) {
      throw new ValidationError('Version is not writable for this work package; please check project/type settings.');
    }
    links.version = { href: `/api/v3/versions/${await resolveVersionForWorkPackage(ctx, input.version, current)}` };
  }

  if (input.assignee === null) {
    links.assignee = { href: null };
  } else if (input.assignee !== undefined) {
    links.assignee = { href: `/api/v3/users/${await resolvePrincipalForWorkPackage(ctx, input.assignee, current)}` };
  }

  // "accountable" in the UI, "responsible" in the API
  if (input.accountable === null) {
    links.responsible = { href: null };
  } else if (input.accountable !== undefined) {
    links.responsible = {
      href: `/api/v3/users/${await resolvePrincipalForWorkPackage(ctx, input.accountable, current)}`,
    };
  }

  const targetProjectId = input.project !== undefined ? await resolveProject(ctx, input.project) : null;
  if (targetProjectId !== null) {
    links.project = { href: `/api/v3/projects/${targetProjectId}` };
  }

  if (input.type !== undefined) {
    const projectId = targetProjectId ?? parseIdFromHref(getLinkHref(current, 'project'));
    const typeId =
      projectId !== null ? await resolveTypeForProject(ctx, projectId, input.type) : await resolveTypeId(ctx, input.type);
    links.type = { href: `/api/v3/types/${typeId}` };
  }

  if (Object.keys(links).length > 0) payload._links = links;

  try {
    const patched = await ctx.client.patch(workPackagePath(input.id), payload, {
      tool: 'update_work_package',
      signal: ctx.signal,
    });
    return toWorkPackageSummary(patched);
  } catch (error) {
    throw remapHttpError(error, {
      409: 'Update conflict: lockVersion is outdated. Re-fetch and retry.',
      422: validationFailureMessage,
    });
  }
}

export async function addComment(
  ctx: ToolContext,
  id: number,
  comment: string
): Promise<{ work_package_id: number; comment: string; activity_id: number | null; url: string | null }> {
  const created = await ctx.client.post(
    `${workPackagePath(id)}/activities`,
    { comment: { raw: comment } },
    { tool: 'add_comment', signal: ctx.signal }
  );
  const url = getLinkHref(created, 'self');
  return { work_package_id: id, comment, activity_id: parseIdFromHref(url), url };
}

export async function appendWorkPackageDescription(ctx: ToolContext, id: number, text: string): Promise<WorkPackageSummary> {
  const current = await fetchWorkPackage(ctx, id, 'append_work_package_description');
  const lockVersion = requireLockVersion(ctx, id, current);

  try {
    const updated = await ctx.client.patch(
      workPackagePath(id),
      { lockVersion, description: { raw: appendText(readFormattable(current, 'description'), text) } },
      { tool: 'append_work_package_description', signal: ctx.signal }
    );
    return toWorkPackageSummary(updated);
  } catch (error) {
    throw remapHttpError(error, { 409: 'Work package was updated by someone else; please reload and retry.' });
  }
}

// ============================================
// TOOLS
// ============================================

const SUMMARY_SHAPE =
  '{ id, subject, lock_version, description, status: {id,name}, priority: {id,name}, project: {id,name}, type: {id,name}, assignee: {id,name} | null, url }';

export const workPackageTools: RegisteredTool[] = [
  defineTool({
    name: 'get_work_package',
    title: 'Get Work Package',
    description: `Retrieve one work package by its numeric id.

PURPOSE: read the current state before changing it. lock_version is what OpenProject uses to detect concurrent edits; the update tools read it for you.

RETURNS: ${SUMMARY_SHAPE}

ERRORS:
- HTTP_ERROR 404: no such work package, or it is not visible to this API key.`,
    schema: GetWorkPackageSchema,
    annotations: READ_ONLY,
    handler: async (args, ctx) => getWorkPackage(ctx, args.id),
  }),

  defineTool({
    name: 'list_work_packages',
    title: 'List Work Packages',
    description: `List work packages (open and closed), one page at a time.

PARAMETERS:
- project (optional): id, identifier or name; resolved to an id first.
- subject_contains (optional): server-side subject filter.
- offset / page_size (optional): 0-based offset on a page boundary; page_size 1..200, default 50.

RETURNS: { items: [summary], offset, page_size, total, next_offset }`,
    schema: ListWorkPackagesSchema,
    annotations: READ_ONLY,
    handler: async (args, ctx) => listWorkPackages(ctx, args),
  }),

  defineTool({
    name: 'create_work_package',
    title: 'Create Work Package',
    description: `Create a work package. Project, type, priority and status are given by name.

PARAMETERS:
- project (required): id, identifier or name.
- subject (required), type (required, must be enabled in the project).
- description, priority, status (optional).

RETURNS: the created work package as ${SUMMARY_SHAPE}

ERRORS:
- NOT_FOUND / AMBIGUOUS: a name did not resolve; details list the options.
- HTTP_ERROR 422: OpenProject rejected the values (e.g. a required custom field).`,
    schema: CreateWorkPackageSchema,
    annotations: CREATE,
    handler: async (args, ctx) => createWorkPackage(ctx, args),
  }),

  defineTool({
    name: 'update_status',
    title: 'Update Status',
    description: 'Move a work package to another status by name. Reads lockVersion first; a 409 means someone else changed it meanwhile.',
    schema: UpdateStatusSchema,
    annotations: UPDATE,
    handler: async (args, ctx) => updateStatus(ctx, args.id, args.status),
  }),

  defineTool({
    name: 'update_work_package',
    title: 'Update Work Package',
    description: `Change several attributes of a work package in one request. Only the fields you pass change.

PARAMETERS:
- id (required)
- subject; description (replace) or append_description (append after a blank line), not both
- start_date, due_date: YYYY-MM-DD, null clears
- percent_done: 0..100
- estimated_time: "2h 30m", "1.5h" or ISO 8601 "PT2H30M"
- status, priority, type: names (type is checked against the project's types)
- project: move to another project
- assignee, accountable: user name or id, null clears. Names are looked up among the work package's available assignees, then project members, then all users.
- version: version name or id within the project, null clears

ERRORS:
- HTTP_ERROR 409: "Update conflict: lockVersion is outdated." Fetch again and retry.
- HTTP_ERROR 422: "Validation failed: ..." with OpenProject's messages.
- VALIDATION_ERROR: conflicting or out-of-range arguments; nothing was sent.`,
    schema: UpdateWorkPackageSchema,
    annotations: UPDATE,
    handler: async (args, ctx) => updateWorkPackage(ctx, args),
  }),

  defineTool({
    name: 'add_comment',
    title: 'Add Comment',
    description: 'Add a markdown comment to a work package. RETURNS: { work_package_id, comment, activity_id, url }',
    schema: AddCommentSchema,
    annotations: CREATE,
    handler: async (args, ctx) => addComment(ctx, args.id, args.comment),
  }),

  defineTool({
    name: 'append_work_package_description',
    title: 'Append to Description',
    description: `Append text to a work package description, separated by a blank line. Uses the current lockVersion; a 409 means the work package changed meanwhile and the call can be repeated.`,
    schema: AppendDescriptionSchema,
    annotations: CREATE,
    handler: async (args, ctx) => appendWorkPackageDescription(ctx, args.id, args.text),
  }),

  defineTool({
    name: 'search_work_packages',
    title: 'Search Work Packages',
    description: `Full-text search over work packages (first 200 hits).

RETURNS: { items: [summary], scope, page_size }.
scope is "server_filtered" normally. When the instance rejects the text filter it is "client_filtered_paginated": up to 1000 work packages were scanned for the text in subject or description.`,
    schema: SearchWorkPackagesSchema,
    annotations: READ_ONLY,
    handler: async (args, ctx) => searchWorkPackages(ctx, args.query),
  }),

  defineTool({
    name: 'list_work_package_versions',
    title: 'List Work Package Versions',
    description: "List the versions a work package can be assigned to (its project's versions). RETURNS: { items: [{ id, name }], total, project_id, work_package_id }",
    schema: ListWorkPackageVersionsSchema,
    annotations: READ_ONLY,
    handler: async (args, ctx) => listWorkPackageVersions(ctx, args.id),
  }),
];
