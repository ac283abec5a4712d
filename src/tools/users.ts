import { HalPayload, embeddedElements, getLinkHref, isRecord, readBoolean, readInteger, readString } from '../hal.js';
import { Page } from '../models.js';
import { GetUserSchema, ListUsersSchema } from '../schemas.js';
import { pageParams, pageWindow, projectFilter, readTotal, toPage } from '../utils.js';
import { MEMBERSHIPS_ENDPOINT, toMembershipSummary } from './memberships.js';
import { resolveProject } from './metadata.js';
import { READ_ONLY, RegisteredTool, ToolContext, defineTool } from './registry.js';
import { remapHttpError } from './remap.js';

const CUSTOM_FIELD_KEY = /^customField(\d+)$/;

const LISTING_DENIED = 'Cannot list users with this token; provide user ID or project membership.';
const EMAIL_HIDDEN_WARNING = 'email not visible to this token; email_filter may be ignored and returned no matches.';

// ============================================
// PROFILE
// ============================================

export interface CustomFieldValue {
  key: string;
  id: number | null;
  value: unknown;
  title: string | null;
  href: string | null;
  links: Array<{ title: string | null; href: string | null }>;
}

export interface UserProfile {
  id: number | null;
  name: string | null;
  login: string | null;
  status: string | null;
  email: string | null;
  admin: boolean | null;
  created_at: string | null;
  updated_at: string | null;
  last_login: string | null;
  href: string | null;
  custom_fields: CustomFieldValue[];
}

function emptyCustomField(key: string, idPart: string): CustomFieldValue {
  return { key, id: Number.parseInt(idPart, 10), value: null, title: null, href: null, links: [] };
}

function mergeCustomFieldLink(field: CustomFieldValue, link: unknown): void {
  if (!isRecord(link)) return;
  const title = typeof link.title === 'string' ? link.title : null;
  const href = typeof link.href === 'string' ? link.href : null;

  field.links.push({ title, href });
  field.title ??= title;
  field.href ??= href;
  if (field.value === null && title !== null) field.value = title;
}

/**
 * customFieldN values, from root properties (plain values) and from `_links`
 * (list or single references), merged per key and ordered by field id.
 */
export function extractCustomFields(payload: HalPayload): CustomFieldValue[] {
  const fields = new Map<string, CustomFieldValue>();
  const fieldFor = (key: string, idPart: string): CustomFieldValue => {
    const existing = fields.get(key);
    if (existing) return existing;
    const created = emptyCustomField(key, idPart);
    fields.set(key, created);
    return created;
  };

  for (const [key, value] of Object.entries(payload)) {
    const match = CUSTOM_FIELD_KEY.exec(key);
    if (match) fieldFor(key, match[1]).value = value;
  }

  const links = isRecord(payload._links) ? payload._links : {};
  for (const [key, value] of Object.entries(links)) {
    const match = CUSTOM_FIELD_KEY.exec(key);
    if (!match) continue;
    const field = fieldFor(key, match[1]);
    for (const link of Array.isArray(value) ? value : [value]) {
      mergeCustomFieldLink(field, link);
    }
  }

  return [...fields.values()].sort((a, b) => (a.id ?? 0) - (b.id ?? 0) || (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
}

export function toUserProfile(payload: HalPayload): UserProfile {
  return {
    id: readInteger(payload, 'id'),
    name: readString(payload, 'name'),
    login: readString(payload, 'login'),
    status: readString(payload, 'status'),
    email: readString(payload, 'mail') || readString(payload, 'email'),
    admin: readBoolean(payload, 'admin'),
    created_at: readString(payload, 'createdAt'),
    updated_at: readString(payload, 'updatedAt'),
    last_login: readString(payload, 'lastLogin'),
    href: getLinkHref(payload, 'self'),
    custom_fields: extractCustomFields(payload),
  };
}

export async function getUser(ctx: ToolContext, id: number): Promise<UserProfile> {
  try {
    const payload = await ctx.client.get(`/api/v3/users/${id}`, { tool: 'get_user', signal: ctx.signal });
    return toUserProfile(payload);
  } catch (error) {
    throw remapHttpError(error, {
      403: 'Permission denied: unable to view this user.',
      404: 'User not found or insufficient permissions to view this user.',
    });
  }
}

// ============================================
// LISTING
// ============================================

export interface UserListItem {
  id: number | null;
  name: string | null;
  login: string | null;
  email: string | null;
  admin: boolean | null;
  status: string | null;
}

export type UserList = Page<UserListItem> & { warnings: string[] | null };

function filterByEmail(items: UserListItem[], emailFilter: string | undefined, warnings: string[]): UserListItem[] {
  const needle = emailFilter?.trim().toLowerCase();
  if (!needle) return items;

  if (items.length > 0 && !items.some((item) => item.email)) {
    warnings.push(EMAIL_HIDDEN_WARNING);
  }
  return items.filter((item) => (item.email ?? '').toLowerCase().includes(needle));
}

/**
 * All users (needs admin on most instances) or, with `project`, the members
 * of that project. Emails are often hidden; the email filter is best-effort.
 */
export async function listUsers(
  ctx: ToolContext,
  args: { project?: string | number; email_filter?: string; offset?: number; page_size?: number }
): Promise<UserList> {
  const window = pageWindow(args.offset, args.page_size);
  const warnings: string[] = [];

  // project resolution errors keep their own wording
  const projectId = args.project !== undefined ? await resolveProject(ctx, args.project) : null;

  let payload: HalPayload;
  let items: UserListItem[];

  try {
    if (projectId !== null) {
      payload = await ctx.client.get(MEMBERSHIPS_ENDPOINT, {
        params: { ...pageParams(window), filters: projectFilter(projectId) },
        tool: 'list_users',
        signal: ctx.signal,
      });
      items = embeddedElements(payload).map((membership) => {
        const summary = toMembershipSummary(membership);
        return { id: summary.principal_id, name: summary.principal_name, login: null, email: null, admin: null, status: null };
      });
    } else {
      payload = await ctx.client.get('/api/v3/users', {
        params: pageParams(window),
        tool: 'list_users',
        signal: ctx.signal,
      });
      items = embeddedElements(payload).map((user) => ({
        id: readInteger(user, 'id'),
        name: readString(user, 'name'),
        login: readString(user, 'login'),
        email: readString(user, 'mail') || readString(user, 'email'),
        admin: readBoolean(user, 'admin'),
        status: readString(user, 'status'),
      }));
    }
  } catch (error) {
    throw remapHttpError(error, { 401: LISTING_DENIED, 403: LISTING_DENIED, 404: LISTING_DENIED });
  }

  const page = toPage(filterByEmail(items, args.email_filter, warnings), window, readTotal(payload));
  // the filter runs on one page; paging continues over the unfiltered list
  page.next_offset = toPage(items, window, page.total).next_offset;
  return { ...page, warnings: warnings.length > 0 ? warnings : null };
}

// ============================================
// TOOLS
// ============================================

export const userTools: RegisteredTool[] = [
  defineTool({
    name: 'get_user',
    title: 'Get User',
    description: `Retrieve a user's profile by id.

RETURNS: { id, name, login, status, email, admin, created_at, updated_at, last_login, href, custom_fields: [{ key, id, value, title, href, links }] }.
email and some fields are null when hidden from this API key.

ERRORS:
- HTTP_ERROR 403: "Permission denied: unable to view this user."
- HTTP_ERROR 404: the user does not exist or is not visible.`,
    schema: GetUserSchema,
    annotations: READ_ONLY,
    handler: async (args, ctx) => getUser(ctx, args.id),
  }),

  defineTool({
    name: 'list_users',
    title: 'List Users',
    description: `List users, or the members of one project.

PARAMETERS:
- project (optional): id, identifier or name. Lists project members (users and groups) instead of all users; works without admin rights.
- email_filter (optional): case-insensitive substring on email. Applied to the returned page only; when emails are hidden a warning is returned.
- offset / page_size (optional): 0-based offset on a page boundary; page_size 1..200, default 50.

RETURNS: { items: [{ id, name, login, email, admin, status }], offset, page_size, total, next_offset, warnings }`,
    schema: ListUsersSchema,
    annotations: READ_ONLY,
    handler: async (args, ctx) => listUsers(ctx, args),
  }),
];
