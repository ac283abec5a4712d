import {
  HalPayload,
  embeddedElements,
  getEmbedded,
  getLinkHref,
  getLinkList,
  getLinkTitle,
  isRecord,
  parseIdFromHref,
  readInteger,
  readString,
} from '../hal.js';
import { Page, UserRef } from '../models.js';
import { normalizeName } from '../resolver.js';
import { GetProjectMembershipsSchema } from '../schemas.js';
import { MAX_PAGE_SIZE, pageParams, pageWindow, projectFilter, readTotal, toPage } from '../utils.js';
import { resolveProject } from './metadata.js';
import { READ_ONLY, RegisteredTool, ToolContext, defineTool } from './registry.js';
import { remapHttpError } from './remap.js';

export const MEMBERSHIPS_ENDPOINT = '/api/v3/memberships';

const PRINCIPAL_MAX_PAGES = 5;

export type PrincipalType = 'User' | 'Group' | 'PlaceholderUser' | null;

export interface MembershipSummary {
  membership_id: number | null;
  principal_id: number | null;
  principal_name: string | null;
  principal_href: string | null;
  principal_type: PrincipalType;
  roles: string[];
}

// ============================================
// PARSING
// ============================================

function principalTypeOf(href: string | null): PrincipalType {
  if (!href) return null;
  if (href.includes('/placeholder_users/')) return 'PlaceholderUser';
  if (href.includes('/groups/')) return 'Group';
  if (href.includes('/users/')) return 'User';
  return null;
}

function principalOf(membership: HalPayload): { id: number | null; name: string | null; href: string | null } {
  const href = getLinkHref(membership, 'principal');
  if (href) {
    return { id: parseIdFromHref(href), name: getLinkTitle(membership, 'principal'), href };
  }

  // older instances embed a user instead
  const embedded = getEmbedded(membership, 'user');
  const user = isRecord(embedded) ? embedded : {};
  const userHref = getLinkHref(membership, 'user');
  return {
    id: readInteger(user, 'id') ?? parseIdFromHref(userHref),
    name: readString(user, 'name') ?? getLinkTitle(membership, 'user'),
    href: userHref,
  };
}

function rolesOf(membership: HalPayload): string[] {
  const embedded = getEmbedded(membership, 'roles');
  const embeddedNames = Array.isArray(embedded)
    ? embedded.filter(isRecord).flatMap((role) => {
        const name = readString(role, 'name');
        return name ? [name] : [];
      })
    : [];
  const linkTitles = getLinkList(membership, 'roles').flatMap((role) =>
    typeof role.title === 'string' && role.title ? [role.title] : []
  );
  return [...new Set([...embeddedNames, ...linkTitles])];
}

export function toMembershipSummary(membership: HalPayload): MembershipSummary {
  const principal = principalOf(membership);
  return {
    membership_id: readInteger(membership, 'id') ?? parseIdFromHref(getLinkHref(membership, 'self')),
    principal_id: principal.id,
    principal_name: principal.name,
    principal_href: principal.href,
    principal_type: principalTypeOf(principal.href),
    roles: rolesOf(membership),
  };
}

// ============================================
// OPERATIONS
// ============================================

export async function getProjectMemberships(
  ctx: ToolContext,
  args: { project: string | number; offset?: number; page_size?: number; sort?: boolean }
): Promise<Page<MembershipSummary> & { project_id: number }> {
  const window = pageWindow(args.offset, args.page_size, 100);
  const projectId = await resolveProject(ctx, args.project);

  let payload: HalPayload;
  try {
    payload = await ctx.client.get(MEMBERSHIPS_ENDPOINT, {
      params: { ...pageParams(window), filters: projectFilter(projectId) },
      tool: 'get_project_memberships',
      signal: ctx.signal,
    });
  } catch (error) {
    throw remapHttpError(error, { 403: 'Permission denied: unable to view project memberships.' });
  }

  const items = embeddedElements(payload).map(toMembershipSummary);
  if (args.sort) {
    items.sort((a, b) => {
      const left = normalizeName(a.principal_name);
      const right = normalizeName(b.principal_name);
      if (left !== right) return left < right ? -1 : 1;
      return (a.principal_id ?? 0) - (b.principal_id ?? 0);
    });
  }

  return { ...toPage(items, window, readTotal(payload)), project_id: projectId };
}

/** Members of a project as resolvable principals (users and groups). */
export async function fetchMembershipPrincipals(ctx: ToolContext, projectId: number, tool: string): Promise<UserRef[]> {
  const principals: UserRef[] = [];

  for (let page = 1; page <= PRINCIPAL_MAX_PAGES; page++) {
    const payload = await ctx.client.get(MEMBERSHIPS_ENDPOINT, {
      params: { offset: page, pageSize: MAX_PAGE_SIZE, filters: projectFilter(projectId) },
      tool,
      signal: ctx.signal,
    });
    const batch = embeddedElements(payload);

    for (const membership of batch) {
      const principal = principalOf(membership);
      if (principal.id !== null && principal.name) {
        principals.push({ id: principal.id, name: principal.name });
      }
    }

    if (batch.length < MAX_PAGE_SIZE) break;
  }

  return principals;
}

// ============================================
// TOOLS
// ============================================

export const membershipTools: RegisteredTool[] = [
  defineTool({
    name: 'get_project_memberships',
    title: 'Get Project Memberships',
    description: `List the members of a project with their roles.

PARAMETERS:
- project (required): id, identifier or name.
- offset / page_size (optional): page_size defaults to 100 here.
- sort (optional): sort the page by principal name.

RETURNS: { items: [{ membership_id, principal_id, principal_name, principal_href, principal_type, roles }], offset, page_size, total, next_offset, project_id }.
principal_type is User, Group or PlaceholderUser. A principal_id can be used directly as assignee or accountable in update_work_package.`,
    schema: GetProjectMembershipsSchema,
    annotations: READ_ONLY,
    handler: async (args, ctx) => getProjectMemberships(ctx, args),
  }),
];
