import { describe, expect, it } from 'vitest';
import { getProjectMemberships } from '../../src/tools/memberships.js';
import { extractCustomFields, getUser, listUsers } from '../../src/tools/users.js';
import { FakeOpenProject, collection } from '../helpers/fake-adapter.js';

const user = {
  _type: 'User',
  id: 11,
  name: 'Ana Silva',
  login: 'asilva',
  status: 'active',
  email: 'ana@example.test',
  admin: false,
  createdAt: '2024-01-02T10:00:00Z',
  customField3: 'Blue',
  _links: {
    self: { href: '/api/v3/users/11', title: 'Ana Silva' },
    customField1: { href: '/api/v3/custom_options/7', title: 'Lisbon' },
    customField2: [
      { href: '/api/v3/custom_options/8', title: 'Backend' },
      { href: '/api/v3/custom_options/9', title: 'Frontend' },
    ],
  },
};

describe('extractCustomFields', () => {
  it('merges root values and links, ordered by field id', () => {
    expect(extractCustomFields(user)).toEqual([
      {
        key: 'customField1',
        id: 1,
        value: 'Lisbon',
        title: 'Lisbon',
        href: '/api/v3/custom_options/7',
        links: [{ title: 'Lisbon', href: '/api/v3/custom_options/7' }],
      },
      {
        key: 'customField2',
        id: 2,
        value: 'Backend',
        title: 'Backend',
        href: '/api/v3/custom_options/8',
        links: [
          { title: 'Backend', href: '/api/v3/custom_options/8' },
          { title: 'Frontend', href: '/api/v3/custom_options/9' },
        ],
      },
      { key: 'customField3', id: 3, value: 'Blue', title: null, href: null, links: [] },
    ]);
  });
});

describe('getUser', () => {
  it('returns the profile', async () => {
    const api = new FakeOpenProject().on('GET /api/v3/users/11', { body: user });

    await expect(getUser(api.context(), 11)).resolves.toMatchObject({
      id: 11,
      name: 'Ana Silva',
      login: 'asilva',
      email: 'ana@example.test',
      admin: false,
      created_at: '2024-01-02T10:00:00Z',
      updated_at: null,
      href: '/api/v3/users/11',
    });
  });

  it('rewrites a missing user', async () => {
    const api = new FakeOpenProject().on('GET /api/v3/users/99', { status: 404, body: { message: 'not found' } });

    await expect(getUser(api.context(), 99)).rejects.toMatchObject({
      statusCode: 404,
      reason: 'User not found or insufficient permissions to view this user.',
    });
  });
});

describe('listUsers', () => {
  it('warns when emails are hidden', async () => {
    const api = new FakeOpenProject().on('GET /api/v3/users', {
      body: collection([
        { id: 11, name: 'Ana Silva', login: 'asilva' },
        { id: 12, name: 'Bruno Costa', login: 'bcosta' },
      ]),
    });

    await expect(listUsers(api.context(), { email_filter: 'example' })).resolves.toEqual({
      items: [],
      offset: 0,
      page_size: 50,
      total: 2,
      next_offset: null,
      warnings: ['email not visible to this token; email_filter may be ignored and returned no matches.'],
    });
  });

  it('filters by email when visible', async () => {
    const api = new FakeOpenProject().on('GET /api/v3/users', {
      body: collection([user, { id: 12, name: 'Bruno Costa', login: 'bcosta', email: 'bruno@other.test' }]),
    });

    const result = await listUsers(api.context(), { email_filter: 'EXAMPLE.test' });

    expect(result.items.map((item) => item.id)).toEqual([11]);
    expect(result.warnings).toBeNull();
  });

  it('rewrites a forbidden listing', async () => {
    const api = new FakeOpenProject().on('GET /api/v3/users', { status: 403 });

    await expect(listUsers(api.context(), {})).rejects.toMatchObject({
      statusCode: 403,
      reason: 'Cannot list users with this token; provide user ID or project membership.',
    });
  });

  it('does not warn about hidden emails on an empty page', async () => {
    const api = new FakeOpenProject().on('GET /api/v3/users', { body: collection([]) });

    const result = await listUsers(api.context(), { email_filter: 'example' });

    expect(result.items).toEqual([]);
    expect(result.warnings).toBeNull();
  });

  it('reports a project lookup failure as it is', async () => {
    const api = new FakeOpenProject().on('GET /api/v3/projects', {
      status: 403,
      body: { message: 'You are not authorized to access this resource.' },
    });

    await expect(listUsers(api.context(), { project: 'Website' })).rejects.toMatchObject({
      statusCode: 403,
      reason: 'You are not authorized to access this resource.',
    });
    expect(api.calls('GET /api/v3/memberships')).toHaveLength(0);
  });

  it('lists project members through memberships', async () => {
    const api = new FakeOpenProject().on('GET /api/v3/memberships', {
      body: collection([{ id: 1, _links: { principal: { href: '/api/v3/users/11', title: 'Ana Silva' } } }]),
    });

    const result = await listUsers(api.context(), { project: 5 });

    expect(result.items).toEqual([{ id: 11, name: 'Ana Silva', login: null, email: null, admin: null, status: null }]);
    expect(api.requests[0].params.filters).toBe('[{"project":{"operator":"=","values":["5"]}}]');
  });
});

describe('getProjectMemberships', () => {
  const memberships = collection([
    {
      id: 1,
      _links: {
        self: { href: '/api/v3/memberships/1' },
        principal: { href: '/api/v3/users/11', title: 'Zoe Ramos' },
        roles: [{ href: '/api/v3/roles/3', title: 'Member' }],
      },
      _embedded: { roles: [{ id: 3, name: 'Member' }] },
    },
    {
      id: 2,
      _links: {
        principal: { href: '/api/v3/groups/20', title: 'Developers' },
        roles: [{ title: 'Developer' }, { title: 'Reviewer' }],
      },
    },
    {
      id: 3,
      _links: { user: { href: '/api/v3/users/12', title: 'Ana Silva' } },
      _embedded: { user: { id: 12, name: 'Ana Silva' } },
    },
  ]);

  it('summarizes principals and roles, sorted by name', async () => {
    const api = new FakeOpenProject().on('GET /api/v3/memberships', { body: memberships });

    const result = await getProjectMemberships(api.context(), { project: 5, sort: true });

    expect(result).toEqual({
      items: [
        { membership_id: 3, principal_id: 12, principal_name: 'Ana Silva', principal_href: '/api/v3/users/12', principal_type: 'User', roles: [] },
        {
          membership_id: 2,
          principal_id: 20,
          principal_name: 'Developers',
          principal_href: '/api/v3/groups/20',
          principal_type: 'Group',
          roles: ['Developer', 'Reviewer'],
        },
        { membership_id: 1, principal_id: 11, principal_name: 'Zoe Ramos', principal_href: '/api/v3/users/11', principal_type: 'User', roles: ['Member'] },
      ],
      offset: 0,
      page_size: 100,
      total: 3,
      next_offset: null,
      project_id: 5,
    });
    expect(api.requests[0].params).toEqual({
      offset: 1,
      pageSize: 100,
      filters: '[{"project":{"operator":"=","values":["5"]}}]',
    });
  });

  it('rewrites a forbidden listing', async () => {
    const api = new FakeOpenProject().on('GET /api/v3/memberships', { status: 403 });

    await expect(getProjectMemberships(api.context(), { project: 5 })).rejects.toMatchObject({
      reason: 'Permission denied: unable to view project memberships.',
    });
  });
});
