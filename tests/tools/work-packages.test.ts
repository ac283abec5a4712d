import { describe, expect, it } from 'vitest';
import { DurationParseError, OpenProjectHttpError, ValidationError } from '../../src/errors.js';
import {
  appendWorkPackageDescription,
  createWorkPackage,
  getWorkPackage,
  listWorkPackageVersions,
  listWorkPackages,
  searchWorkPackages,
  updateStatus,
  updateWorkPackage,
} from '../../src/tools/work-packages.js';
import { FakeOpenProject, collection } from '../helpers/fake-adapter.js';

const GET_WP = 'GET /api/v3/work_packages/42';
const PATCH_WP = 'PATCH /api/v3/work_packages/42';

const workPackage = {
  id: 42,
  subject: 'Fix login',
  lockVersion: 3,
  description: { format: 'markdown', raw: 'Steps to reproduce', html: '<p>Steps to reproduce</p>' },
  _links: {
    self: { href: '/api/v3/work_packages/42', title: 'Fix login' },
    status: { href: '/api/v3/statuses/1', title: 'New' },
    priority: { href: '/api/v3/priorities/8', title: 'Normal' },
    project: { href: '/api/v3/projects/5', title: 'Website' },
    type: { href: '/api/v3/types/1', title: 'Task' },
    assignee: { href: null },
    version: { href: null },
    availableAssignees: { href: '/api/v3/work_packages/42/available_assignees' },
  },
};

const summary = {
  id: 42,
  subject: 'Fix login',
  lock_version: 3,
  description: 'Steps to reproduce',
  status: { id: 1, name: 'New' },
  priority: { id: 8, name: 'Normal' },
  project: { id: 5, name: 'Website' },
  type: { id: 1, name: 'Task' },
  assignee: null,
  url: '/api/v3/work_packages/42',
};

const statuses = collection([
  { id: 1, name: 'New' },
  { id: 7, name: 'In progress' },
]);

describe('reading', () => {
  it('summarizes a work package', async () => {
    const api = new FakeOpenProject().on(GET_WP, { body: workPackage });

    await expect(getWorkPackage(api.context(), 42)).resolves.toEqual(summary);
  });

  it('lists with project and subject filters', async () => {
    const api = new FakeOpenProject()
      .on('GET /api/v3/projects', { body: collection([{ id: 5, name: 'Website', identifier: 'web' }]) })
      .on('GET /api/v3/work_packages', { body: collection([workPackage]) });

    const page = await listWorkPackages(api.context(), { project: 'web', subject_contains: ' login ' });

    expect(page).toEqual({ items: [summary], offset: 0, page_size: 50, total: 1, next_offset: null });
    expect(api.calls('GET /api/v3/work_packages')[0].params).toEqual({
      offset: 1,
      pageSize: 50,
      filters: '[{"project":{"operator":"=","values":["5"]}},{"subject":{"operator":"~","values":["login"]}}]',
    });
  });

  it('sends an empty filter list without arguments', async () => {
    const api = new FakeOpenProject().on('GET /api/v3/work_packages', { body: collection([]) });

    await listWorkPackages(api.context(), {});

    expect(api.requests[0].params.filters).toBe('[]');
  });

  it('scans pages locally when the text filter is rejected', async () => {
    const api = new FakeOpenProject().on(
      'GET /api/v3/work_packages',
      { status: 400, body: { message: 'Filter text does not exist.' } },
      {
        body: collection([
          { id: 1, subject: 'Login broken' },
          { id: 2, subject: 'Other', description: { raw: 'the login page' } },
          { id: 3, subject: 'Unrelated' },
        ]),
      }
    );

    const result = await searchWorkPackages(api.context(), 'LOGIN');

    expect(result.scope).toBe('client_filtered_paginated');
    expect(result.items.map((item) => item.id)).toEqual([1, 2]);
    expect(api.requests[1].params).toEqual({ offset: 1, pageSize: 200 });
  });

  it('uses the server text filter when accepted', async () => {
    const api = new FakeOpenProject().on('GET /api/v3/work_packages', { body: collection([workPackage]) });

    const result = await searchWorkPackages(api.context(), 'login');

    expect(result).toEqual({ items: [summary], scope: 'server_filtered', page_size: 200 });
    expect(api.requests[0].params.filters).toBe('[{"text":{"operator":"~","values":["login"]}}]');
  });

  it('lists the versions of the work package project', async () => {
    const api = new FakeOpenProject()
      .on(GET_WP, { body: workPackage })
      .on('GET /api/v3/projects/5/versions', { body: collection([{ id: 3, name: '1.0' }]) });

    await expect(listWorkPackageVersions(api.context(), 42)).resolves.toEqual({
      items: [{ id: 3, name: '1.0' }],
      total: 1,
      project_id: 5,
      work_package_id: 42,
    });
  });

  it('refuses versions when the field is not available', async () => {
    const { version: _version, ...links } = workPackage._links;
    const api = new FakeOpenProject().on(GET_WP, { body: { ...workPackage, _links: links } });

    const error = await listWorkPackageVersions(api.context(), 42).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(OpenProjectHttpError);
    expect(error).toMatchObject({ statusCode: 422, reason: 'Version field is not available for this work package.' });
  });
});

describe('creating', () => {
  it('resolves type and priority names', async () => {
    const api = new FakeOpenProject()
      .on('GET /api/v3/projects/5/types', { body: collection([{ id: 1, name: 'Task' }, { id: 2, name: 'Bug' }]) })
      .on('GET /api/v3/priorities', { body: collection([{ id: 8, name: 'Normal' }, { id: 9, name: 'High' }]) })
      .on('POST /api/v3/work_packages', { status: 201, body: workPackage });

    await createWorkPackage(api.context(), { project: 5, subject: 'Crash', type: 'bug', priority: 'high' });

    expect(api.calls('POST /api/v3/work_packages')[0].data).toEqual({
      subject: 'Crash',
      description: { raw: '' },
      _links: {
        project: { href: '/api/v3/projects/5' },
        type: { href: '/api/v3/types/2' },
        priority: { href: '/api/v3/priorities/9' },
      },
    });
  });
});

describe('updating', () => {
  it('sends the lock version with the new status', async () => {
    const api = new FakeOpenProject()
      .on(GET_WP, { body: workPackage })
      .on('GET /api/v3/statuses', { body: statuses })
      .on(PATCH_WP, { body: workPackage });

    await updateStatus(api.context(), 42, 'in progress');

    expect(api.calls(PATCH_WP)[0].data).toEqual({ lockVersion: 3, _links: { status: { href: '/api/v3/statuses/7' } } });
  });

  it('rewrites a lock conflict', async () => {
    const api = new FakeOpenProject()
      .on(GET_WP, { body: workPackage })
      .on('GET /api/v3/statuses', { body: statuses })
      .on(PATCH_WP, { status: 409, body: { message: 'Stale object' } });

    const error = await updateStatus(api.context(), 42, 'New').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(OpenProjectHttpError);
    expect(error).toMatchObject({
      statusCode: 409,
      method: 'PATCH',
      reason: 'Update conflict: lockVersion is outdated. Re-fetch and retry.',
    });
  });

  it('joins the validation messages of a 422', async () => {
    const api = new FakeOpenProject().on(GET_WP, { body: workPackage }).on(PATCH_WP, {
      status: 422,
      body: {
        _type: 'Error',
        message: 'Multiple field constraints have been violated.',
        _embedded: { errors: [{ message: "Subject can't be blank." }, { message: 'Finish date must be after start date.' }] },
      },
    });

    const error = await updateWorkPackage(api.context(), { id: 42, subject: '' }).catch((e: unknown) => e);

    expect(error).toMatchObject({
      statusCode: 422,
      reason: "Validation failed: Subject can't be blank.; Finish date must be after start date.",
    });
  });

  it('builds a partial payload', async () => {
    const api = new FakeOpenProject().on(GET_WP, { body: workPackage }).on(PATCH_WP, { body: workPackage });

    await updateWorkPackage(api.context(), {
      id: 42,
      append_description: 'More details',
      due_date: null,
      estimated_time: '1.5h',
      percent_done: 40,
      assignee: null,
    });

    expect(api.calls(PATCH_WP)[0].data).toEqual({
      lockVersion: 3,
      description: { raw: 'Steps to reproduce\n\nMore details' },
      dueDate: null,
      estimatedTime: 'PT1H30M',
      percentageDone: 40,
      _links: { assignee: { href: null } },
    });
  });

  it('resolves an assignee among the available assignees', async () => {
    const api = new FakeOpenProject()
      .on(GET_WP, { body: workPackage })
      .on('GET /api/v3/work_packages/42/available_assignees', {
        body: collection([
          { _type: 'User', id: 11, name: 'Ana Silva', login: 'asilva', _links: { self: { href: '/api/v3/users/11' } } },
          { _type: 'User', id: 12, name: 'Bruno Costa', login: 'bcosta', _links: { self: { href: '/api/v3/users/12' } } },
        ]),
      })
      .on(PATCH_WP, { body: workPackage });

    await updateWorkPackage(api.context(), { id: 42, assignee: 'ana', accountable: 12 });

    expect(api.calls(PATCH_WP)[0].data).toEqual({
      lockVersion: 3,
      _links: {
        assignee: { href: '/api/v3/users/11' },
        responsible: { href: '/api/v3/users/12' },
      },
    });
  });

  it('validates arguments before any request', async () => {
    const api = new FakeOpenProject();
    const ctx = api.context();

    await expect(updateWorkPackage(ctx, { id: 42, description: 'a', append_description: 'b' })).rejects.toThrow(
      'Provide either description or append_description, not both.'
    );
    await expect(updateWorkPackage(ctx, { id: 42, percent_done: 150 })).rejects.toBeInstanceOf(ValidationError);
    await expect(updateWorkPackage(ctx, { id: 42, estimated_time: 'soon' })).rejects.toBeInstanceOf(DurationParseError);
    await expect(updateWorkPackage(ctx, { id: 42, estimated_time: 'PT-1H' })).rejects.toBeInstanceOf(DurationParseError);
    await expect(updateWorkPackage(ctx, { id: 42, estimated_time: 'PTgarbage' })).rejects.toBeInstanceOf(DurationParseError);
    expect(api.requests).toHaveLength(0);
  });

  it('accepts ISO estimated times as given', async () => {
    const api = new FakeOpenProject().on(GET_WP, { body: workPackage }).on(PATCH_WP, { body: workPackage });

    await updateWorkPackage(api.context(), { id: 42, estimated_time: 'pt2h' });

    expect(api.calls(PATCH_WP)[0].data).toEqual({ lockVersion: 3, estimatedTime: 'PT2H' });
  });
});

describe('appendWorkPackageDescription', () => {
  it('starts an empty description without a separator', async () => {
    const { description: _description, ...withoutDescription } = workPackage;
    const api = new FakeOpenProject().on(GET_WP, { body: withoutDescription }).on(PATCH_WP, { body: workPackage });

    await appendWorkPackageDescription(api.context(), 42, 'First note');

    expect(api.calls(PATCH_WP)[0].data).toEqual({ lockVersion: 3, description: { raw: 'First note' } });
  });

  it('rewrites a conflict', async () => {
    const api = new FakeOpenProject().on(GET_WP, { body: workPackage }).on(PATCH_WP, { status: 409 });

    await expect(appendWorkPackageDescription(api.context(), 42, 'x')).rejects.toThrow(
      'Work package was updated by someone else; please reload and retry.'
    );
  });
});
