import { describe, expect, it } from 'vitest';
import { listProjects } from '../../src/tools/projects.js';
import { listQueries, runQuery } from '../../src/tools/queries.js';
import { logTime } from '../../src/tools/time-entries.js';
import { FakeOpenProject, collection } from '../helpers/fake-adapter.js';

describe('saved queries', () => {
  it('filters by project', async () => {
    const api = new FakeOpenProject().on('GET /api/v3/queries', {
      body: collection([
        { id: 4, name: 'Open bugs', public: true, starred: false, _links: { self: { href: '/api/v3/queries/4' }, project: { href: '/api/v3/projects/5' } } },
      ]),
    });

    const page = await listQueries(api.context(), { project_id: 5 });

    expect(page.items).toEqual([
      { id: 4, name: 'Open bugs', href: '/api/v3/queries/4', project_id: 5, public: true, starred: false },
    ]);
    expect(api.requests[0].params.filters).toBe('[{"project_id":{"operator":"=","values":["5"]}}]');
  });

  it('returns the embedded results of a query', async () => {
    const api = new FakeOpenProject().on('GET /api/v3/queries/4', {
      body: {
        id: 4,
        name: 'Open bugs',
        _embedded: {
          results: {
            total: 120,
            count: 2,
            _embedded: { elements: [{ id: 1, subject: 'First' }, { id: 2, subject: 'Second' }] },
          },
        },
      },
    });

    const result = await runQuery(api.context(), { id: 4, page_size: 2 });

    expect(result).toMatchObject({ query_id: 4, offset: 0, page_size: 2, total: 120, next_offset: 2, count: 2 });
    expect(result.items.map((item) => item.subject)).toEqual(['First', 'Second']);
    expect(api.requests[0].params).toEqual({ offset: 1, pageSize: 2 });
  });

  it('rewrites an unknown query', async () => {
    const api = new FakeOpenProject().on('GET /api/v3/queries/404', { status: 404 });

    await expect(runQuery(api.context(), { id: 404 })).rejects.toMatchObject({ statusCode: 404, reason: 'Query not found.' });
  });
});

describe('listProjects', () => {
  it('filters by name or identifier on the server', async () => {
    const api = new FakeOpenProject().on('GET /api/v3/projects', {
      body: collection([{ id: 5, name: 'Website', identifier: 'web' }], 51),
    });

    const page = await listProjects(api.context(), { offset: 50, name_contains: 'web' });

    expect(page).toEqual({ items: [{ id: 5, name: 'Website', identifier: 'web' }], offset: 50, page_size: 50, total: 51, next_offset: null });
    expect(api.requests[0].params).toEqual({
      offset: 2,
      pageSize: 50,
      filters: '[{"name_and_identifier":{"operator":"~","values":["web"]}}]',
    });
  });
});

describe('logTime', () => {
  it('posts the ISO duration', async () => {
    const api = new FakeOpenProject().on('POST /api/v3/time_entries', { status: 201, body: { id: 77 } });

    const result = await logTime(api.context(), {
      work_package_id: 42,
      duration: '1h 30m',
      comment: 'Review',
      activity_id: 3,
      spent_on: '2026-03-02',
    });

    expect(result).toEqual({
      message: 'Logged 1h 30m to work package 42 on 2026-03-02.',
      time_entry_id: 77,
      hours: 'PT1H30M',
      spent_on: '2026-03-02',
    });
    expect(api.requests[0].data).toEqual({
      hours: 'PT1H30M',
      comment: { raw: 'Review' },
      spentOn: '2026-03-02',
      _links: {
        entity: { href: '/api/v3/work_packages/42' },
        activity: { href: '/api/v3/time_entries/activities/3' },
      },
    });
  });

  it('rejects a bad duration before any request', async () => {
    const api = new FakeOpenProject();

    await expect(logTime(api.context(), { work_package_id: 42, duration: '-2h' })).rejects.toThrow(
      'Negative durations are not allowed.'
    );
    expect(api.requests).toHaveLength(0);
  });
});
