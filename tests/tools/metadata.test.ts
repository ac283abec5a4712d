import { describe, expect, it } from 'vitest';
import { MetadataCache } from '../../src/cache.js';
import { NotFoundResolutionError, OpenProjectErrorType, ResolutionError } from '../../src/errors.js';
import { ReferenceItemSchema } from '../../src/models.js';
import {
  fetchPaginated,
  numericRef,
  resolveProject,
  resolveStatusId,
  resolveTypeForProject,
  resolveUser,
} from '../../src/tools/metadata.js';
import { FakeOpenProject, collection } from '../helpers/fake-adapter.js';

const projects = collection([
  { id: 5, name: 'Website', identifier: 'web' },
  { id: 6, name: 'Mobile app', identifier: 'mobile' },
]);
const globalTypes = collection([
  { id: 1, name: 'Task' },
  { id: 2, name: 'Bug' },
]);

describe('numericRef', () => {
  it('treats digit strings as ids', () => {
    expect(numericRef(7)).toBe(7);
    expect(numericRef(' 42 ')).toBe(42);
    expect(numericRef('web')).toBeNull();
    expect(numericRef('4 2')).toBeNull();
  });
});

describe('fetchPaginated', () => {
  it('walks pages until the total is reached', async () => {
    const api = new FakeOpenProject().on('GET /api/v3/projects', (request) =>
      request.params.offset === 1
        ? { body: collection([{ id: 1, name: 'A' }, { id: 2, name: 'B' }], 3) }
        : { body: collection([{ id: 3, name: 'C' }], 3) }
    );

    const items = await fetchPaginated(api.context(), '/api/v3/projects', ReferenceItemSchema, 'project', {
      maxPages: 5,
      pageSize: 2,
    });

    expect(items.map((item) => item.id)).toEqual([1, 2, 3]);
    expect(api.requests.map((request) => request.params)).toEqual([
      { offset: 1, pageSize: 2 },
      { offset: 2, pageSize: 2 },
    ]);
  });

  it('stops at maxPages', async () => {
    const api = new FakeOpenProject().on('GET /api/v3/projects', {
      body: collection([{ id: 1, name: 'A' }, { id: 2, name: 'B' }], 100),
    });

    await fetchPaginated(api.context(), '/api/v3/projects', ReferenceItemSchema, 'project', { maxPages: 3, pageSize: 2 });

    expect(api.requests).toHaveLength(3);
  });
});

describe('resolveProject', () => {
  it('returns numeric references without a request', async () => {
    const api = new FakeOpenProject();
    await expect(resolveProject(api.context(), '42')).resolves.toBe(42);
    expect(api.requests).toHaveLength(0);
  });

  it('resolves identifiers and names', async () => {
    const api = new FakeOpenProject().on('GET /api/v3/projects', { body: projects });
    const ctx = api.context();

    await expect(resolveProject(ctx, 'web')).resolves.toBe(5);
    await expect(resolveProject(ctx, 'mobile APP')).resolves.toBe(6);
    expect(api.requests[0].params).toEqual({ offset: 1, pageSize: 200 });
  });
});

describe('resolveTypeForProject', () => {
  it('uses the types enabled in the project', async () => {
    const api = new FakeOpenProject()
      .on('GET /api/v3/projects', { body: projects })
      .on('GET /api/v3/projects/5/types', { body: collection([{ id: 1, name: 'Task' }]) });

    await expect(resolveTypeForProject(api.context(), 'web', 'task')).resolves.toBe(1);

    const error = await resolveTypeForProject(api.context(), 'web', 'bug').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(NotFoundResolutionError);
    expect(error).toMatchObject({ available: ['Task'] });
  });

  it('falls back to the global list when the project endpoint is missing', async () => {
    const api = new FakeOpenProject()
      .on('GET /api/v3/projects/5/types', { status: 404 })
      .on('GET /api/v3/types', { body: globalTypes });

    await expect(resolveTypeForProject(api.context(), 5, 'Bug')).resolves.toBe(2);
    expect(api.calls('GET /api/v3/types')).toHaveLength(1);
  });

  it('does not hide permission errors', async () => {
    const api = new FakeOpenProject().on('GET /api/v3/projects/5/types', { status: 403 });

    await expect(resolveTypeForProject(api.context(), 5, 'Bug')).rejects.toMatchObject({ statusCode: 403 });
  });
});

describe('resolveUser', () => {
  it('explains a forbidden user listing', async () => {
    const api = new FakeOpenProject().on('GET /api/v3/users', { status: 403 });

    const error = await resolveUser(api.context(), 'Ana').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ResolutionError);
    expect(error).toMatchObject({
      type: OpenProjectErrorType.RESOLUTION_ERROR,
      message: 'User listing unavailable: insufficient permissions. Provide a numeric user id.',
      details: { query: 'Ana', status: 403 },
    });
  });

  it('matches by login', async () => {
    const api = new FakeOpenProject().on('GET /api/v3/users', {
      body: collection([
        { id: 11, name: 'Ana Silva', login: 'asilva' },
        { id: 12, name: 'Bruno Costa', login: 'bcosta' },
      ]),
    });

    await expect(resolveUser(api.context(), 'bcost')).resolves.toBe(12);
  });
});

describe('cached statuses', () => {
  it('fetches the list once per cache', async () => {
    const api = new FakeOpenProject().on('GET /api/v3/statuses', {
      body: collection([{ id: 1, name: 'New' }, { id: 7, name: 'In progress', isClosed: false }]),
    });
    const ctx = api.context(new MetadataCache());

    await expect(resolveStatusId(ctx, 'new')).resolves.toBe(1);
    await expect(resolveStatusId(ctx, 'progress')).resolves.toBe(7);
    expect(api.calls('GET /api/v3/statuses')).toHaveLength(1);
  });
});
