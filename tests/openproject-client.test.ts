import { access, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  OpenProjectClientError,
  OpenProjectErrorType,
  OpenProjectHttpError,
  OpenProjectParseError,
  ValidationError,
} from '../src/errors.js';
import { DEFAULT_RETRY_POLICY, extractErrorMessage, retryDelayMs } from '../src/openproject-client.js';
import { FakeOpenProject } from './helpers/fake-adapter.js';

const WP = 'GET /api/v3/work_packages/9';

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected the call to fail');
}

describe('retry policy', () => {
  it('doubles the backoff for each retry', () => {
    expect([1, 2, 3].map((n) => retryDelayMs(DEFAULT_RETRY_POLICY, n))).toEqual([300, 600, 1200]);
  });

  it('retries 503 and returns the first success', async () => {
    const api = new FakeOpenProject().on(WP, { status: 503 }, { status: 503 }, { body: { id: 9 } });

    const payload = await api.client().get('/api/v3/work_packages/9');

    expect(payload).toEqual({ id: 9 });
    expect(api.calls(WP)).toHaveLength(3);
  });

  it('gives up after maxRetries and reports the last status', async () => {
    const api = new FakeOpenProject().on(WP, { status: 502, body: { message: 'Bad gateway' } });

    const error = await captureError(api.client({ maxRetries: 1 }).get('/api/v3/work_packages/9'));

    expect(error).toBeInstanceOf(OpenProjectHttpError);
    expect(error).toMatchObject({ statusCode: 502, reason: 'Bad gateway', method: 'GET' });
    expect(api.calls(WP)).toHaveLength(2);
  });

  it('does not retry 429 unless enabled', async () => {
    const api = new FakeOpenProject().on(WP, { status: 429 }, { body: { id: 9 } });
    await expect(api.client().get('/api/v3/work_packages/9')).rejects.toMatchObject({ statusCode: 429 });
    expect(api.calls(WP)).toHaveLength(1);

    const enabled = new FakeOpenProject().on(WP, { status: 429 }, { body: { id: 9 } });
    await expect(enabled.client({ retryOn429: true }).get('/api/v3/work_packages/9')).resolves.toEqual({ id: 9 });
    expect(enabled.calls(WP)).toHaveLength(2);
  });

  it('never retries a client error', async () => {
    const api = new FakeOpenProject().on(WP, { status: 404, body: { message: 'Not here' } });

    const error = await captureError(api.client().get('/api/v3/work_packages/9'));

    expect(error).toMatchObject({ statusCode: 404, reason: 'Not here', type: OpenProjectErrorType.HTTP_ERROR });
    expect(api.calls(WP)).toHaveLength(1);
  });

  it('retries connection failures, then reports a network error', async () => {
    const api = new FakeOpenProject().on(WP, { networkError: 'ECONNREFUSED' });

    const error = await captureError(api.client().get('/api/v3/work_packages/9'));

    expect(error).toBeInstanceOf(OpenProjectClientError);
    expect(error).toMatchObject({ type: OpenProjectErrorType.NETWORK_ERROR });
    expect(api.calls(WP)).toHaveLength(3);
  });

  it('reports timeouts as TIMEOUT', async () => {
    const api = new FakeOpenProject().on(WP, { networkError: 'ETIMEDOUT' });

    await expect(api.client({ maxRetries: 0 }).get('/api/v3/work_packages/9')).rejects.toMatchObject({
      type: OpenProjectErrorType.TIMEOUT,
    });
  });

  it('does not send an already aborted request', async () => {
    const api = new FakeOpenProject().on(WP, { body: { id: 9 } });
    const controller = new AbortController();
    controller.abort();

    await expect(api.client().get('/api/v3/work_packages/9', { signal: controller.signal })).rejects.toMatchObject({
      type: OpenProjectErrorType.ABORTED,
    });
    expect(api.requests).toHaveLength(0);
  });

  it('stops waiting for a retry when the call is aborted', async () => {
    const controller = new AbortController();
    const api = new FakeOpenProject().on(WP, () => {
      setTimeout(() => controller.abort(), 10);
      return { status: 503 };
    });
    const started = Date.now();

    const error = await captureError(
      api.client({ backoffBaseMs: 5000 }).get('/api/v3/work_packages/9', { signal: controller.signal })
    );

    expect(error).toMatchObject({ type: OpenProjectErrorType.ABORTED });
    expect(Date.now() - started).toBeLessThan(2000);
  });

  it('frees the concurrency slot while a request waits to retry', async () => {
    const api = new FakeOpenProject()
      .on(WP, { status: 503 }, { body: { id: 9 } })
      .on('GET /api/v3/users/me', { body: { id: 1 } });
    const client = api.client({ backoffBaseMs: 100, maxConcurrentRequests: 1 });
    const finished: string[] = [];

    await Promise.all([
      client.get('/api/v3/work_packages/9').then(() => finished.push('work package')),
      client.get('/api/v3/users/me').then(() => finished.push('user')),
    ]);

    expect(finished).toEqual(['user', 'work package']);
    expect(api.requests.map((request) => request.url)).toEqual([
      '/api/v3/work_packages/9',
      '/api/v3/users/me',
      '/api/v3/work_packages/9',
    ]);
  });
});

describe('response bodies', () => {
  it('treats an empty 2xx body as an empty object', async () => {
    const api = new FakeOpenProject().on('POST /api/v3/work_packages/9/activities', { status: 204 });

    await expect(api.client().post('/api/v3/work_packages/9/activities', { comment: { raw: 'x' } })).resolves.toEqual({});
  });

  it('rejects a body that is not JSON', async () => {
    const api = new FakeOpenProject().on(WP, { body: '<html>maintenance</html>' });

    await expect(api.client().get('/api/v3/work_packages/9')).rejects.toBeInstanceOf(OpenProjectParseError);
  });

  it('rejects JSON that is not an object', async () => {
    const api = new FakeOpenProject().on(WP, { body: [1, 2] });

    await expect(api.client().get('/api/v3/work_packages/9')).rejects.toMatchObject({
      type: OpenProjectErrorType.PARSE_ERROR,
      details: { received: 'array' },
    });
  });

  it('sends the JSON payload and query parameters', async () => {
    const api = new FakeOpenProject().on('PATCH /api/v3/work_packages/9', { body: { id: 9 } });

    await api.client().patch('/api/v3/work_packages/9', { lockVersion: 3 }, { params: { notify: false } });

    expect(api.requests[0]).toMatchObject({ data: { lockVersion: 3 }, params: { notify: false } });
  });
});

describe('extractErrorMessage', () => {
  it('prefers message, then error, then the text body', () => {
    expect(extractErrorMessage({ message: 'from message', error: 'from error' }, '')).toBe('from message');
    expect(extractErrorMessage({ error: 'from error' }, '')).toBe('from error');
    expect(extractErrorMessage(undefined, '  plain failure  ')).toBe('plain failure');
    expect(extractErrorMessage(undefined, 'x'.repeat(600))).toHaveLength(500);
    expect(extractErrorMessage(undefined, '')).toBe('request failed');
  });
});

describe('files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'op-client-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('streams a file from disk as a multipart part', async () => {
    const api = new FakeOpenProject().on('POST /api/v3/work_packages/9/attachments', { status: 201, body: { id: 3 } });
    const filePath = join(dir, 'notes.txt');
    await writeFile(filePath, 'hello from disk');

    const payload = await api.client().postFile('/api/v3/work_packages/9/attachments', {
      filePath,
      contentType: 'text/plain',
      metadata: {},
    });

    expect(payload).toEqual({ id: 3 });
    const body = api.requests[0].data;
    expect(typeof body).toBe('string');
    expect(body).toContain('{"fileName":"notes.txt"}');
    expect(body).toContain('Content-Disposition: form-data; name="file"; filename="notes.txt"');
    expect(body).toContain('hello from disk');
  });

  it('writes a download to disk', async () => {
    const api = new FakeOpenProject().on('GET /api/v3/attachments/1/content', {
      body: 'hello world',
      headers: { 'content-type': 'text/plain' },
    });
    const dest = join(dir, 'hello.txt');

    await expect(api.client().downloadToFile('/api/v3/attachments/1/content', dest)).resolves.toEqual({
      path: dest,
      bytes: 11,
      contentType: 'text/plain',
    });
  });

  it('removes a partially written download', async () => {
    const api = new FakeOpenProject().on('GET /api/v3/attachments/1/content', {
      body: 'first chunk',
      streamError: 'connection reset',
    });
    const dest = join(dir, 'partial.txt');

    await expect(api.client().downloadToFile('/api/v3/attachments/1/content', dest)).rejects.toThrow('connection reset');
    await expect(access(dest)).rejects.toThrow();
  });

  it('removes the target file when the download is refused', async () => {
    const api = new FakeOpenProject().on('GET /api/v3/attachments/1/content', { status: 403 });
    const dest = join(dir, 'denied.txt');

    await expect(api.client().downloadToFile('/api/v3/attachments/1/content', dest)).rejects.toMatchObject({
      statusCode: 403,
    });
    await expect(access(dest)).rejects.toThrow();
  });

  it('sends an upload once even when the server fails', async () => {
    const api = new FakeOpenProject().on('POST /api/v3/work_packages/9/attachments', { status: 503 });

    const error = await captureError(
      api.client().postFile('/api/v3/work_packages/9/attachments', { content: Buffer.from('hello'), fileName: 'a.txt' })
    );

    expect(error).toMatchObject({ statusCode: 503 });
    expect(api.requests).toHaveLength(1);
  });

  it('rejects empty content before any request', async () => {
    const api = new FakeOpenProject();

    await expect(
      api.client().postFile('/api/v3/work_packages/9/attachments', { content: Buffer.alloc(0) })
    ).rejects.toThrow('Attachment content is empty; refusing to upload.');
    expect(api.requests).toHaveLength(0);
  });

  it('rejects a missing file before any request', async () => {
    const api = new FakeOpenProject();

    const error = await captureError(
      api.client().postFile('/api/v3/work_packages/9/attachments', { filePath: '/nonexistent/dir/report.pdf' })
    );

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ message: 'File not found: /nonexistent/dir/report.pdf' });
    expect(api.requests).toHaveLength(0);
  });

  it('falls back to a plain GET when the range is not satisfiable', async () => {
    const api = new FakeOpenProject().on(
      'GET /api/v3/attachments/1/content',
      { status: 416 },
      { body: 'hello world', headers: { 'content-type': 'text/plain' } }
    );

    const result = await api.client().getBytes('/api/v3/attachments/1/content', { maxBytes: 5 });

    expect(result.data.toString('utf8')).toBe('hello');
    expect(result.contentType).toBe('text/plain');
    expect(api.requests[0].headers.Range).toBe('bytes=0-4');
    expect(api.requests[1].headers.Range).toBeUndefined();
  });
});
