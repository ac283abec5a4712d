import axios, { AxiosAdapter, AxiosError, AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import axiosRetry from 'axios-retry';
import { default as PQueue } from 'p-queue';
import FormData from 'form-data';
import type { ReadStream, WriteStream } from 'node:fs';
import { open, rm } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { basename } from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { VERSION } from './config.js';
import { logger } from './logging/index.js';
import { setupLoggingMiddleware } from './middleware/logging-middleware.js';
import {
  OpenProjectClientError,
  OpenProjectErrorType,
  OpenProjectHttpError,
  OpenProjectParseError,
  ValidationError,
} from './errors.js';
import { HalPayload, isRecord } from './hal.js';

export const USER_AGENT = `openproject-mcp-server/${VERSION}`;

const ERROR_SNIPPET_LENGTH = 500;

const NETWORK_ERROR_CODES: ReadonlySet<string> = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ETIMEDOUT',
  'ECONNABORTED',
]);

const TIMEOUT_CODES: ReadonlySet<string> = new Set(['ETIMEDOUT', 'ECONNABORTED']);

const STATUS_HINTS: Record<number, string> = {
  401: 'Check OPENPROJECT_API_KEY (My account > Access tokens).',
  403: 'The API key does not have permission for this action.',
  404: 'Check the id; OpenProject also answers 404 when the resource is not visible to you.',
};

// ============================================
// RETRY POLICY
// ============================================

export interface RetryPolicy {
  readonly maxRetries: number;
  readonly backoffBaseMs: number;
  readonly retryStatuses: ReadonlySet<number>;
  readonly retryOn429: boolean;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
  maxRetries: 2,
  backoffBaseMs: 300,
  retryStatuses: new Set([502, 503, 504]),
  retryOn429: false,
});

/** Delay before retry `retryNumber` (1-based): base * 2^(n-1). */
export function retryDelayMs(policy: RetryPolicy, retryNumber: number): number {
  return policy.backoffBaseMs * 2 ** (retryNumber - 1);
}

function isCancellation(error: AxiosError): boolean {
  return axios.isCancel(error) || error.code === AxiosError.ERR_CANCELED || error.config?.signal?.aborted === true;
}

export function isRetryableError(policy: RetryPolicy, error: AxiosError): boolean {
  if (isCancellation(error)) return false;

  const status = error.response?.status;
  if (status !== undefined) {
    return policy.retryStatuses.has(status) || (status === 429 && policy.retryOn429);
  }
  return error.code !== undefined && NETWORK_ERROR_CODES.has(error.code);
}

// ============================================
// OPTIONS
// ============================================

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'PUT' | 'DELETE';

export interface OpenProjectClientOptions {
  baseUrl: string;
  apiKey: string;
  timeoutMs?: number;
  retry?: Partial<RetryPolicy>;
  maxConcurrentRequests?: number;
  userAgent?: string;
  /** Replaces the HTTP transport (tests). */
  adapter?: AxiosAdapter;
}

export interface CallOptions {
  tool?: string;
  signal?: AbortSignal;
}

export interface RequestOptions extends CallOptions {
  params?: Record<string, unknown>;
  json?: unknown;
}

export interface FileUpload {
  filePath?: string;
  content?: Buffer;
  fileName?: string;
  contentType?: string;
  /** Sent as a JSON `metadata` part before the file part, with `fileName` filled in. */
  metadata?: Record<string, unknown>;
  fieldName?: string;
}

export interface DownloadResult {
  path: string;
  bytes: number;
  contentType: string | null;
}

export interface BytesResult {
  data: Buffer;
  contentType: string | null;
}

// ============================================
// CLIENT
// ============================================

export class OpenProjectClient {
  readonly baseUrl: string;
  readonly retryPolicy: RetryPolicy;
  private http: AxiosInstance;
  private queue: PQueue;

  constructor(options: OpenProjectClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.retryPolicy = Object.freeze({ ...DEFAULT_RETRY_POLICY, ...options.retry });
    this.queue = new PQueue({ concurrency: options.maxConcurrentRequests ?? 5 });

    // Each attempt takes a queue slot; backoff waits between attempts hold none
    const transport = axios.getAdapter(options.adapter ?? axios.defaults.adapter);

    this.http = axios.create({
      baseURL: this.baseUrl,
      auth: { username: 'apikey', password: options.apiKey },
      headers: {
        Accept: 'application/hal+json',
        'Content-Type': 'application/json',
        'User-Agent': options.userAgent ?? USER_AGENT,
      },
      timeout: options.timeoutMs ?? 10000,
      adapter: (config) => this.sendQueued(transport, config),
    });

    logger.addSecret(options.apiKey);
    logger.addSecret(Buffer.from(`apikey:${options.apiKey}`).toString('base64'));

    // Order matters: logging sees every attempt, the error mapper only the final outcome
    setupLoggingMiddleware(this.http);

    axiosRetry(this.http, {
      retries: this.retryPolicy.maxRetries,
      shouldResetTimeout: true,
      retryDelay: (retryCount) => retryDelayMs(this.retryPolicy, retryCount),
      retryCondition: (error) => isRetryableError(this.retryPolicy, error),
      onRetry: (retryCount, error, requestConfig) => {
        logger.warning('Retrying request', {
          tool: requestConfig.tool,
          method: requestConfig.method?.toUpperCase(),
          url: this.http.getUri(requestConfig),
          retry: retryCount,
          status: error.response?.status,
          code: error.code,
        }, 'openproject-client');
      },
    });

    this.http.interceptors.response.use(
      (response) => response,
      async (error: unknown) => {
        throw await this.toClientError(error);
      }
    );

    logger.debug('OpenProjectClient initialized', {
      base_url: this.baseUrl,
      max_concurrent: this.queue.concurrency,
      max_retries: this.retryPolicy.maxRetries,
    }, 'openproject-client');
  }

  // ============================================
  // JSON REQUESTS
  // ============================================

  async request(method: HttpMethod, url: string, options: RequestOptions = {}): Promise<HalPayload> {
    throwIfAborted(options.signal);
    const response = await this.http.request<string>({
      method,
      url,
      params: options.params,
      data: options.json,
      responseType: 'text',
      tool: options.tool,
      signal: options.signal,
    });
    return this.parseBody(response);
  }

  async get(url: string, options: Omit<RequestOptions, 'json'> = {}): Promise<HalPayload> {
    return this.request('GET', url, options);
  }

  async post(url: string, json: unknown, options: Omit<RequestOptions, 'json'> = {}): Promise<HalPayload> {
    return this.request('POST', url, { ...options, json });
  }

  async patch(url: string, json: unknown, options: Omit<RequestOptions, 'json'> = {}): Promise<HalPayload> {
    return this.request('PATCH', url, { ...options, json });
  }

  // ============================================
  // FILES
  // ============================================

  /**
   * multipart/form-data upload. Never retried: a retried upload can create a
   * duplicate attachment.
   */
  async postFile(url: string, upload: FileUpload, options: CallOptions = {}): Promise<HalPayload> {
    throwIfAborted(options.signal);
    let handle: FileHandle | null = null;
    let source: ReadStream | null = null;

    try {
      const form = new FormData();
      const fileName = upload.fileName ?? (upload.filePath ? basename(upload.filePath) : 'attachment.bin');
      if (upload.metadata) {
        form.append('metadata', JSON.stringify({ fileName, ...upload.metadata }), { contentType: 'application/json' });
      }

      const fieldName = upload.fieldName ?? 'file';
      const contentType = upload.contentType ?? 'application/octet-stream';

      if (upload.content !== undefined) {
        if (upload.content.length === 0) {
          throw new ValidationError('Attachment content is empty; refusing to upload.');
        }
        form.append(fieldName, upload.content, {
          filename: fileName,
          contentType,
          knownLength: upload.content.length,
        });
      } else if (upload.filePath) {
        handle = await openForUpload(upload.filePath);
        const stats = await handle.stat();
        if (!stats.isFile()) {
          throw new ValidationError(`File not found: ${upload.filePath}`);
        }
        if (stats.size === 0) {
          throw new ValidationError('Attachment content is empty; refusing to upload.');
        }
        source = handle.createReadStream();
        form.append(fieldName, source, {
          filename: fileName,
          contentType,
          knownLength: stats.size,
        });
      } else {
        throw new ValidationError('Either a file path or file content must be provided.');
      }

      const response = await this.http.post<string>(url, form, {
        headers: form.getHeaders(),
        responseType: 'text',
        maxBodyLength: Infinity,
        'axios-retry': { retries: 0 },
        tool: options.tool,
        signal: options.signal,
      });
      return this.parseBody(response);
    } finally {
      // the stream owns the descriptor once created and closes it when destroyed
      if (source) {
        source.destroy();
      } else {
        await handle?.close();
      }
    }
  }

  /** Stream `href` to `dest`; a partially written file is removed on failure. */
  async downloadToFile(
    href: string,
    dest: string,
    options: CallOptions & { overwrite?: boolean } = {}
  ): Promise<DownloadResult> {
    throwIfAborted(options.signal);
    let handle: FileHandle;
    try {
      handle = await open(dest, options.overwrite ? 'w' : 'wx');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'EEXIST') {
        throw new ValidationError(`File exists: ${dest}`, { path: dest });
      }
      throw error;
    }

    let sink: WriteStream | null = null;
    let completed = false;
    try {
      const response = await this.http.get<Readable>(href, {
        responseType: 'stream',
        tool: options.tool,
        signal: options.signal,
      });
      sink = handle.createWriteStream();
      await pipeline(response.data, sink);
      completed = true;
      return {
        path: dest,
        bytes: sink.bytesWritten,
        contentType: headerValue(response, 'content-type'),
      };
    } finally {
      // pipeline closes the sink, and with it the descriptor, on success and on failure
      if (!sink) {
        await handle.close();
      }
      if (!completed) {
        await rm(dest, { force: true });
      }
    }
  }

  /** First `maxBytes` of `href` via a Range request; a 416 is retried without Range. */
  async getBytes(href: string, options: CallOptions & { maxBytes: number }): Promise<BytesResult> {
    throwIfAborted(options.signal);
    const fetchBytes = async (range: boolean): Promise<BytesResult> => {
      const response = await this.http.get<ArrayBuffer>(href, {
        responseType: 'arraybuffer',
        headers: range ? { Range: `bytes=0-${options.maxBytes - 1}` } : undefined,
        tool: options.tool,
        signal: options.signal,
      });
      return {
        data: toBuffer(response.data).subarray(0, options.maxBytes),
        contentType: headerValue(response, 'content-type'),
      };
    };

    try {
      return await fetchBytes(true);
    } catch (error) {
      if (error instanceof OpenProjectHttpError && error.statusCode === 416) {
        return fetchBytes(false);
      }
      throw error;
    }
  }

  getQueueStatus(): { size: number; pending: number; concurrency: number } {
    return {
      size: this.queue.size,
      pending: this.queue.pending,
      concurrency: this.queue.concurrency,
    };
  }

  // ============================================
  // INTERNALS
  // ============================================

  // Wrap every attempt with the queue for concurrency control
  private async sendQueued(transport: AxiosAdapter, config: InternalAxiosRequestConfig): Promise<AxiosResponse> {
    const signal = config.signal instanceof AbortSignal ? config.signal : undefined;

    try {
      return await this.queue.add(() => transport(config), { signal, throwOnTimeout: true });
    } catch (error) {
      // p-queue rejects with the signal's reason when a queued task is aborted
      if (signal?.aborted && !(error instanceof AxiosError)) {
        throw new AxiosError('Request aborted', AxiosError.ERR_CANCELED, config);
      }
      throw error;
    }
  }

  private parseBody(response: AxiosResponse<string>): HalPayload {
    const text = decodeBody(response.data);
    if (!text.trim()) return {};

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      throw new OpenProjectParseError('Invalid JSON response', {
        url: this.http.getUri(response.config),
        snippet: text.slice(0, ERROR_SNIPPET_LENGTH),
      });
    }

    if (!isRecord(parsed)) {
      throw new OpenProjectParseError('Expected a JSON object in the response', {
        url: this.http.getUri(response.config),
        received: Array.isArray(parsed) ? 'array' : typeof parsed,
      });
    }
    return parsed;
  }

  private async toClientError(error: unknown): Promise<OpenProjectClientError> {
    if (error instanceof OpenProjectClientError) {
      return error;
    }
    if (!(error instanceof AxiosError)) {
      return new OpenProjectClientError(
        OpenProjectErrorType.UNKNOWN_ERROR,
        error instanceof Error ? error.message : String(error)
      );
    }

    if (isCancellation(error)) {
      return abortedError();
    }

    const config = error.config;
    const method = (config?.method ?? 'GET').toUpperCase();
    const url = config ? this.http.getUri(config) : 'unknown';

    if (error.response) {
      return this.toHttpError(error.response, method, url);
    }

    if (error.code !== undefined && TIMEOUT_CODES.has(error.code)) {
      return new OpenProjectClientError(
        OpenProjectErrorType.TIMEOUT,
        `Request timeout calling ${method} ${url}`,
        { code: error.code, timeout_ms: config?.timeout },
        'Increase OPENPROJECT_REQUEST_TIMEOUT_MS or narrow the request.'
      );
    }

    return new OpenProjectClientError(
      OpenProjectErrorType.NETWORK_ERROR,
      `Network error calling ${method} ${url}: ${error.message}`,
      { code: error.code },
      'Check OPENPROJECT_BASE_URL and network connectivity.'
    );
  }

  private async toHttpError(response: AxiosResponse, method: string, url: string): Promise<OpenProjectHttpError> {
    const text = response.data instanceof Readable ? await readStream(response.data) : decodeBody(response.data);

    let responseJson: Record<string, unknown> | undefined;
    try {
      const parsed: unknown = text.trim() ? JSON.parse(text) : undefined;
      responseJson = isRecord(parsed) ? parsed : undefined;
    } catch {
      responseJson = undefined;
    }

    return new OpenProjectHttpError({
      statusCode: response.status,
      method,
      url,
      message: extractErrorMessage(responseJson, text),
      responseJson,
      responseText: text || undefined,
      hint: STATUS_HINTS[response.status],
    });
  }
}

// ============================================
// HELPERS
// ============================================

/** JSON `message`, then JSON `error`, then the start of the text body. */
export function extractErrorMessage(json: Record<string, unknown> | undefined, text: string): string {
  if (json) {
    if (typeof json.message === 'string' && json.message) return json.message;
    if (typeof json.error === 'string' && json.error) return json.error;
  }
  const snippet = text.trim().slice(0, ERROR_SNIPPET_LENGTH);
  return snippet || 'request failed';
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw abortedError();
  }
}

function abortedError(): OpenProjectClientError {
  return new OpenProjectClientError(
    OpenProjectErrorType.ABORTED,
    'Request aborted',
    { code: 'ABORTED' },
    'The operation was cancelled by the client'
  );
}

async function openForUpload(filePath: string): Promise<FileHandle> {
  try {
    return await open(filePath, 'r');
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'EISDIR')) {
      throw new ValidationError(`File not found: ${filePath}`, { path: filePath });
    }
    throw error;
  }
}

function decodeBody(data: unknown): string {
  if (typeof data === 'string') return data;
  if (data === undefined || data === null) return '';
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return JSON.stringify(data);
}

function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  return Buffer.from(decodeBody(data), 'utf8');
}

async function readStream(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

function headerValue(response: AxiosResponse, name: string): string | null {
  const value: unknown = response.headers[name];
  return typeof value === 'string' ? value : null;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
