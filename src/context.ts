import { randomUUID } from 'node:crypto';
import type { IncomingHttpHeaders } from 'node:http';
import { AppConfig } from './config.js';
import { ValidationError } from './errors.js';

export const API_KEY_HEADER = 'x-openproject-key';
export const REQUEST_ID_HEADER = 'x-request-id';

/** Who is calling which instance; built once per MCP session or HTTP request. */
export interface RequestContext {
  apiKey: string;
  baseUrl: string;
  requestId: string;
  userAgent: string | null;
}

export class MissingApiKeyError extends ValidationError {
  constructor() {
    super('No OpenProject API key: set OPENPROJECT_API_KEY or send the x-openproject-key header.');
    this.name = 'MissingApiKeyError';
  }
}

export function ensureRequestId(value?: string | null): string {
  const trimmed = value?.trim();
  return trimmed ? trimmed : randomUUID();
}

export function seedFromConfig(config: AppConfig): RequestContext {
  if (!config.apiKey) {
    throw new MissingApiKeyError();
  }
  return {
    apiKey: config.apiKey,
    baseUrl: config.baseUrl,
    requestId: ensureRequestId(),
    userAgent: null,
  };
}

function firstHeader(headers: IncomingHttpHeaders, name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/** The header key wins over the configured one. */
export function seedFromHeaders(headers: IncomingHttpHeaders, config: AppConfig): RequestContext {
  const apiKey = firstHeader(headers, API_KEY_HEADER)?.trim() || config.apiKey;
  if (!apiKey) {
    throw new MissingApiKeyError();
  }
  return {
    apiKey,
    baseUrl: config.baseUrl,
    requestId: ensureRequestId(firstHeader(headers, REQUEST_ID_HEADER)),
    userAgent: firstHeader(headers, 'user-agent') ?? null,
  };
}
