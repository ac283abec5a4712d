import { z } from 'zod';
import dotenv from 'dotenv';

export const VERSION = '0.4.0';

const booleanFlag = (name: string, fallback: 'true' | 'false') =>
  z
    .string()
    .optional()
    .default(fallback)
    .transform((val) => val.trim().toLowerCase())
    .refine((val) => ['true', 'false', '1', '0'].includes(val), `${name} must be true or false`)
    .transform((val) => val === 'true' || val === '1');

const integerVar = (name: string, fallback: string, min: number, max: number) =>
  z
    .string()
    .optional()
    .default(fallback)
    .transform((val) => Number(val.trim()))
    .refine(
      (val) => Number.isInteger(val) && val >= min && val <= max,
      max === Number.MAX_SAFE_INTEGER
        ? `${name} must be an integer >= ${min}`
        : `${name} must be between ${min} and ${max}`
    );

// Zod schema for environment variables
const EnvSchema = z
  .object({
    OPENPROJECT_BASE_URL: z
      .string({ required_error: 'OPENPROJECT_BASE_URL is required' })
      .trim()
      .url('OPENPROJECT_BASE_URL must be a valid URL')
      .transform((url) => url.replace(/\/+$/, ''))
      .describe('OpenProject instance URL, e.g. https://openproject.example.com'),

    OPENPROJECT_API_KEY: z
      .string()
      .trim()
      .optional()
      .transform((val) => (val ? val : null))
      .describe('API key (My account > Access tokens)'),

    OPENPROJECT_REQUEST_TIMEOUT_MS: integerVar('OPENPROJECT_REQUEST_TIMEOUT_MS', '10000', 1, 120000),
    OPENPROJECT_MAX_RETRIES: integerVar('OPENPROJECT_MAX_RETRIES', '2', 0, 10),
    OPENPROJECT_RETRY_BACKOFF_MS: integerVar('OPENPROJECT_RETRY_BACKOFF_MS', '300', 0, Number.MAX_SAFE_INTEGER),
    OPENPROJECT_RETRY_ON_429: booleanFlag('OPENPROJECT_RETRY_ON_429', 'false'),
    OPENPROJECT_MAX_CONCURRENT_REQUESTS: integerVar('OPENPROJECT_MAX_CONCURRENT_REQUESTS', '5', 1, 20),
    OPENPROJECT_CACHE_TTL_SECONDS: integerVar('OPENPROJECT_CACHE_TTL_SECONDS', '600', 0, Number.MAX_SAFE_INTEGER),

    OPENPROJECT_TRANSPORT: z
      .enum(['stdio', 'http'], {
        errorMap: () => ({ message: 'OPENPROJECT_TRANSPORT must be stdio or http' }),
      })
      .optional()
      .default('stdio'),
    OPENPROJECT_HTTP_HOST: z.string().trim().min(1).optional().default('127.0.0.1'),
    OPENPROJECT_HTTP_PORT: integerVar('OPENPROJECT_HTTP_PORT', '8000', 1, 65535),
  })
  .superRefine((env, ctx) => {
    // over HTTP each request may bring its own key
    if (env.OPENPROJECT_TRANSPORT === 'stdio' && !env.OPENPROJECT_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['OPENPROJECT_API_KEY'],
        message: 'OPENPROJECT_API_KEY is required for the stdio transport',
      });
    }
  });

export type TransportKind = 'stdio' | 'http';

export interface AppConfig {
  baseUrl: string;
  apiKey: string | null;
  requestTimeoutMs: number;
  maxRetries: number;
  retryBackoffMs: number;
  retryOn429: boolean;
  maxConcurrentRequests: number;
  cacheTtlSeconds: number;
  transport: TransportKind;
  httpHost: string;
  httpPort: number;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid environment configuration:\n${issues.join('\n')}`);
    this.name = 'ConfigError';
  }
}

/** Validate `env` (no side effects). Throws ConfigError listing every issue. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    throw new ConfigError(
      result.error.errors.map((err) => `  - ${err.path.join('.') || 'env'}: ${err.message}`)
    );
  }

  const data = result.data;
  return {
    baseUrl: data.OPENPROJECT_BASE_URL,
    apiKey: data.OPENPROJECT_API_KEY,
    requestTimeoutMs: data.OPENPROJECT_REQUEST_TIMEOUT_MS,
    maxRetries: data.OPENPROJECT_MAX_RETRIES,
    retryBackoffMs: data.OPENPROJECT_RETRY_BACKOFF_MS,
    retryOn429: data.OPENPROJECT_RETRY_ON_429,
    maxConcurrentRequests: data.OPENPROJECT_MAX_CONCURRENT_REQUESTS,
    cacheTtlSeconds: data.OPENPROJECT_CACHE_TTL_SECONDS,
    transport: data.OPENPROJECT_TRANSPORT,
    httpHost: data.OPENPROJECT_HTTP_HOST,
    httpPort: data.OPENPROJECT_HTTP_PORT,
  };
}

/** Load `.env` into process.env without printing anything (stdout is JSON-RPC). */
export function loadEnvFile(): void {
  process.env.DOTENV_CONFIG_QUIET = 'true';
  dotenv.config();
}

export const REDACTED = '***REDACTED***';

// Replace every occurrence of each secret
export function redactSecrets(text: string, secrets: Iterable<string>): string {
  if (!text) return text;

  let redacted = text;
  for (const secret of secrets) {
    if (secret) {
      redacted = redacted.split(secret).join(REDACTED);
    }
  }
  return redacted;
}
