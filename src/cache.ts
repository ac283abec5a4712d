import { LRUCache } from 'lru-cache';
import { z } from 'zod';
import { logger } from './logging/index.js';
import { OpenProjectModelValidationError } from './errors.js';
import { HalPayload, embeddedElements } from './hal.js';
import {
  PriorityRef,
  PriorityRefSchema,
  ReferenceItem,
  StatusRef,
  StatusRefSchema,
  TypeRef,
  TypeRefSchema,
} from './models.js';

export const DEFAULT_CACHE_TTL_MS = 600_000;

// ============================================
// TTL CACHE OF REFERENCE LISTS
// ============================================

/** Anything that can GET a HAL collection; OpenProjectClient in practice. */
export interface CollectionSource {
  readonly baseUrl: string;
  get(url: string, options?: { tool?: string; signal?: AbortSignal }): Promise<HalPayload>;
}

export interface CacheOptions {
  ttlMs?: number;
  /** Clock in ms; injectable for tests. */
  now?: () => number;
  maxEntries?: number;
}

interface CacheEntry<T> {
  items: readonly T[];
  timestamp: number;
}

export class ReferenceListCache<T extends ReferenceItem> {
  private entries: LRUCache<string, CacheEntry<T>>;
  private ttlMs: number;
  private now: () => number;
  private hits = 0;
  private misses = 0;

  constructor(
    readonly kind: string,
    private schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: CacheOptions = {}
  ) {
    this.ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.now = options.now ?? Date.now;
    // expiry is checked on access against our own clock, not lru-cache's ttl
    this.entries = new LRUCache<string, CacheEntry<T>>({ max: options.maxEntries ?? 100 });
  }

  /**
   * Items of `endpoint` on the source's instance, served from memory while the
   * entry is younger than the TTL. A miss refetches and replaces the entry.
   */
  async fetch(
    source: CollectionSource,
    endpoint: string,
    options: { tool?: string; signal?: AbortSignal } = {}
  ): Promise<readonly T[]> {
    const key = `${source.baseUrl}:${endpoint}`;
    const entry = this.entries.get(key);

    if (entry && this.now() - entry.timestamp < this.ttlMs) {
      this.hits++;
      logger.debug('Cache hit', { kind: this.kind, key }, 'cache');
      return entry.items;
    }

    this.misses++;
    const payload = await source.get(endpoint, { tool: options.tool ?? `cache:${this.kind}`, signal: options.signal });
    const items = parseReferenceItems(payload, this.schema, this.kind, endpoint);

    this.entries.set(key, { items, timestamp: this.now() });
    logger.debug('Cached reference list', { kind: this.kind, key, count: items.length }, 'cache');
    return items;
  }

  clear(): void {
    this.entries.clear();
  }

  stats(): { entries: number; hits: number; misses: number } {
    return { entries: this.entries.size, hits: this.hits, misses: this.misses };
  }
}

/** Validate every `_embedded.elements` entry of a collection against `schema`. */
export function parseReferenceItems<T>(
  payload: HalPayload,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  kind: string,
  endpoint: string
): T[] {
  return embeddedElements(payload).map((element, index) => {
    const result = schema.safeParse(element);
    if (!result.success) {
      throw new OpenProjectModelValidationError(`Invalid ${kind} item in ${endpoint}`, {
        index,
        issues: result.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    return result.data;
  });
}

// ============================================
// METADATA CACHE
// ============================================

/** Work package types, statuses and priorities per instance. */
export class MetadataCache {
  readonly types: ReferenceListCache<TypeRef>;
  readonly statuses: ReferenceListCache<StatusRef>;
  readonly priorities: ReferenceListCache<PriorityRef>;
  readonly ttlMs: number;

  constructor(options: CacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.types = new ReferenceListCache('types', TypeRefSchema, options);
    this.statuses = new ReferenceListCache('statuses', StatusRefSchema, options);
    this.priorities = new ReferenceListCache('priorities', PriorityRefSchema, options);
  }

  clear(): void {
    this.types.clear();
    this.statuses.clear();
    this.priorities.clear();
    logger.info('Metadata cache cleared', undefined, 'cache');
  }

  getStats(): Record<string, unknown> {
    return {
      ttl_seconds: Math.round(this.ttlMs / 1000),
      types: this.types.stats(),
      statuses: this.statuses.stats(),
      priorities: this.priorities.stats(),
    };
  }
}
