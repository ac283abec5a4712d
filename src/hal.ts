import { OpenProjectParseError } from './errors.js';

// HAL+JSON payloads: { _links: { rel: { href, title } }, _embedded: { rel: value }, ...fields }
export type HalPayload = Record<string, unknown>;

// { href, title, ... }; fields are read through getLinkHref/getLinkTitle
export type HalLink = Record<string, unknown>;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================
// LINKS & EMBEDDED
// ============================================

export function getLink(payload: HalPayload | null | undefined, rel: string): HalLink | null {
  if (!payload || !isRecord(payload._links)) return null;
  const link = payload._links[rel];
  return isRecord(link) ? link : null;
}

export function getLinkHref(payload: HalPayload | null | undefined, rel: string): string | null {
  const href = getLink(payload, rel)?.href;
  return typeof href === 'string' ? href : null;
}

export function getLinkTitle(payload: HalPayload | null | undefined, rel: string): string | null {
  const title = getLink(payload, rel)?.title;
  return typeof title === 'string' ? title : null;
}

/** Array-valued link relations (e.g. `roles`, multi-value custom fields). */
export function getLinkList(payload: HalPayload | null | undefined, rel: string): HalLink[] {
  if (!payload || !isRecord(payload._links)) return [];
  const value = payload._links[rel];
  if (Array.isArray(value)) return value.filter(isRecord);
  return isRecord(value) ? [value] : [];
}

export function hasLink(payload: HalPayload | null | undefined, rel: string): boolean {
  return !!payload && isRecord(payload._links) && rel in payload._links;
}

export function getEmbedded(payload: HalPayload | null | undefined, rel: string): unknown {
  if (!payload || !isRecord(payload._embedded)) return null;
  return payload._embedded[rel] ?? null;
}

/** '/api/v3/work_packages/42' -> 42; null for anything not ending in digits. */
export function parseIdFromHref(href: string | null | undefined): number | null {
  if (!href) return null;
  const segments = href.split('/').filter((segment) => segment.length > 0);
  const last = segments[segments.length - 1];
  if (!last || !/^\d+$/.test(last)) return null;
  return Number.parseInt(last, 10);
}

/**
 * The API represents the same field as a root scalar, a titled link or an
 * embedded resource depending on endpoint. Root wins, then link title, then
 * the embedded value.
 */
export function resolveProperty(payload: HalPayload, name: string): unknown {
  if (name in payload) return payload[name];

  const title = getLinkTitle(payload, name);
  if (title) return title;

  return getEmbedded(payload, name);
}

// ============================================
// COLLECTIONS
// ============================================

/** Object elements of `_embedded.elements`; a non-list value is a malformed collection. */
export function embeddedElements(payload: HalPayload): HalPayload[] {
  const embedded = isRecord(payload._embedded) ? payload._embedded : {};
  const elements = embedded.elements ?? [];
  if (!Array.isArray(elements)) {
    throw new OpenProjectParseError('Malformed collection: expected _embedded.elements to be a list.', {
      received: typeof elements,
    });
  }
  return elements.filter(isRecord);
}

// ============================================
// TYPED READERS
// ============================================

export function readString(payload: HalPayload, key: string): string | null {
  const value = payload[key];
  return typeof value === 'string' ? value : null;
}

export function readInteger(payload: HalPayload, key: string): number | null {
  const value = payload[key];
  return typeof value === 'number' && Number.isInteger(value) ? value : null;
}

export function readBoolean(payload: HalPayload, key: string): boolean | null {
  const value = payload[key];
  return typeof value === 'boolean' ? value : null;
}

/** Formattable text (`{ raw, html }`) -> raw string, '' when absent. */
export function readFormattable(payload: HalPayload, key: string): string {
  const value = payload[key];
  if (isRecord(value) && typeof value.raw === 'string') return value.raw;
  return '';
}
