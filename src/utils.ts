import { ValidationError } from './errors.js';
import { HalPayload, readInteger } from './hal.js';
import { Page } from './models.js';

// ============================================
// CHARACTER TRUNCATION
// ============================================

const MAX_RESPONSE_LENGTH = 100000; // ~25k tokens (4 chars per token average)

export function truncateResponse(
  text: string,
  maxLength: number = MAX_RESPONSE_LENGTH
): string {
  if (text.length <= maxLength) {
    return text;
  }

  const truncatedChars = text.length - maxLength;

  return (
    text.slice(0, maxLength) +
    '\n\n' +
    '─────────────────────────────────────────\n' +
    `RESPONSE TRUNCATED\n` +
    `Original length: ${text.length} characters\n` +
    `Truncated: ${truncatedChars} characters\n\n` +
    `To reduce response size use a smaller page_size or a narrower filter\n` +
    `(project, subject_contains, name_contains).\n` +
    '─────────────────────────────────────────'
  );
}

// ============================================
// PAGINATION
// ============================================

export const MAX_PAGE_SIZE = 200;
export const DEFAULT_PAGE_SIZE = 50;

export function clampPageSize(pageSize: number | undefined, fallback: number = DEFAULT_PAGE_SIZE): number {
  if (pageSize === undefined || !Number.isFinite(pageSize)) return fallback;
  return Math.min(MAX_PAGE_SIZE, Math.max(1, Math.trunc(pageSize)));
}

export interface PageWindow {
  offset: number;
  pageSize: number;
  /** 1-based page number the API expects in its `offset` parameter */
  page: number;
}

/**
 * Item offset -> API page. The API pages by page number, so the offset has to
 * land on a page boundary.
 */
export function pageWindow(offset: number | undefined, pageSize: number | undefined, fallback?: number): PageWindow {
  const size = clampPageSize(pageSize, fallback);
  const start = offset ?? 0;

  if (!Number.isInteger(start) || start < 0) {
    throw new ValidationError('offset must be an integer >= 0', { offset: start });
  }
  if (start % size !== 0) {
    throw new ValidationError(`offset must be a multiple of page_size (${size})`, {
      offset: start,
      page_size: size,
    });
  }

  return { offset: start, pageSize: size, page: start / size + 1 };
}

/** Query parameters for a paged collection request. */
export function pageParams(window: PageWindow): Record<string, unknown> {
  return { offset: window.page, pageSize: window.pageSize };
}

export function nextOffset(window: PageWindow, total: number | null, received: number): number | null {
  const next = window.offset + window.pageSize;
  if (total === null) {
    return received < window.pageSize ? null : next;
  }
  return next < total ? next : null;
}

export function readTotal(payload: HalPayload): number | null {
  return readInteger(payload, 'total');
}

export function toPage<T>(items: T[], window: PageWindow, total: number | null): Page<T> {
  return {
    items,
    offset: window.offset,
    page_size: window.pageSize,
    total,
    next_offset: nextOffset(window, total, items.length),
  };
}

// ============================================
// FILTERS
// ============================================

export interface FilterClause {
  [field: string]: { operator: string; values: string[] };
}

export function filtersParam(clauses: FilterClause[]): string {
  return JSON.stringify(clauses);
}

export function projectFilter(projectId: number): string {
  return filtersParam([{ project: { operator: '=', values: [String(projectId)] } }]);
}

export function today(): string {
  const now = new Date();
  const month = String(now.getMonth() + 1).padStart(2, '0');
  const day = String(now.getDate()).padStart(2, '0');
  return `${now.getFullYear()}-${month}-${day}`;
}
