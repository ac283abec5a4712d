import { AmbiguousResolutionError, NotFoundResolutionError } from './errors.js';
import { ProjectRef, ReferenceItem, UserRef } from './models.js';

// ============================================
// NORMALIZATION & ORDERING
// ============================================

/** Trim, collapse inner whitespace, lower-case. */
export function normalizeName(value: string | null | undefined): string {
  return (value ?? '').trim().split(/\s+/).join(' ').toLowerCase();
}

// Plain code-unit order so results do not depend on the host locale
function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function byNormalizedNameThenId(a: ReferenceItem, b: ReferenceItem): number {
  return compareStrings(normalizeName(a.name), normalizeName(b.name)) || a.id - b.id;
}

export function sortedNames(items: readonly ReferenceItem[]): string[] {
  return items
    .map((item) => item.name)
    .sort((a, b) => compareStrings(normalizeName(a), normalizeName(b)));
}

// ============================================
// GENERIC RESOLUTION
// ============================================

/**
 * Exact (first match wins), then substring. One substring match resolves;
 * none or several fail with the names the caller can pick from.
 */
export function resolveFromItems(query: string, items: readonly ReferenceItem[]): number {
  const q = normalizeName(query);

  const exact = items.find((item) => normalizeName(item.name) === q);
  if (exact) return exact.id;

  const matches = items.filter((item) => normalizeName(item.name).includes(q));
  if (matches.length === 1) return matches[0].id;

  if (matches.length > 1) {
    const sorted = [...matches].sort(byNormalizedNameThenId);
    const labels = sorted.map((item) => `${item.name} (ID: ${item.id})`);
    throw new AmbiguousResolutionError(
      `Ambiguous match for '${query}'. Found multiple candidates: ${labels.join(', ')}. Please be more specific.`,
      query,
      sorted.map((item) => item.name)
    );
  }

  const available = sortedNames(items);
  throw new NotFoundResolutionError(
    `Could not find '${query}'. Available options: ${available.join(', ')}`,
    query,
    available
  );
}

// ============================================
// PROJECTS
// ============================================

/** Identifier exact, then name exact, then name substring. */
export function resolveProjectFromItems(query: string, items: readonly ProjectRef[]): number {
  const q = normalizeName(query);

  const byIdentifier = items.find((project) => normalizeName(project.identifier) === q);
  if (byIdentifier) return byIdentifier.id;

  const byName = items.find((project) => normalizeName(project.name) === q);
  if (byName) return byName.id;

  const matches = items.filter((project) => normalizeName(project.name).includes(q));
  if (matches.length === 1) return matches[0].id;

  if (matches.length > 1) {
    const sorted = [...matches].sort(byNormalizedNameThenId);
    const labels = sorted.map((p) => `${p.name} (ID: ${p.id}, identifier: ${p.identifier})`);
    throw new AmbiguousResolutionError(
      `Project '${query}' is ambiguous. Found: ${labels.join(', ')}.`,
      query,
      sorted.map((p) => p.name)
    );
  }

  const available = sortedNames(items);
  throw new NotFoundResolutionError(
    `Project '${query}' not found after limited search. Available (searched): ${available.join(', ')}`,
    query,
    available
  );
}

// ============================================
// USERS
// ============================================

/** Exact on display name only; the substring pass also looks at login and mail. */
export function resolveUserFromItems(query: string, items: readonly UserRef[]): number {
  const q = normalizeName(query);

  const exact = items.find((user) => normalizeName(user.name) === q);
  if (exact) return exact.id;

  const matches = items.filter((user) =>
    [user.name, user.login, user.mail ?? user.email]
      .map(normalizeName)
      .some((field) => field.length > 0 && field.includes(q))
  );
  if (matches.length === 1) return matches[0].id;

  if (matches.length > 1) {
    const sorted = [...matches].sort(byNormalizedNameThenId);
    const labels = sorted.map((u) => `${u.name} (ID: ${u.id}, login: ${u.login ?? 'n/a'})`);
    throw new AmbiguousResolutionError(
      `User '${query}' is ambiguous. Found: ${labels.join(', ')}.`,
      query,
      sorted.map((u) => u.name)
    );
  }

  const available = sortedNames(items);
  throw new NotFoundResolutionError(
    `User '${query}' not found after limited search. Available (searched): ${available.join(', ')}`,
    query,
    available
  );
}
