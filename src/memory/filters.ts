/**
 * Filter matching shared by the episodic and semantic stores.
 *
 * Semantics:
 * - `tags` with a list value: every listed tag must be present (all-of).
 * - `tags` with a scalar value: the tag must be present.
 * - any other key: strict equality against the record's field.
 * - keys whose filter value is null/undefined are skipped.
 */

import type { EventPredicate, MemoryEvent, MemoryFilters } from './types.js';

export type FieldReader = (key: string) => unknown;

export function matchesTags(tags: readonly string[], wanted: string | string[]): boolean {
  if (Array.isArray(wanted)) {
    return wanted.every(tag => tags.includes(tag));
  }
  return tags.includes(wanted);
}

export function matchesFilters(
  read: FieldReader,
  tags: readonly string[],
  filters: MemoryFilters | null | undefined
): boolean {
  if (!filters) return true;

  for (const [key, expected] of Object.entries(filters)) {
    if (expected === null || expected === undefined) continue;

    if (key === 'tags') {
      if (typeof expected === 'number' || typeof expected === 'boolean') {
        if (!tags.includes(String(expected))) return false;
        continue;
      }
      if (!matchesTags(tags, expected)) return false;
      continue;
    }

    const actual = read(key);
    if (Array.isArray(expected)) {
      if (!Array.isArray(actual)) return false;
      if (expected.length !== actual.length || expected.some((v, i) => v !== actual[i])) return false;
      continue;
    }
    if (actual !== expected) return false;
  }

  return true;
}

/**
 * Read a field from an event, falling back to the caller's extension bag.
 */
export function readEventField(event: MemoryEvent, key: string): unknown {
  switch (key) {
    case 'id': return event.id;
    case 'taskId': return event.taskId;
    case 'session': return event.session;
    case 'type': return event.type;
    case 'text': return event.text;
    case 'timestamp': return event.timestamp;
    case 'expiresAt': return event.expiresAt;
    case 'provenance': return event.provenance;
    default: return event.extra[key];
  }
}

export function eventMatches(event: MemoryEvent, filters: MemoryFilters | null | undefined): boolean {
  return matchesFilters(key => readEventField(event, key), event.tags, filters);
}

/**
 * Turn a filter mapping into an episodic predicate.
 */
export function buildEventPredicate(filters: MemoryFilters | null | undefined): EventPredicate {
  if (!filters || Object.keys(filters).length === 0) {
    return () => true;
  }
  return event => eventMatches(event, filters);
}
