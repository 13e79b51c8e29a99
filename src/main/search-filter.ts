import type { ZodError } from 'zod';

import { ChannelCapacitySchema, SearchFilterSchema, type SearchFilterInput } from '../shared-schemas/search-filter';
import { SearchConfigError } from '../utils/error-handling';

/**
 * Filter for one search; frozen before the walk starts
 */
export interface SearchFilter {
  readonly root: string;
  readonly pattern: string;
  /** Absent means unbounded */
  readonly maxDepth?: number;
  /** Absent means any extension (or none) is accepted */
  readonly extensions?: readonly string[];
  readonly includeHidden: boolean;
  readonly includeIgnored: boolean;
}

const toConfigError = (error: ZodError, fallbackPath: string): SearchConfigError =>
  new SearchConfigError(error.issues.map((issue) => `${issue.path.join('.') || fallbackPath}: ${issue.message}`));

export function createSearchFilter(input: SearchFilterInput = {}): SearchFilter {
  const parsed = SearchFilterSchema.safeParse(input);
  if (!parsed.success) {
    throw toConfigError(parsed.error, 'filter');
  }

  const { root, pattern, maxDepth, extensions, includeHidden, includeIgnored } = parsed.data;
  return Object.freeze({
    root,
    pattern,
    maxDepth,
    extensions: extensions ? Object.freeze([...extensions]) : undefined,
    includeHidden,
    includeIgnored,
  });
}

/**
 * @returns the default capacity when none is given
 * @throws SearchConfigError unless the capacity is a positive integer
 */
export function resolveChannelCapacity(capacity?: number): number {
  const parsed = ChannelCapacitySchema.safeParse(capacity);
  if (!parsed.success) {
    throw toConfigError(parsed.error, 'channelCapacity');
  }
  return parsed.data;
}

export type { SearchFilterInput };
