/**
 * File filtering predicates (no fs operations)
 */
import { FILE_SYSTEM, SEARCH_DEFAULTS } from '../constants';

import { basename, extensionOf } from './path';

/**
 * Naive name match: `*` alone matches everything, otherwise every `*` is
 * stripped and the remainder must occur somewhere in the name (case-sensitive).
 *
 * This is not glob matching. `abc*` matches `xabc` as well as `abcx`; there is
 * no anchoring, no `?` and no character classes.
 */
export function matchName(fileName: string, pattern: string): boolean {
  if (pattern === SEARCH_DEFAULTS.MATCH_ALL_PATTERN) return true;
  const literal = pattern.split(FILE_SYSTEM.WILDCARD).join('');
  return fileName.includes(literal);
}

/**
 * Normalize an allowed extension entry: `.TXT` and `txt` compare equal
 */
export function normalizeExtension(ext: string): string {
  const trimmed = ext.trim();
  return (trimmed.startsWith('.') ? trimmed.slice(1) : trimmed).toLowerCase();
}

/**
 * @param allowed Allowed extensions; undefined means no restriction
 * @returns false for a file without an extension whenever a restriction is set
 */
export function matchExtension(path: string, allowed?: readonly string[]): boolean {
  if (!allowed) return true;
  const ext = extensionOf(path);
  if (ext === null) return false;
  const needle = ext.toLowerCase();
  return allowed.some((entry) => normalizeExtension(entry) === needle);
}

export function fileMatches(path: string, pattern: string, allowed?: readonly string[]): boolean {
  return matchName(basename(path), pattern) && matchExtension(path, allowed);
}

export function isHiddenName(name: string): boolean {
  return name.startsWith(FILE_SYSTEM.HIDDEN_MARKER);
}
