/**
 * Centralized constants for dirhound
 */

// ==================== SEARCH DEFAULTS ====================

export const SEARCH_DEFAULTS = {
  /** Root directory searched when none is given */
  ROOT: '.',
  /** Pattern that matches every file name */
  MATCH_ALL_PATTERN: '*',
  /** Messages buffered between the walker and the consumer before the walker waits */
  CHANNEL_CAPACITY: 100,
} as const;

// ==================== FILE SYSTEM ====================

export const FILE_SYSTEM = {
  /** The only ignore-rule file consulted, read from the search root */
  IGNORE_FILE_NAME: '.gitignore',
  /** Leading character that marks an entry as hidden on every platform */
  HIDDEN_MARKER: '.',
  /** Character stripped from name patterns before substring matching */
  WILDCARD: '*',
} as const;

// ==================== ENVIRONMENT ====================

export const ENV_VARS = {
  /** Any value other than 0/false/off/no enables debug logging */
  DEBUG: 'DIRHOUND_DEBUG',
} as const;
