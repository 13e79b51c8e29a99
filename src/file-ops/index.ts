/**
 * File operations suite - path helpers, filter predicates and scan types
 */

// Path utilities
export {
  basename,
  extensionOf,
  getRelativePath,
  isInsideBase
} from './path';

// File filters
export {
  matchName,
  matchExtension,
  normalizeExtension,
  fileMatches,
  isHiddenName
} from './filters';

// Scan types
export type {
  DirectoryQueueItem,
  SearchErrorCode,
  FailureOperation,
  MatchMessage,
  FailureMessage,
  SearchMessage,
  WalkSummary
} from './scan-types';
