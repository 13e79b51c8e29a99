/**
 * Types shared by the walker, the search service and its consumers (no fs operations)
 */

/**
 * An item in the traversal frontier
 */
export interface DirectoryQueueItem {
  path: string;
  depth: number;
}

export type SearchErrorCode =
  | 'NOT_FOUND'
  | 'PERMISSION_DENIED'
  | 'NOT_A_DIRECTORY'
  | 'FILE_SYSTEM_ERROR'
  | 'INTERNAL_ERROR';

/** Which step failed: listing a directory, querying an entry, or the walk itself */
export type FailureOperation = 'list' | 'stat' | 'walk';

export interface MatchMessage {
  type: 'match';
  path: string;
}

export interface FailureMessage {
  type: 'failure';
  path: string;
  operation: FailureOperation;
  code: SearchErrorCode;
  message: string;
}

export type SearchMessage = MatchMessage | FailureMessage;

/**
 * Counters reported once the walk stops
 */
export interface WalkSummary {
  directoriesListed: number;
  matches: number;
  failures: number;
  cancelled: boolean;
}
