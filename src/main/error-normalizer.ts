import type { FailureMessage, FailureOperation, SearchErrorCode } from '../file-ops/scan-types';
import { getErrorCode, getErrorMessage } from '../utils/error-utils';

export function toSearchErrorCode(error: unknown): SearchErrorCode {
  const code = getErrorCode(error);
  switch (code) {
    case undefined:
      return 'INTERNAL_ERROR';
    case 'ENOENT':
      return 'NOT_FOUND';
    case 'EACCES':
    case 'EPERM':
      return 'PERMISSION_DENIED';
    case 'ENOTDIR':
      return 'NOT_A_DIRECTORY';
    default:
      return 'FILE_SYSTEM_ERROR';
  }
}

export function toSearchFailure(path: string, operation: FailureOperation, error: unknown): FailureMessage {
  return {
    type: 'failure',
    path,
    operation,
    code: toSearchErrorCode(error),
    message: getErrorMessage(error),
  };
}
