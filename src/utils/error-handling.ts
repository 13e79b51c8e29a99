export interface ErrorContext {
  operation: string;
  details?: Record<string, unknown>;
  timestamp: number;
}

export class ApplicationError extends Error {
  public readonly code: string;
  public readonly context: ErrorContext;

  constructor(message: string, code: string, context: ErrorContext) {
    super(message);
    this.name = 'ApplicationError';
    this.code = code;
    this.context = context;
  }
}

export const ERROR_CODES = {
  INVALID_SEARCH_CONFIG: 'INVALID_SEARCH_CONFIG',
} as const;

/**
 * Raised before a search starts when the filter input does not validate.
 */
export class SearchConfigError extends ApplicationError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(
      `Invalid search configuration: ${issues.join('; ')}`,
      ERROR_CODES.INVALID_SEARCH_CONFIG,
      { operation: 'createSearchFilter', details: { issues }, timestamp: Date.now() }
    );
    this.name = 'SearchConfigError';
    this.issues = issues;
  }
}
