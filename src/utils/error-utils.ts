/**
 * Utility functions shared across the walker, the CLI and tests.
 */

/**
 * Get a safe, human-readable error message from an unknown error.
 * Standardize on this helper instead of ad-hoc `(error as Error)?.message`.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

/**
 * Read the errno-style `code` of a Node error, if it has one.
 */
export function getErrorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  const { code } = error;
  return typeof code === 'string' ? code : undefined;
}

/**
 * Exhaustiveness guard for discriminated unions.
 * Use at the end of a switch to ensure all variants are handled.
 */
export function assertNever(x: never, message = 'Unexpected value'): never {
  throw new Error(`${message}: ${String(x)}`);
}
