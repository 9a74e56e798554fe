/**
 * Error Helper Utilities
 *
 * Standardized handling of unknown error values caught in jobs and clients.
 */

/**
 * Extract error message from unknown error type
 * Handles Error objects, strings, and other types safely
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  if (typeof error === 'object' && error !== null && 'message' in error) {
    const { message } = error;
    if (typeof message === 'string') {
      return message;
    }
  }

  return String(error);
}

/**
 * Extract error stack trace if available
 */
export function extractErrorStack(error: unknown): string | undefined {
  if (error instanceof Error && error.stack) {
    return error.stack;
  }

  return undefined;
}
