/**
 * Shared error utilities.
 */

/**
 * Extract a message string from an unknown error.
 * Handles Error instances, strings, and other types.
 *
 * @param error - The error to extract a message from
 * @returns The error message as a string
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Narrow an unknown error to a Node.js system error carrying a `code`.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
