/**
 * Type Guards
 */

/**
 * Narrow an unknown thrown value to a Node.js system error
 */
export function isErrnoException(value: unknown): value is NodeJS.ErrnoException {
  return value instanceof Error && 'code' in value;
}

/**
 * Extract a printable message from anything that was thrown
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
