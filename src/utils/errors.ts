/**
 * Standardized error utilities
 *
 * Failures are reported as DOMExceptions with a fixed set of names:
 * - DataError: malformed data (e.g. an unparsable config file)
 * - NotFoundError: a payload file does not exist
 * - NotReadableError: a payload file could not be read or written
 *
 * Invalid argument types are thrown as plain TypeError.
 *
 * Errors raised by Node's fs may come from another realm (e.g. under a
 * test runner's sandbox), so they are inspected structurally rather than
 * with `instanceof Error`.
 */

/**
 * Error names used across the library
 */
export type NaluErrorName =
  | 'DataError'
  | 'NotFoundError'
  | 'NotReadableError';

/**
 * Create a DataError (e.g., config file is not valid JSON)
 */
export function dataError(message: string): DOMException {
  return new DOMException(message, 'DataError');
}

/**
 * Create a NotFoundError (e.g., input file missing)
 */
export function notFoundError(message: string): DOMException {
  return new DOMException(message, 'NotFoundError');
}

/**
 * Create a NotReadableError (e.g., permission denied)
 */
export function notReadableError(message: string): DOMException {
  return new DOMException(message, 'NotReadableError');
}

/**
 * Read the `message` of any error-like value, or stringify it
 */
export function getErrorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/**
 * Read the `code` of a Node.js system error (ENOENT, EACCES, ...)
 */
export function getErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Wrap an error as a DOMException if it isn't already
 *
 * @param error - The error to wrap
 * @param defaultName - The error name to use if error is not a DOMException
 */
export function wrapAsNaluError(
  error: unknown,
  defaultName: NaluErrorName = 'DataError'
): DOMException {
  if (error instanceof DOMException) {
    return error;
  }
  return new DOMException(getErrorMessage(error), defaultName);
}

/**
 * Check if an error is a specific library error type
 */
export function isNaluError(error: unknown, name: NaluErrorName): boolean {
  return error instanceof DOMException && error.name === name;
}
