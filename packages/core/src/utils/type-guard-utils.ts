/**
 * Type guard utilities shared across packages
 */

/**
 * Type guard for checking if a value is an Error instance with a message
 */
export function isErrorWithMessage(error: unknown): error is Error & { message: string } {
  return error instanceof Error && typeof error.message === 'string';
}

/**
 * Extract error message from unknown error value
 */
export function getErrorMessage(error: unknown, defaultMessage?: string): string {
  if (isErrorWithMessage(error)) {
    return error.message;
  }
  return defaultMessage || String(error);
}

/**
 * Type guard for checking if an object exposes a callable member.
 * Used for capability queries on objects whose concrete class is not known.
 */
export function hasMethod<T extends string>(obj: unknown, name: T): obj is Record<T, (...args: never[]) => unknown> {
  return typeof obj === 'object' && obj !== null && name in obj && typeof Reflect.get(obj, name) === 'function';
}
