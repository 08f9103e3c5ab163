/**
 * Type Guards
 */

export function isString(value: unknown): value is string {
  return typeof value === 'string';
}

export function isNonEmptyString(value: unknown): value is string {
  return isString(value) && value.trim().length > 0;
}

export function isDefined<T>(value: T | undefined | null): value is T {
  return value !== undefined && value !== null;
}

/**
 * Narrow an unknown thrown value to a Node errno error
 */
export function isErrnoException(value: unknown): value is NodeJS.ErrnoException {
  return value instanceof Error && 'code' in value;
}

/**
 * Render any thrown value as a message suitable for logs
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return isString(error) ? error : 'Unknown error';
}
