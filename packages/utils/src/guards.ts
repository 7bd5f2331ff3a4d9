/**
 * Type Guards
 */

export function isString(value: unknown): value is string {
  return typeof value === 'string';
}

export function isNumber(value: unknown): value is number {
  return typeof value === 'number' && !Number.isNaN(value);
}

export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Node system errors carry a string `code` (ENOENT, EACCES, ...)
 */
export function hasErrorCode(error: unknown, ...codes: string[]): boolean {
  return isObject(error) && isString(error['code']) && codes.includes(error['code']);
}
