/**
 * Errors raised inside Node itself can belong to another realm (a Jest sandbox, a vm
 * context), where `instanceof Error` is false for them.
 */
export function isError(value: unknown): value is Error {
  return (
    value instanceof Error ||
    (typeof value === 'object' &&
      value !== null &&
      'name' in value &&
      typeof value.name === 'string' &&
      'message' in value &&
      typeof value.message === 'string')
  );
}

/**
 * True for a system error such as `ENOENT` from `fs`
 */
export function hasErrorCode(value: unknown, code: string): boolean {
  return typeof value === 'object' && value !== null && 'code' in value && value.code === code;
}

export function errorMessage(value: unknown): string {
  return isError(value) ? value.message : String(value);
}
