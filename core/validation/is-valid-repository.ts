/**
 * Check whether the value is an `owner/name` repository reference.
 *
 * Both segments are non-empty and made of letters, digits, `_`, `.` and `-`.
 *
 * @param value - Raw repository reference.
 * @returns True for exactly two valid segments joined by a single slash.
 */
export function isValidRepository(value: undefined | string | null): boolean {
  return typeof value === 'string' && /^[\w.-]+\/[\w.-]+$/u.test(value)
}
