/**
 * Check whether the tag follows the calendar scheme `YYYY.MM[.patch]`.
 *
 * Examples of accepted values: `2023.11`, `2023.11.2`.
 *
 * @param value - Tag name.
 * @returns True when the whole value matches the scheme.
 */
export function isValidTag(value: undefined | string | null): boolean {
  return typeof value === 'string' && /^\d{4}\.\d{2}(?:\.\d+)?$/u.test(value)
}
