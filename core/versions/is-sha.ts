/**
 * Check if a string is a full 40-character commit hash.
 *
 * @param value - String to check.
 * @returns True for 40 hexadecimal characters in any letter case.
 */
export function isSha(value: undefined | string | null): value is string {
  return typeof value === 'string' && /^[\da-f]{40}$/iu.test(value)
}
