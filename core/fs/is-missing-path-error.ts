/**
 * Check whether a file system error means the path does not exist.
 *
 * @param error - Caught value.
 * @returns True for ENOENT and ENOTDIR.
 */
export function isMissingPathError(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  )
}
