import { randomBytes } from 'node:crypto'

/**
 * Generate a unique branch name such as
 * `actions-pinner/20260102-150405-1a2b3c4d`.
 *
 * @param prefix - Branch prefix.
 * @param now - Timestamp, UTC.
 * @returns Branch name.
 */
export function generateBranchName(
  prefix: string,
  now: Date = new Date(),
): string {
  let pad = (value: number): string => String(value).padStart(2, '0')
  let date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`
  let time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`
  return `${prefix}/${date}-${time}-${randomBytes(4).toString('hex')}`
}
