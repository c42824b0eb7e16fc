import semver from 'semver'

import { parseTagVersion } from './parse-tag-version'

/** Size of a version change. */
export type UpdateLevel = 'unknown' | 'major' | 'minor' | 'patch' | 'none'

/**
 * Determine the update level between two version labels.
 *
 * @param currentVersion - Current display version.
 * @param latestVersion - New display version.
 * @returns Update level for the change.
 */
export function getUpdateLevel(
  currentVersion: undefined | string | null,
  latestVersion: undefined | string | null,
): UpdateLevel {
  let current = parseTagVersion(currentVersion)
  let latest = parseTagVersion(latestVersion)

  if (!current || !latest) {
    return 'unknown'
  }

  if (semver.eq(current.version, latest.version)) {
    return 'none'
  }

  switch (semver.diff(current.version, latest.version)) {
    case 'premajor':
    case 'major':
      return 'major'
    case 'preminor':
    case 'minor':
      return 'minor'
    case 'prepatch':
    case 'patch':
    case 'prerelease':
      return 'patch'
    default:
      return 'unknown'
  }
}
