import semver from 'semver'

/** Semver reading of a tag name. */
export interface TagVersion {
  /** Number of numeric components written in the tag (1 to 3). */
  specificity: number

  /** True for pre-release versions. */
  prerelease: boolean

  /** Normalized semver string, e.g. `4.0.0-rc.1`. */
  version: string
}

const TAG_PATTERN =
  /^v?(?<major>\d+)(?:\.(?<minor>\d+))?(?:\.(?<patch>\d+))?(?<prerelease>-[\da-z-]+(?:\.[\da-z-]+)*)?(?:\+[\da-z-]+(?:\.[\da-z-]+)*)?$/iu

/**
 * Read a tag such as `v1`, `v1.2`, `1.2.3` or `v2.0.0-rc.1` as semver.
 *
 * Missing minor and patch components count as zero.
 *
 * @param tag - Tag name.
 * @returns Parsed version, or null for tags that are not semver-like.
 */
export function parseTagVersion(
  tag: undefined | string | null,
): TagVersion | null {
  let groups = tag ? TAG_PATTERN.exec(tag.trim())?.groups : undefined
  if (!groups) {
    return null
  }

  let { prerelease = '', major, minor, patch } = groups
  let version = semver.valid(
    `${major}.${minor ?? 0}.${patch ?? 0}${prerelease}`,
  )
  if (!version) {
    return null
  }

  return {
    specificity: [major, minor, patch].filter(part => part !== undefined)
      .length,
    prerelease: prerelease !== '',
    version,
  }
}
