import semver from 'semver'

import type { TagVersion } from './parse-tag-version'
import type { TagInfo } from '../../types/tag-info'

import { parseTagVersion } from './parse-tag-version'

/** Tag chosen as the latest release. */
export interface LatestTag extends TagVersion {
  /** Commit SHA. */
  sha: string

  /** Tag name. */
  tag: string
}

/**
 * Pick the highest semver tag.
 *
 * Final releases rank above pre-releases of the same version; among tags of
 * equal version the more specific one wins (`v4.0.0` over `v4`).
 *
 * @param tags - Tags from the GitHub API.
 * @param options - Selection options.
 * @param options.stableOnly - Ignore pre-releases.
 * @returns Latest tag, or null when no tag is semver-like.
 */
export function selectLatestTag(
  tags: TagInfo[],
  options: { stableOnly?: boolean } = {},
): LatestTag | null {
  let candidates: LatestTag[] = []

  for (let { sha, tag } of tags) {
    let parsed = parseTagVersion(tag)
    if (!sha || !parsed || (options.stableOnly && parsed.prerelease)) {
      continue
    }
    candidates.push({ ...parsed, sha: sha.toLowerCase(), tag })
  }

  candidates.sort(
    (a, b) =>
      semver.rcompare(a.version, b.version) || b.specificity - a.specificity,
  )

  return candidates[0] ?? null
}
