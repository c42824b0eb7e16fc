import semver from 'semver'

import type { ActionReference } from '../../types/action-reference'
import type { VersionChecker } from '../../types/version-checker'
import type { RequestOptions } from '../../types/request-options'
import type { GitHubClient } from '../../types/github-client'
import type { TagInfo } from '../../types/tag-info'

import { parseAnnotation } from '../parsing/parse-annotation'
import { ResolutionError } from '../errors/resolution-error'
import { parseTagVersion } from '../versions/parse-tag-version'
import { selectLatestTag } from '../versions/select-latest-tag'
import { DEFAULT_MAX_TAG_PAGES } from '../constants'
import { isSha } from '../versions/is-sha'

/** Options for `createVersionChecker`. */
export interface VersionCheckerOptions {
  /** Ignore pre-release tags. */
  stableOnly?: boolean

  /** Upper bound on tag pages of 100 read per repository. */
  maxTagPages?: number

  /** GitHub API client. */
  client: GitHubClient
}

/**
 * Create a version checker backed by the GitHub tags API.
 *
 * Remote failures are rethrown as `ResolutionError` with the original error as
 * `cause`. Nothing is retried.
 *
 * @param options - Client and selection options.
 * @returns Version checker.
 */
export function createVersionChecker(
  options: VersionCheckerOptions,
): VersionChecker {
  let { maxTagPages = DEFAULT_MAX_TAG_PAGES, stableOnly = false, client } =
    options

  async function getCommitHash(
    reference: ActionReference,
    version: string,
    requestOptions: RequestOptions = {},
  ): Promise<string> {
    if (isSha(version)) {
      return version.toLowerCase()
    }

    try {
      return await client.resolveCommitSha(
        reference.owner,
        reference.repo,
        version,
        requestOptions,
      )
    } catch (error) {
      throw new ResolutionError(
        reference,
        `cannot resolve ${version}`,
        error,
      )
    }
  }

  async function getLatestVersion(
    reference: ActionReference,
    requestOptions: RequestOptions = {},
  ): Promise<{ version: string; hash: string }> {
    let tags: TagInfo[]
    try {
      tags = await client.getAllTags(reference.owner, reference.repo, {
        ...requestOptions,
        maxPages: maxTagPages,
      })
    } catch (error) {
      throw new ResolutionError(reference, 'cannot list tags', error)
    }

    let latest = selectLatestTag(tags, { stableOnly })
    if (!latest) {
      throw new ResolutionError(
        reference,
        `no semver tags in ${reference.owner}/${reference.repo}`,
      )
    }

    return { version: latest.tag, hash: latest.sha }
  }

  return {
    isUpdateAvailable: async (reference, requestOptions = {}) => {
      let [currentHash, latest] = await Promise.all([
        getCommitHash(reference, reference.version, requestOptions),
        getLatestVersion(reference, requestOptions),
      ])

      let current = parseTagVersion(getDisplayVersion(reference))
      let latestParsed = parseTagVersion(latest.version)
      let isDowngrade =
        current !== null &&
        latestParsed !== null &&
        semver.lt(latestParsed.version, current.version)

      return {
        available: currentHash !== latest.hash && !isDowngrade,
        latestVersion: latest.version,
        latestHash: latest.hash,
        currentHash,
      }
    },
    getLatestVersion,
    getCommitHash,
  }
}

/**
 * Version label a reference is known by: the ref itself, or the version in the
 * trailing comment when the ref is a commit hash.
 *
 * @param reference - Scanned reference.
 * @returns Display label, or null for a bare commit hash.
 */
export function getDisplayVersion(reference: ActionReference): string | null {
  if (!isSha(reference.version)) {
    return reference.version
  }
  return parseAnnotation(reference.comment).version
}
