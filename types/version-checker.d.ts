import type { ActionReference } from './action-reference'
import type { RequestOptions } from './request-options'

/** Latest published version of an action. */
export interface LatestVersion {
  /** Tag name. */
  version: string

  /** Commit the tag points to. */
  hash: string
}

/** Outcome of an update-availability check. */
export interface UpdateAvailability {
  /** Commit the pinned reference currently resolves to. */
  currentHash: string

  /** Latest tag name. */
  latestVersion: string

  /** True when the latest commit differs and is not a downgrade. */
  available: boolean

  /** Commit of the latest tag. */
  latestHash: string
}

/** Resolves published versions of actions. Performs no retries. */
export interface VersionChecker {
  /** Resolve any version string (tag, branch, commit) to a commit hash. */
  getCommitHash(
    reference: ActionReference,
    version: string,
    options?: RequestOptions,
  ): Promise<string>

  /** Compare the pinned commit against the latest tag's commit. */
  isUpdateAvailable(
    reference: ActionReference,
    options?: RequestOptions,
  ): Promise<UpdateAvailability>

  /** Highest semver tag and its commit. */
  getLatestVersion(
    reference: ActionReference,
    options?: RequestOptions,
  ): Promise<LatestVersion>
}
