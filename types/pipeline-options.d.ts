import type { ChangeRequestPublisher } from './change-request-publisher'
import type { VersionChecker } from './version-checker'
import type { GitHubClient } from './github-client'
import type { UpdateManager } from './update-manager'
import type { Logger } from './logger'
import type { RunMode } from './run-mode'

/** Explicit configuration of one pipeline run. */
export interface PipelineOptions {
  /** Publisher; required in `publish` mode. */
  publisher?: ChangeRequestPublisher

  /** Drop references whose `owner/name` matches any of these. */
  exclude?: RegExp[]

  /** Version resolver. */
  versionChecker: VersionChecker

  /** `owner/repo` of the scanned repository, to skip its own workflows. */
  repository?: string

  /** Update builder and local applier. */
  updateManager: UpdateManager

  /** Workflows directory, relative to `rootPath` unless absolute. */
  workflowsPath: string

  /** Remaining request budget; concurrency never exceeds it. */
  getRateLimitStatus?: GitHubClient['getRateLimitStatus']

  /** Maximum number of concurrent version checks. */
  concurrency: number

  /** Cancels every outstanding remote call. */
  signal?: AbortSignal

  /** Explicit branch for the pull request. */
  branch?: string

  /** Repository root. */
  rootPath: string

  /** Defaults to `console`. */
  logger?: Logger

  mode: RunMode
}
