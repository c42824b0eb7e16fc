import type { PullRequestInfo } from './github-client'
import type { RequestOptions } from './request-options'
import type { PublishState } from './publish-state'
import type { Update } from './update'

/** Outcome of a publish run. */
export type PublishResult =
  | {
      /** Pull request that was opened or found open. */
      pullRequest: PullRequestInfo

      /** True when the branch head or pull request already existed. */
      reused: boolean

      state: Extract<PublishState, 'RequestOpened'>

      /** Commit the branch points to. */
      commit: string

      /** Branch the pull request is opened from. */
      branch: string
    }
  | {
      /** Nothing to commit: every file already holds the rendered content. */
      state: 'Unchanged'
    }

/** Options for one publish run. */
export interface PublishOptions extends RequestOptions {
  /** Explicit branch name instead of the generated one. */
  branch?: string
}

/** Publishes a batch of updates as one pull request. */
export interface ChangeRequestPublisher {
  /** Build the commit remotely and open a pull request for it. */
  createPR(updates: Update[], options?: PublishOptions): Promise<PublishResult>

  /** Align remote blob paths with the local workflows root. */
  setWorkflowsPath(path: string): void
}
