import type { components } from '@octokit/openapi-types'

import type { GitHubClientContext } from '../../types/github-client-context'
import type { RequestOptions } from '../../types/request-options'
import type { CommitInfo } from '../../types/github-client'

import { makeRequest } from './make-request'

/**
 * Read a commit object.
 *
 * @param context - Client context.
 * @param parameters - Request parameters.
 * @param parameters.owner - Repository owner.
 * @param parameters.repo - Repository name.
 * @param parameters.sha - Commit SHA.
 * @param options - Abort signal.
 * @returns Commit, tree and parent SHAs.
 */
export async function getCommit(
  context: GitHubClientContext,
  parameters: { owner: string; repo: string; sha: string },
  options: RequestOptions = {},
): Promise<CommitInfo> {
  let { owner, repo, sha } = parameters
  let resp = await makeRequest(
    context,
    `/repos/${owner}/${repo}/git/commits/${sha}`,
    options,
  )
  let commit = resp.data as components['schemas']['git-commit']
  return {
    parents: commit.parents.map(parent => parent.sha),
    treeSha: commit.tree.sha,
    sha: commit.sha,
  }
}
