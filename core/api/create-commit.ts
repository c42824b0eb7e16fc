import type { components } from '@octokit/openapi-types'

import type { GitHubClientContext } from '../../types/github-client-context'
import type { RequestOptions } from '../../types/request-options'

import { makeRequest } from './make-request'

/**
 * Create a commit object.
 *
 * @param context - Client context.
 * @param parameters - Request parameters.
 * @param parameters.owner - Repository owner.
 * @param parameters.repo - Repository name.
 * @param parameters.message - Commit message.
 * @param parameters.tree - Tree SHA.
 * @param parameters.parents - Parent commit SHAs.
 * @param options - Abort signal.
 * @returns Commit SHA.
 */
export async function createCommit(
  context: GitHubClientContext,
  parameters: {
    parents: string[]
    message: string
    owner: string
    tree: string
    repo: string
  },
  options: RequestOptions = {},
): Promise<string> {
  let { message, parents, owner, tree, repo } = parameters
  let resp = await makeRequest(
    context,
    `/repos/${owner}/${repo}/git/commits`,
    { ...options, body: { message, parents, tree }, method: 'POST' },
  )
  return (resp.data as components['schemas']['git-commit']).sha
}
