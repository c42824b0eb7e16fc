import type { components } from '@octokit/openapi-types'

import type { GitHubClientContext } from '../../types/github-client-context'
import type { RequestOptions } from '../../types/request-options'
import type { PullRequestInfo } from '../../types/github-client'

import { makeRequest } from './make-request'

/**
 * Find an open pull request from `head` into `base`.
 *
 * @param context - Client context.
 * @param parameters - Request parameters.
 * @param parameters.owner - Repository owner.
 * @param parameters.repo - Repository name.
 * @param parameters.head - Source branch in the same repository.
 * @param parameters.base - Target branch.
 * @param options - Abort signal.
 * @returns The pull request or null.
 */
export async function findPullRequest(
  context: GitHubClientContext,
  parameters: { owner: string; head: string; base: string; repo: string },
  options: RequestOptions = {},
): Promise<PullRequestInfo | null> {
  let { owner, head, base, repo } = parameters
  let query = new URLSearchParams({
    head: `${owner}:${head}`,
    state: 'open',
    base,
  })
  let resp = await makeRequest(
    context,
    `/repos/${owner}/${repo}/pulls?${query.toString()}`,
    options,
  )
  let [pull] = resp.data as components['schemas']['pull-request-simple'][]
  return pull ? { number: pull.number, url: pull.html_url } : null
}
