import type { components } from '@octokit/openapi-types'

import type { GitHubClientContext } from '../../types/github-client-context'
import type { RequestOptions } from '../../types/request-options'
import type { PullRequestInfo } from '../../types/github-client'

import { makeRequest } from './make-request'

/**
 * Open a pull request.
 *
 * @param context - Client context.
 * @param parameters - Request parameters.
 * @param parameters.owner - Repository owner.
 * @param parameters.repo - Repository name.
 * @param parameters.title - Title.
 * @param parameters.body - Markdown body.
 * @param parameters.head - Source branch.
 * @param parameters.base - Target branch.
 * @param options - Abort signal.
 * @returns Number and URL of the new pull request.
 */
export async function createPullRequest(
  context: GitHubClientContext,
  parameters: {
    title: string
    owner: string
    body: string
    head: string
    base: string
    repo: string
  },
  options: RequestOptions = {},
): Promise<PullRequestInfo> {
  let { title, owner, body, head, base, repo } = parameters
  let resp = await makeRequest(context, `/repos/${owner}/${repo}/pulls`, {
    ...options,
    body: { title, body, head, base },
    method: 'POST',
  })
  let pull = resp.data as components['schemas']['pull-request']
  return { number: pull.number, url: pull.html_url }
}
