import type { components } from '@octokit/openapi-types'

import type { GitHubClientContext } from '../../types/github-client-context'
import type { RequestOptions } from '../../types/request-options'

import { makeRequest } from './make-request'

/**
 * Read repository metadata.
 *
 * @param context - Client context.
 * @param parameters - Request parameters.
 * @param parameters.owner - Repository owner.
 * @param parameters.repo - Repository name.
 * @param options - Abort signal.
 * @returns Default branch name.
 */
export async function getRepository(
  context: GitHubClientContext,
  parameters: { owner: string; repo: string },
  options: RequestOptions = {},
): Promise<{ defaultBranch: string }> {
  let { owner, repo } = parameters
  let resp = await makeRequest(context, `/repos/${owner}/${repo}`, options)
  let data = resp.data as components['schemas']['full-repository']
  return { defaultBranch: data.default_branch }
}
