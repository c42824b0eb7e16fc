import type { GitHubClientContext } from '../../types/github-client-context'
import type { RequestOptions } from '../../types/request-options'

import { makeRequest } from './make-request'

/**
 * Add labels to an issue or pull request.
 *
 * @param context - Client context.
 * @param parameters - Request parameters.
 * @param parameters.owner - Repository owner.
 * @param parameters.repo - Repository name.
 * @param parameters.number - Issue or pull request number.
 * @param parameters.labels - Label names.
 * @param options - Abort signal.
 */
export async function addLabels(
  context: GitHubClientContext,
  parameters: { labels: string[]; number: number; owner: string; repo: string },
  options: RequestOptions = {},
): Promise<void> {
  let { number, labels, owner, repo } = parameters
  await makeRequest(
    context,
    `/repos/${owner}/${repo}/issues/${number}/labels`,
    { ...options, body: { labels }, method: 'POST' },
  )
}
