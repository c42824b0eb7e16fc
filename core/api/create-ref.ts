import type { GitHubClientContext } from '../../types/github-client-context'
import type { RequestOptions } from '../../types/request-options'

import { makeRequest } from './make-request'

/**
 * Create a ref. Rejects with status 422 when it already exists.
 *
 * @param context - Client context.
 * @param parameters - Request parameters.
 * @param parameters.owner - Repository owner.
 * @param parameters.repo - Repository name.
 * @param parameters.ref - Ref without `refs/`, e.g. `heads/update`.
 * @param parameters.sha - Commit SHA.
 * @param options - Abort signal.
 */
export async function createRef(
  context: GitHubClientContext,
  parameters: { owner: string; repo: string; ref: string; sha: string },
  options: RequestOptions = {},
): Promise<void> {
  let { owner, repo, ref, sha } = parameters
  await makeRequest(context, `/repos/${owner}/${repo}/git/refs`, {
    ...options,
    body: { ref: `refs/${ref}`, sha },
    method: 'POST',
  })
}
