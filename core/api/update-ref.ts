import type { GitHubClientContext } from '../../types/github-client-context'
import type { RequestOptions } from '../../types/request-options'

import { makeRequest } from './make-request'
import { encodePath } from './encode-path'

/**
 * Move a ref. Without `force` GitHub only accepts fast-forwards (422
 * otherwise).
 *
 * @param context - Client context.
 * @param parameters - Request parameters.
 * @param parameters.owner - Repository owner.
 * @param parameters.repo - Repository name.
 * @param parameters.ref - Ref without `refs/`, e.g. `heads/update`.
 * @param parameters.sha - New commit SHA.
 * @param parameters.force - Allow non-fast-forward moves.
 * @param options - Abort signal.
 */
export async function updateRef(
  context: GitHubClientContext,
  parameters: {
    force: boolean
    owner: string
    repo: string
    ref: string
    sha: string
  },
  options: RequestOptions = {},
): Promise<void> {
  let { force, owner, repo, ref, sha } = parameters
  await makeRequest(
    context,
    `/repos/${owner}/${repo}/git/refs/${encodePath(ref)}`,
    { ...options, body: { force, sha }, method: 'PATCH' },
  )
}
