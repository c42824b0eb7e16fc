import type { components } from '@octokit/openapi-types'

import type { GitHubClientContext } from '../../types/github-client-context'
import type { RequestOptions } from '../../types/request-options'

import { isNotFoundError } from '../errors/is-not-found-error'
import { makeRequest } from './make-request'
import { encodePath } from './encode-path'

/** Object a ref points to. */
export interface RefTarget {
  /** Object type, `commit` or `tag` for annotated tags. */
  type: string

  /** Object SHA. */
  sha: string
}

/**
 * Read a single ref by its exact name.
 *
 * Uses the singular `git/ref` endpoint, which never prefix-matches.
 *
 * @param context - Client context.
 * @param parameters - Request parameters.
 * @param parameters.owner - Repository owner.
 * @param parameters.repo - Repository name.
 * @param parameters.reference - Ref without `refs/`, e.g. `heads/main`.
 * @param options - Abort signal.
 * @returns Target object or null when the ref does not exist.
 */
export async function getRef(
  context: GitHubClientContext,
  parameters: { reference: string; owner: string; repo: string },
  options: RequestOptions = {},
): Promise<RefTarget | null> {
  let { reference, owner, repo } = parameters

  try {
    let resp = await makeRequest(
      context,
      `/repos/${owner}/${repo}/git/ref/${encodePath(reference)}`,
      options,
    )
    let data = resp.data as components['schemas']['git-ref']
    return { type: data.object.type, sha: data.object.sha }
  } catch (error) {
    if (isNotFoundError(error)) {
      return null
    }
    throw error
  }
}
