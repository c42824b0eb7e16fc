import type { components } from '@octokit/openapi-types'

import type { GitHubClientContext } from '../../types/github-client-context'
import type { RequestOptions } from '../../types/request-options'
import type { TreeEntry } from '../../types/github-client'

import { makeRequest } from './make-request'

/**
 * List the direct entries of a tree.
 *
 * @param context - Client context.
 * @param parameters - Request parameters.
 * @param parameters.owner - Repository owner.
 * @param parameters.repo - Repository name.
 * @param parameters.sha - Tree SHA.
 * @param options - Abort signal.
 * @returns Entries with their names, modes and object SHAs.
 */
export async function getTree(
  context: GitHubClientContext,
  parameters: { owner: string; repo: string; sha: string },
  options: RequestOptions = {},
): Promise<TreeEntry[]> {
  let { owner, repo, sha } = parameters
  let resp = await makeRequest(
    context,
    `/repos/${owner}/${repo}/git/trees/${sha}`,
    options,
  )
  let tree = resp.data as components['schemas']['git-tree']
  return tree.tree.flatMap(({ path, mode, type, sha }) =>
    path && mode && type && sha ? [{ path, mode, type, sha }] : [],
  )
}
