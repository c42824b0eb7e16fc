import type { components } from '@octokit/openapi-types'

import type { GitHubClientContext } from '../../types/github-client-context'
import type { RequestOptions } from '../../types/request-options'
import type { TreeEntryInput } from '../../types/github-client'

import { makeRequest } from './make-request'

/**
 * Create a tree that replaces `entries` on top of `baseTree`.
 *
 * @param context - Client context.
 * @param parameters - Request parameters.
 * @param parameters.owner - Repository owner.
 * @param parameters.repo - Repository name.
 * @param parameters.baseTree - Tree SHA the new tree starts from.
 * @param parameters.entries - Blobs to place into the tree.
 * @param options - Abort signal.
 * @returns Tree SHA.
 */
export async function createTree(
  context: GitHubClientContext,
  parameters: {
    entries: TreeEntryInput[]
    baseTree: string
    owner: string
    repo: string
  },
  options: RequestOptions = {},
): Promise<string> {
  let { baseTree, entries, owner, repo } = parameters
  let resp = await makeRequest(context, `/repos/${owner}/${repo}/git/trees`, {
    ...options,
    body: {
      tree: entries.map(entry => ({
        path: entry.path,
        mode: entry.mode,
        sha: entry.sha,
        type: 'blob',
      })),
      base_tree: baseTree,
    },
    method: 'POST',
  })
  return (resp.data as components['schemas']['git-tree']).sha
}
