import type { components } from '@octokit/openapi-types'

import type { GitHubClientContext } from '../../types/github-client-context'
import type { RequestOptions } from '../../types/request-options'

import { makeRequest } from './make-request'

/**
 * Create a UTF-8 blob.
 *
 * @param context - Client context.
 * @param parameters - Request parameters.
 * @param parameters.owner - Repository owner.
 * @param parameters.repo - Repository name.
 * @param parameters.content - File text.
 * @param options - Abort signal.
 * @returns Blob SHA.
 */
export async function createBlob(
  context: GitHubClientContext,
  parameters: { content: string; owner: string; repo: string },
  options: RequestOptions = {},
): Promise<string> {
  let { content, owner, repo } = parameters
  let resp = await makeRequest(context, `/repos/${owner}/${repo}/git/blobs`, {
    ...options,
    body: { encoding: 'utf-8', content },
    method: 'POST',
  })
  return (resp.data as components['schemas']['short-blob']).sha
}
