import type { components } from '@octokit/openapi-types'

import type { GitHubClientContext } from '../../types/github-client-context'
import type { RequestOptions } from '../../types/request-options'

import { isNotFoundError } from '../errors/is-not-found-error'
import { GitHubApiError } from '../errors/github-api-error'
import { makeRequest } from './make-request'
import { encodePath } from './encode-path'

/**
 * Read a file's text at a given ref.
 *
 * Files above the contents API size limit come back without inline content;
 * those are read through the blob endpoint instead.
 *
 * @param context - Client context.
 * @param parameters - Request parameters.
 * @param parameters.owner - Repository owner.
 * @param parameters.repo - Repository name.
 * @param parameters.path - Repository-relative POSIX path.
 * @param parameters.ref - Commit SHA or ref name.
 * @param options - Abort signal.
 * @returns UTF-8 content, or null when the path does not exist.
 */
export async function getFileContent(
  context: GitHubClientContext,
  parameters: { owner: string; path: string; repo: string; ref: string },
  options: RequestOptions = {},
): Promise<string | null> {
  let { owner, path, repo, ref } = parameters
  let requestPath = `/repos/${owner}/${repo}/contents/${encodePath(path)}?ref=${encodeURIComponent(ref)}`

  let data: unknown
  try {
    data = (await makeRequest(context, requestPath, options)).data
  } catch (error) {
    if (isNotFoundError(error)) {
      return null
    }
    throw error
  }

  if (Array.isArray(data)) {
    throw new GitHubApiError(422, requestPath, `${path} is a directory`)
  }

  let file = data as components['schemas']['content-file']
  if (file.encoding === 'base64' && file.content) {
    return decodeBase64(file.content)
  }

  let blobResp = await makeRequest(
    context,
    `/repos/${owner}/${repo}/git/blobs/${file.sha}`,
    options,
  )
  let blob = blobResp.data as components['schemas']['blob']
  return blob.encoding === 'base64' ? decodeBase64(blob.content) : blob.content
}

/**
 * Decode base64 content as strict UTF-8.
 *
 * @param content - Base64 text, possibly wrapped over several lines.
 * @returns Decoded text.
 * @throws {TypeError} When the bytes are not valid UTF-8.
 */
function decodeBase64(content: string): string {
  let bytes = Buffer.from(content.replaceAll('\n', ''), 'base64')
  return new TextDecoder('utf-8', { ignoreBOM: true, fatal: true }).decode(
    bytes,
  )
}
