import type { components } from '@octokit/openapi-types'

import type { GitHubClientContext } from '../../types/github-client-context'
import type { RequestOptions } from '../../types/request-options'

import { GitHubApiError } from '../errors/github-api-error'
import { makeRequest } from './make-request'
import { getRef } from './get-ref'

/** Annotated tags may point at other tags; stop after this many hops. */
const MAX_TAG_DEPTH = 5

/**
 * Resolve a tag or branch name to a commit SHA.
 *
 * Tags win over branches of the same name. Annotated tags are dereferenced to
 * the commit they point to.
 *
 * @param context - Client context.
 * @param parameters - Request parameters.
 * @param parameters.owner - Repository owner.
 * @param parameters.repo - Repository name.
 * @param parameters.reference - Tag or branch name.
 * @param options - Abort signal.
 * @returns Commit SHA.
 * @throws {GitHubApiError} With status 404 when neither ref exists.
 */
export async function resolveCommitSha(
  context: GitHubClientContext,
  parameters: { reference: string; owner: string; repo: string },
  options: RequestOptions = {},
): Promise<string> {
  let { reference, owner, repo } = parameters

  let cacheKey = `${owner}/${repo}#${reference}`
  let cached = context.caches.commits.get(cacheKey)
  if (cached) {
    return cached
  }

  let target =
    (await getRef(
      context,
      { reference: `tags/${reference}`, owner, repo },
      options,
    )) ??
    (await getRef(
      context,
      { reference: `heads/${reference}`, owner, repo },
      options,
    ))

  if (!target) {
    throw new GitHubApiError(
      404,
      `/repos/${owner}/${repo}/git/ref`,
      `No tag or branch named ${reference} in ${owner}/${repo}`,
    )
  }

  let depth = 0
  while (target.type === 'tag') {
    if (depth++ >= MAX_TAG_DEPTH) {
      throw new GitHubApiError(
        422,
        `/repos/${owner}/${repo}/git/tags/${target.sha}`,
        `Tag ${reference} in ${owner}/${repo} is nested too deeply`,
      )
    }
    let resp = await makeRequest(
      context,
      `/repos/${owner}/${repo}/git/tags/${target.sha}`,
      options,
    )
    let tag = resp.data as components['schemas']['git-tag']
    target = { type: tag.object.type, sha: tag.object.sha }
  }

  let sha = target.sha.toLowerCase()
  context.caches.commits.set(cacheKey, sha)
  return sha
}
