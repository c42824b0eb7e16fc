import type { components } from '@octokit/openapi-types'

import type { GitHubClientContext } from '../../types/github-client-context'
import type { RequestOptions } from '../../types/request-options'
import type { TagInfo } from '../../types/tag-info'

import { makeRequest } from './make-request'

/** Page size GitHub allows for tag listings. */
export const TAGS_PER_PAGE = 100

/**
 * Fetch the tag list page by page.
 *
 * Listings are cached per repository and page limit; concurrent callers share
 * one in-flight request. A failed listing is evicted so a later call retries.
 * The shared request is bounded by the client timeout only; a caller whose
 * signal aborts stops waiting without cancelling it for the others.
 *
 * @param context - Client context.
 * @param parameters - Request parameters.
 * @param parameters.owner - Repository owner.
 * @param parameters.repo - Repository name.
 * @param parameters.maxPages - Upper bound on fetched pages.
 * @param options - Abort signal.
 * @returns TagInfo array in the order GitHub returns them.
 */
export async function getAllTags(
  context: GitHubClientContext,
  parameters: { maxPages: number; owner: string; repo: string },
  options: RequestOptions = {},
): Promise<TagInfo[]> {
  options.signal?.throwIfAborted()
  let { maxPages, owner, repo } = parameters
  let cacheKey = `${owner}/${repo}#${maxPages}`

  let pending = context.caches.tags.get(cacheKey)
  if (!pending) {
    pending = fetchTagPages(context, parameters).catch((error: unknown) => {
      context.caches.tags.delete(cacheKey)
      throw error
    })
    context.caches.tags.set(cacheKey, pending)
  }

  return await waitWithSignal(pending, options.signal)
}

/**
 * Wait for a shared promise until it settles or `signal` aborts.
 *
 * @param pending - Promise other callers may also wait for.
 * @param signal - Abort signal of this caller.
 * @returns Value of `pending`.
 */
async function waitWithSignal<T>(
  pending: Promise<T>,
  signal: AbortSignal | undefined,
): Promise<T> {
  if (!signal) {
    return await pending
  }

  let rejectAborted: (reason: unknown) => void = () => {}
  let aborted = new Promise<never>((_resolve, reject) => {
    rejectAborted = reject
  })
  let onAbort = (): void => rejectAborted(signal.reason)
  signal.addEventListener('abort', onAbort, { once: true })

  try {
    return await Promise.race([pending, aborted])
  } finally {
    signal.removeEventListener('abort', onAbort)
  }
}

async function fetchTagPages(
  context: GitHubClientContext,
  parameters: { maxPages: number; owner: string; repo: string },
): Promise<TagInfo[]> {
  let { maxPages, owner, repo } = parameters
  let result: TagInfo[] = []

  for (let page = 1; page <= maxPages; page++) {
    let resp = await makeRequest(
      context,
      `/repos/${owner}/${repo}/tags?per_page=${TAGS_PER_PAGE}&page=${page}`,
    )
    let tags = resp.data as components['schemas']['tag'][]

    for (let tag of tags) {
      result.push({ sha: tag.commit.sha, tag: tag.name })
    }

    if (tags.length < TAGS_PER_PAGE) {
      break
    }
  }

  return result
}
