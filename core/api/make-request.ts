import type { GitHubClientContext } from '../../types/github-client-context'
import type { RequestOptions } from '../../types/request-options'

import { GitHubRateLimitError } from '../errors/github-rate-limit-error'
import { GitHubNetworkError } from '../errors/github-network-error'
import { GitHubApiError } from '../errors/github-api-error'
import { updateRateLimitInfo } from './update-rate-limit-info'

/** Options of a single REST call. */
export interface MakeRequestOptions extends RequestOptions {
  /** HTTP method, GET by default. */
  method?: 'PATCH' | 'POST' | 'GET'

  /** JSON request body. */
  body?: unknown
}

/** Parsed response of a REST call. */
export interface MakeRequestResult {
  /** Lower-cased response headers. */
  headers: Record<string, string>

  /** Parsed JSON body, or null for an empty body. */
  data: unknown

  /** HTTP status code. */
  status: number
}

/**
 * Perform an HTTP request against GitHub API with auth and rate-limit updates.
 *
 * The call is cancelled when `options.signal` aborts or when the client's
 * per-request timeout elapses, whichever comes first.
 *
 * @param context - Client context with token and rate-limit state.
 * @param path - API path beginning with '/'.
 * @param options - Method, body and abort signal.
 * @returns Response headers, status and parsed data.
 */
export async function makeRequest(
  context: GitHubClientContext,
  path: string,
  options: MakeRequestOptions = {},
): Promise<MakeRequestResult> {
  let { method = 'GET', signal, body } = options

  let headers: Record<string, string> = {
    Accept: 'application/vnd.github+json',
    'X-GitHub-Api-Version': '2022-11-28',
    'User-Agent': 'actions-pinner',
  }

  if (context.token) {
    headers['Authorization'] = `Bearer ${context.token}`
  }
  if (body !== undefined) {
    headers['Content-Type'] = 'application/json'
  }

  let controller = new AbortController()
  let onAbort = (): void => controller.abort(signal?.reason)
  let timer = setTimeout(() => {
    controller.abort(new Error(`timed out after ${context.timeout}ms`))
  }, context.timeout)

  if (signal?.aborted) {
    controller.abort(signal.reason)
  } else {
    signal?.addEventListener('abort', onAbort, { once: true })
  }

  let response: Response
  let text: string
  try {
    response = await fetch(`${context.baseUrl}${path}`, {
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: controller.signal,
      headers,
      method,
    })
    text = await response.text()
  } catch (error) {
    throw new GitHubNetworkError(
      path,
      controller.signal.aborted ? controller.signal.reason : error,
    )
  } finally {
    clearTimeout(timer)
    signal?.removeEventListener('abort', onAbort)
  }

  let responseHeaders: Record<string, string> = {}
  response.headers.forEach((value, key) => {
    responseHeaders[key.toLowerCase()] = value
  })

  updateRateLimitInfo(context, responseHeaders)

  if (!response.ok) {
    let isRateLimited =
      (response.status === 403 || response.status === 429) &&
      (responseHeaders['x-ratelimit-remaining'] === '0' ||
        text.toLowerCase().includes('rate limit'))

    if (isRateLimited) {
      throw new GitHubRateLimitError(
        response.status,
        path,
        context.rateLimitReset,
      )
    }

    let detail = readErrorMessage(text) ?? response.statusText
    throw new GitHubApiError(
      response.status,
      path,
      `GitHub API error: ${response.status} ${detail}`.trim(),
    )
  }

  let data: unknown = text ? JSON.parse(text) : null
  return { headers: responseHeaders, status: response.status, data }
}

/**
 * Extract the `message` field GitHub puts into error bodies.
 *
 * @param text - Raw response body.
 * @returns Message or null.
 */
function readErrorMessage(text: string): string | null {
  try {
    let parsed: unknown = JSON.parse(text)
    if (
      typeof parsed === 'object' &&
      parsed !== null &&
      'message' in parsed &&
      typeof parsed.message === 'string'
    ) {
      return parsed.message
    }
  } catch {
    /** Not JSON. */
  }
  return null
}
