import type { GitHubClientContext } from '../../types/github-client-context'

/**
 * Update rate limit information from response headers.
 *
 * @param context - Client context with mutable rate limit fields.
 * @param headers - Lower-cased response headers.
 */
export function updateRateLimitInfo(
  context: GitHubClientContext,
  headers: Record<string, string | undefined>,
): void {
  let remaining = Number.parseInt(headers['x-ratelimit-remaining'] ?? '', 10)
  if (Number.isFinite(remaining)) {
    context.rateLimitRemaining = remaining
  }

  let reset = Number.parseInt(headers['x-ratelimit-reset'] ?? '', 10)
  if (Number.isFinite(reset)) {
    context.rateLimitReset = new Date(reset * 1000)
  }
}
