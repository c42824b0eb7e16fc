import type { GitHubClientContext } from '../../types/github-client-context'

/**
 * Build a client context for API function tests.
 *
 * @param token - Optional token.
 * @returns Fresh context with empty caches.
 */
export function createContext(token?: string): GitHubClientContext {
  return {
    caches: { commits: new Map(), tags: new Map() },
    rateLimitRemaining: token ? 5000 : 60,
    baseUrl: 'https://api.github.com',
    rateLimitReset: new Date(0),
    timeout: 1000,
    token,
  }
}

/**
 * Build a JSON response.
 *
 * @param body - Value to serialize.
 * @param status - HTTP status.
 * @returns Response.
 */
export function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    headers: { 'content-type': 'application/json' },
    status,
  })
}
