import type { TagInfo } from './tag-info'

/**
 * Internal client context shared by all API functions.
 *
 * Stores auth, rate-limit state, base URL and in-memory caches to decrease the
 * number of API requests during a single run.
 */
export interface GitHubClientContext {
  /** Lightweight caches keyed by owner/repo (+ extra payload). */
  caches: {
    /** In-flight or settled tag listings. */
    tags: Map<string, Promise<TagInfo[]>>

    /** Resolved commit SHAs for tag or branch names. */
    commits: Map<string, string>
  }

  /** Remaining requests available per current rate-limit window. */
  rateLimitRemaining: number

  /** GitHub token, if available. */
  token: undefined | string

  /** Scheduled time when rate limit resets. */
  rateLimitReset: Date

  /** Per-request timeout in milliseconds. */
  timeout: number

  /** GitHub REST API base URL. */
  baseUrl: string
}
