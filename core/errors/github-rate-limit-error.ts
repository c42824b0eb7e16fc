import { GitHubApiError } from './github-api-error'

/** Custom error for rate limit issues. */
export class GitHubRateLimitError extends GitHubApiError {
  /** The time when the rate limit resets. */
  public readonly resetAt: Date

  /**
   * Creates a new GitHubRateLimitError.
   *
   * @param status - HTTP status code (403 or 429).
   * @param path - Request path that was refused.
   * @param resetAt - The time when the rate limit resets.
   */
  public constructor(status: number, path: string, resetAt: Date) {
    super(
      status,
      path,
      `GitHub API rate limit exceeded. Resets at ${resetAt.toISOString()}`,
    )
    this.name = 'GitHubRateLimitError'
    this.resetAt = resetAt
  }
}
