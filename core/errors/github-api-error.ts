/** Non-success response from the GitHub REST API. */
export class GitHubApiError extends Error {
  /** HTTP status code. */
  public readonly status: number

  /** Request path that failed. */
  public readonly path: string

  /**
   * Creates a new GitHubApiError.
   *
   * @param status - HTTP status code.
   * @param path - Request path beginning with '/'.
   * @param message - Error message.
   */
  public constructor(status: number, path: string, message?: string) {
    super(message ?? `GitHub API error: ${status} for ${path}`)
    this.name = 'GitHubApiError'
    this.status = status
    this.path = path
  }
}
