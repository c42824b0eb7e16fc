/** The request never produced a response (network failure, abort, timeout). */
export class GitHubNetworkError extends Error {
  /** Request path. */
  public readonly path: string

  /**
   * Creates a new GitHubNetworkError.
   *
   * @param path - Request path beginning with '/'.
   * @param cause - Underlying failure.
   */
  public constructor(path: string, cause: unknown) {
    let reason = cause instanceof Error ? cause.message : String(cause)
    super(`GitHub request ${path} failed: ${reason}`, { cause })
    this.name = 'GitHubNetworkError'
    this.path = path
  }
}
