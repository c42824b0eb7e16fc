import { GitHubApiError } from './github-api-error'

/**
 * Check whether an error is a 404 response.
 *
 * @param error - Caught value.
 * @returns True for a GitHub 404.
 */
export function isNotFoundError(error: unknown): boolean {
  return error instanceof GitHubApiError && error.status === 404
}
