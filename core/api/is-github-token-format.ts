/** Shapes of personal, OAuth, app installation and user-to-server tokens. */
const TOKEN_PATTERNS = [
  /^github_pat_[\dA-Z_a-z]{82}$/u,
  /^gh[opsu]_[\dA-Za-z]{36}$/u,
]

/**
 * Check whether a token has the shape of a GitHub-issued token.
 *
 * Only the format is checked; a well-formed token may still be revoked.
 *
 * @param token - Token to check.
 * @returns True when the token matches a known prefix and length.
 */
export function isGitHubTokenFormat(token: string): boolean {
  return TOKEN_PATTERNS.some(pattern => pattern.test(token))
}
