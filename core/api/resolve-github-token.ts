import { execFileSync } from 'node:child_process'

/**
 * Resolve a GitHub token from the environment or the gh CLI.
 *
 * @param env - Environment to read `GITHUB_TOKEN` and `GH_TOKEN` from.
 * @returns Token string or undefined when none is available.
 */
export function resolveGitHubToken(
  env: NodeJS.ProcessEnv = process.env,
): undefined | string {
  for (let name of ['GITHUB_TOKEN', 'GH_TOKEN']) {
    let value = env[name]?.trim()
    if (value) {
      return value
    }
  }

  try {
    let output = execFileSync('gh', ['auth', 'token'], {
      stdio: ['ignore', 'pipe', 'ignore'],
      encoding: 'utf8',
      timeout: 500,
    })
    let token = output.trim()
    if (token) {
      return token
    }
  } catch {
    /** The gh CLI is missing or not logged in. */
  }

  return undefined
}
