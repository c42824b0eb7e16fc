import type { RunMode } from '../types/run-mode'

import {
  DEFAULT_WORKFLOWS_PATH,
  DEFAULT_CONCURRENCY,
  DEFAULT_TIMEOUT,
} from '../core/constants'
import { resolveGitHubToken } from '../core/api/resolve-github-token'
import { ConfigurationError } from './configuration-error'

/** Flags as parsed by cac. */
export interface CLIOptions {
  /** Regex patterns to exclude actions by name (repeatable). */
  exclude?: string[] | string

  /** Seconds before a single API request is abandoned. */
  timeout?: string | number

  /** Parallel version checks. */
  concurrency?: string | number

  /** Workflows directory relative to the repository root. */
  workflowsPath?: string

  /** Ignore pre-release tags. */
  stableOnly?: boolean

  /** Repository name on GitHub. */
  repoName?: string

  /** Report updates without changing anything. */
  dryRun?: boolean

  /** Branch for the pull request. */
  branch?: string

  /** Rewrite local files instead of opening a pull request. */
  stage?: boolean

  /** Repository owner on GitHub. */
  owner?: string

  /** GitHub token. */
  token?: string

  /** Local repository root. */
  repo?: string
}

/** Fully resolved run configuration. */
export interface ResolvedOptions {
  /** Exclude patterns, comma lists split. */
  exclude: string[]

  /** Parallel version checks. */
  concurrency: number

  /** Workflows directory. */
  workflowsPath: string

  /** GitHub token, if any. */
  token: undefined | string

  /** Ignore pre-release tags. */
  stableOnly: boolean

  /** Repository owner on GitHub. */
  owner: undefined | string

  /** Branch for the pull request. */
  branch: undefined | string

  /** Repository name on GitHub. */
  repo: undefined | string

  /** Local repository root. */
  rootPath: string

  /** Request timeout in milliseconds. */
  timeout: number

  mode: RunMode
}

/**
 * Merge command line flags with the environment.
 *
 * Flags win over environment variables. `GITHUB_REPOSITORY` (`owner/repo`)
 * fills in missing `--owner` and `--repo-name`.
 *
 * @param flags - Parsed flags.
 * @param env - Process environment.
 * @param resolveToken - Token lookup used when `--token` is absent.
 * @returns Resolved options.
 * @throws {ConfigurationError} On conflicting or invalid values.
 */
export function resolveOptions(
  flags: CLIOptions,
  env: NodeJS.ProcessEnv = process.env,
  resolveToken: (
    env: NodeJS.ProcessEnv,
  ) => undefined | string = resolveGitHubToken,
): ResolvedOptions {
  if (flags.dryRun && flags.stage) {
    throw new ConfigurationError('--dry-run and --stage cannot be combined')
  }

  let mode: RunMode = 'publish'
  if (flags.dryRun) {
    mode = 'preview'
  } else if (flags.stage) {
    mode = 'stage'
  }

  let [envOwner, envRepo] = (env['GITHUB_REPOSITORY'] ?? '').split('/')
  let owner = flags.owner ?? (envOwner || undefined)
  let repo = flags.repoName ?? (envRepo || undefined)

  if (mode === 'publish' && (!owner || !repo)) {
    throw new ConfigurationError(
      'Publishing needs --owner and --repo-name (or GITHUB_REPOSITORY)',
    )
  }

  let rawExcludes = [flags.exclude ?? []].flat()

  return {
    exclude: rawExcludes
      .flatMap(item => item.split(','))
      .map(item => item.trim())
      .filter(Boolean),
    timeout:
      readPositive(flags.timeout, '--timeout', DEFAULT_TIMEOUT / 1000) * 1000,
    concurrency: Math.floor(
      readPositive(flags.concurrency, '--concurrency', DEFAULT_CONCURRENCY),
    ),
    workflowsPath:
      flags.workflowsPath ?? env['WORKFLOWS_PATH'] ?? DEFAULT_WORKFLOWS_PATH,
    token: flags.token ?? resolveToken(env),
    stableOnly: flags.stableOnly ?? false,
    rootPath: flags.repo ?? '.',
    branch: flags.branch,
    owner,
    repo,
    mode,
  }
}

/**
 * Read a positive number flag.
 *
 * @param value - Raw flag value.
 * @param name - Flag name for the error message.
 * @param fallback - Value when the flag is absent.
 * @returns Parsed number.
 */
function readPositive(
  value: undefined | string | number,
  name: string,
  fallback: number,
): number {
  if (value === undefined) {
    return fallback
  }
  let parsed = Number(value)
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigurationError(`${name} must be a positive number`)
  }
  return parsed
}
