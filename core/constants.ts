/** Workflows directory relative to the repository root. */
export const DEFAULT_WORKFLOWS_PATH = '.github/workflows'

/** GitHub REST API base URL. */
export const DEFAULT_GITHUB_API_URL = 'https://api.github.com'

/** Per-request timeout in milliseconds. */
export const DEFAULT_TIMEOUT = 30_000

/** Concurrent version checks. */
export const DEFAULT_CONCURRENCY = 4

/** Tag pages of 100 read per repository. */
export const DEFAULT_MAX_TAG_PAGES = 3

/** Entries kept in the version trail: the original plus the four latest. */
export const MAX_TRAIL_LENGTH = 5

/** Length of abbreviated commit hashes. */
export const SHORT_HASH_LENGTH = 7

/** Labels added to opened pull requests. */
export const DEFAULT_LABELS = ['dependencies', 'automated-pr']

/** Prefix of generated branch names. */
export const DEFAULT_BRANCH_PREFIX = 'actions-pinner'

/** Comment directives that exclude references from scanning. */
export const IGNORE_DIRECTIVES = {
  nextLine: 'actions-pinner-ignore-next-line',
  start: 'actions-pinner-ignore-start',
  file: 'actions-pinner-ignore-file',
  end: 'actions-pinner-ignore-end',
  inline: 'actions-pinner-ignore',
} as const
