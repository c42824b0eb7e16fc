import type { RequestOptions } from './request-options'
import type { TagInfo } from './tag-info'

/** Entry of a tree to create on top of a base tree. */
export interface TreeEntryInput {
  /** Repository-relative POSIX path. */
  path: string

  /** File mode of the entry being replaced, e.g. `100644` or `100755`. */
  mode: string

  /** Blob SHA. */
  sha: string
}

/** Direct child of a tree. */
export interface TreeEntry {
  /** Name within the parent tree. */
  path: string

  /** `100644`, `100755`, `120000`, `040000` or `160000`. */
  mode: string

  /** `blob`, `tree` or `commit`. */
  type: string

  sha: string
}

/** Options of a tag listing. */
export interface TagListOptions extends RequestOptions {
  /** Upper bound on fetched pages of 100 tags. */
  maxPages?: number
}

/** Commit fields the publisher needs. */
export interface CommitInfo {
  parents: string[]
  treeSha: string
  sha: string
}

/** Opened (or already open) pull request. */
export interface PullRequestInfo {
  number: number
  url: string
}

/**
 * Surface of the GitHub REST API used by the pipeline.
 *
 * Methods are thin wrappers around lower-level functions bound to a client
 * context (auth + rate-limit + caches). Every method takes an abort signal and
 * rejects with `GitHubApiError`, `GitHubRateLimitError` or
 * `GitHubNetworkError`.
 */
export interface GitHubClient {
  /** Create a pull request. */
  createPullRequest(
    owner: string,
    repo: string,
    pull: { title: string; body: string; head: string; base: string },
    options?: RequestOptions,
  ): Promise<PullRequestInfo>

  /** Create a commit object. */
  createCommit(
    owner: string,
    repo: string,
    commit: { parents: string[]; message: string; tree: string },
    options?: RequestOptions,
  ): Promise<string>

  /** Open pull request from `head` into `base`, or null. */
  findPullRequest(
    owner: string,
    repo: string,
    head: string,
    base: string,
    options?: RequestOptions,
  ): Promise<PullRequestInfo | null>

  /** Move a branch to `sha`; `force: false` only allows fast-forwards. */
  updateRef(
    owner: string,
    repo: string,
    reference: { force: boolean; sha: string; ref: string },
    options?: RequestOptions,
  ): Promise<void>

  /** Create a tree from `baseTree` plus `entries`; returns the tree SHA. */
  createTree(
    owner: string,
    repo: string,
    tree: { entries: TreeEntryInput[]; baseTree: string },
    options?: RequestOptions,
  ): Promise<string>

  /** Direct entries of a tree. */
  getTree(
    owner: string,
    repo: string,
    sha: string,
    options?: RequestOptions,
  ): Promise<TreeEntry[]>

  /** Add labels to an issue or pull request. */
  addLabels(
    owner: string,
    repo: string,
    issue: { labels: string[]; number: number },
    options?: RequestOptions,
  ): Promise<void>

  /** File content at `ref`, or null when the path does not exist. */
  getFileContent(
    owner: string,
    repo: string,
    file: { path: string; ref: string },
    options?: RequestOptions,
  ): Promise<string | null>

  /** Create a ref (`heads/<branch>`). */
  createRef(
    owner: string,
    repo: string,
    reference: { sha: string; ref: string },
    options?: RequestOptions,
  ): Promise<void>

  /** Resolve a tag or branch name to the commit it points to. */
  resolveCommitSha(
    owner: string,
    repo: string,
    reference: string,
    options?: RequestOptions,
  ): Promise<string>

  /** Create a UTF-8 blob; returns its SHA. */
  createBlob(
    owner: string,
    repo: string,
    content: string,
    options?: RequestOptions,
  ): Promise<string>

  /** Current SHA of a ref (`heads/<branch>`), or null when absent. */
  getRef(
    owner: string,
    repo: string,
    reference: string,
    options?: RequestOptions,
  ): Promise<string | null>

  /** Read a commit object. */
  getCommit(
    owner: string,
    repo: string,
    sha: string,
    options?: RequestOptions,
  ): Promise<CommitInfo>

  /** Repository metadata. */
  getRepository(
    owner: string,
    repo: string,
    options?: RequestOptions,
  ): Promise<{ defaultBranch: string }>

  /** List repository tags (name + commit SHA) in GitHub's order. */
  getAllTags(
    owner: string,
    repo: string,
    options?: TagListOptions,
  ): Promise<TagInfo[]>

  /** Current rate limit snapshot. */
  getRateLimitStatus(): { remaining: number; resetAt: Date }
}
