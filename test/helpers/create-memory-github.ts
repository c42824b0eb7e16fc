import { createHash } from 'node:crypto'

import type { RequestOptions } from '../../types/request-options'
import type { GitHubClient, TreeEntry } from '../../types/github-client'
import type { TagInfo } from '../../types/tag-info'

import { GitHubApiError } from '../../core/errors/github-api-error'

type ClientMethod = Exclude<keyof GitHubClient, 'getRateLimitStatus'>

interface MemoryCommit {
  parents: string[]
  message: string
  tree: string
}

interface MemoryPull {
  labels: string[]
  number: number
  title: string
  body: string
  head: string
  base: string
}

/** In-process stand-in for the parts of GitHub the pipeline talks to. */
export interface MemoryGitHub {
  /** Errors thrown by the next calls of a method. */
  failOn: Partial<Record<ClientMethod, Error>>

  /** Tree SHA to `path -> blob SHA`. */
  trees: Map<string, Map<string, string>>

  /** `owner/repo@ref` to commit SHA for tags and branches. */
  actionRefs: Map<string, string>

  commits: Map<string, MemoryCommit>

  /** `owner/repo` to its tag listing. */
  tags: Map<string, TagInfo[]>

  /** Repository path to file mode; `100644` when absent. */
  modes: Map<string, string>

  /** Blob SHA to content. */
  blobs: Map<string, string>

  /** Ref of the published repository (`heads/main`) to commit SHA. */
  refs: Map<string, string>

  /** Method names in call order. */
  calls: ClientMethod[]

  client: GitHubClient

  pulls: MemoryPull[]
}

/**
 * Create an in-memory GitHub holding one repository whose `main` branch
 * contains `files`.
 *
 * Blobs and trees are addressed by content; commits get a fresh SHA each time.
 * Subtrees are listed under `<tree>:<directory>` SHAs.
 *
 * @param files - Repository path to content on `main`.
 * @returns Stand-in with its state exposed for assertions.
 */
export function createMemoryGitHub(
  files: Record<string, string> = {},
): MemoryGitHub {
  let counter = 0
  let github: Omit<MemoryGitHub, 'client'> = {
    actionRefs: new Map(),
    commits: new Map(),
    blobs: new Map(),
    trees: new Map(),
    modes: new Map(),
    tags: new Map(),
    refs: new Map(),
    failOn: {},
    calls: [],
    pulls: [],
  }

  function hash(kind: string, content: string): string {
    return createHash('sha1').update(`${kind}\0${content}`).digest('hex')
  }

  function putBlob(content: string): string {
    let sha = hash('blob', content)
    github.blobs.set(sha, content)
    return sha
  }

  function putTree(entries: Map<string, string>): string {
    let serialized = [...entries]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([path, sha]) => `${path}:${sha}`)
      .join('\n')
    let sha = hash('tree', serialized)
    github.trees.set(sha, new Map(entries))
    return sha
  }

  function putCommit(commit: MemoryCommit): string {
    counter++
    let sha = hash('commit', `${counter}\n${commit.tree}`)
    github.commits.set(sha, commit)
    return sha
  }

  function record(method: ClientMethod, options?: RequestOptions): void {
    options?.signal?.throwIfAborted()
    github.calls.push(method)
    let failure = github.failOn[method]
    if (failure) {
      throw failure
    }
  }

  function notFound(path: string): GitHubApiError {
    return new GitHubApiError(404, path, 'GitHub API error: 404 Not Found')
  }

  function readCommit(sha: string): MemoryCommit {
    let commit = github.commits.get(sha)
    if (!commit) {
      throw notFound(`/git/commits/${sha}`)
    }
    return commit
  }

  function isAncestor(ancestor: string, sha: string): boolean {
    let pending = [sha]
    while (pending.length > 0) {
      let current = pending.pop()
      if (current === undefined) {
        break
      }
      if (current === ancestor) {
        return true
      }
      pending.push(...(github.commits.get(current)?.parents ?? []))
    }
    return false
  }

  let initial = new Map(
    Object.entries(files).map(([path, content]) => [path, putBlob(content)]),
  )
  github.refs.set(
    'heads/main',
    putCommit({ message: 'Initial commit', tree: putTree(initial), parents: [] }),
  )

  let client: GitHubClient = {
    resolveCommitSha: async (owner, repo, reference, options) => {
      record('resolveCommitSha', options)
      let sha = github.actionRefs.get(`${owner}/${repo}@${reference}`)
      if (!sha) {
        throw notFound(`/repos/${owner}/${repo}/git/ref/tags/${reference}`)
      }
      return sha
    },

    getFileContent: async (_owner, _repo, file, options) => {
      record('getFileContent', options)
      let tree = github.trees.get(readCommit(file.ref).tree)
      let blob = tree?.get(file.path)
      return blob === undefined ? null : (github.blobs.get(blob) ?? null)
    },

    createTree: async (_owner, _repo, tree, options) => {
      record('createTree', options)
      let entries = new Map(github.trees.get(tree.baseTree))
      for (let entry of tree.entries) {
        entries.set(entry.path, entry.sha)
        github.modes.set(entry.path, entry.mode)
      }
      return putTree(entries)
    },

    getTree: async (_owner, _repo, sha, options) => {
      record('getTree', options)
      let [treeSha = '', prefix = ''] = sha.split(':')
      let tree = github.trees.get(treeSha)
      if (!tree) {
        throw notFound(`/git/trees/${sha}`)
      }
      let listing = new Map<string, TreeEntry>()
      for (let [path, blob] of tree) {
        if (prefix && !path.startsWith(`${prefix}/`)) {
          continue
        }
        let relativePath = prefix ? path.slice(prefix.length + 1) : path
        let [name = '', ...rest] = relativePath.split('/')
        listing.set(
          name,
          rest.length > 0
            ? {
                sha: `${treeSha}:${prefix ? `${prefix}/` : ''}${name}`,
                mode: '040000',
                type: 'tree',
                path: name,
              }
            : {
                mode: github.modes.get(path) ?? '100644',
                type: 'blob',
                path: name,
                sha: blob,
              },
        )
      }
      return [...listing.values()]
    },

    updateRef: async (_owner, _repo, reference, options) => {
      record('updateRef', options)
      let current = github.refs.get(reference.ref)
      if (!current) {
        throw new GitHubApiError(422, `/git/refs/${reference.ref}`)
      }
      if (!reference.force && !isAncestor(current, reference.sha)) {
        throw new GitHubApiError(
          422,
          `/git/refs/${reference.ref}`,
          'GitHub API error: 422 Update is not a fast forward',
        )
      }
      github.refs.set(reference.ref, reference.sha)
    },

    createPullRequest: async (_owner, _repo, pull, options) => {
      record('createPullRequest', options)
      let number = github.pulls.length + 1
      github.pulls.push({ ...pull, labels: [], number })
      return { url: `https://github.test/pull/${number}`, number }
    },

    findPullRequest: async (_owner, _repo, head, base, options) => {
      record('findPullRequest', options)
      let pull = github.pulls.find(
        item => item.head === head && item.base === base,
      )
      return pull
        ? { url: `https://github.test/pull/${pull.number}`, number: pull.number }
        : null
    },

    createRef: async (_owner, _repo, reference, options) => {
      record('createRef', options)
      if (github.refs.has(reference.ref)) {
        throw new GitHubApiError(
          422,
          '/git/refs',
          'GitHub API error: 422 Reference already exists',
        )
      }
      github.refs.set(reference.ref, reference.sha)
    },

    addLabels: async (_owner, _repo, issue, options) => {
      record('addLabels', options)
      let pull = github.pulls.find(item => item.number === issue.number)
      pull?.labels.push(...issue.labels)
    },

    getAllTags: async (owner, repo, options) => {
      record('getAllTags', options)
      let tags = github.tags.get(`${owner}/${repo}`)
      if (!tags) {
        throw notFound(`/repos/${owner}/${repo}/tags`)
      }
      return tags
    },

    createCommit: async (_owner, _repo, commit, options) => {
      record('createCommit', options)
      return putCommit({ ...commit })
    },

    getCommit: async (_owner, _repo, sha, options) => {
      record('getCommit', options)
      let commit = readCommit(sha)
      return { parents: commit.parents, treeSha: commit.tree, sha }
    },

    createBlob: async (_owner, _repo, content, options) => {
      record('createBlob', options)
      return putBlob(content)
    },

    getRef: async (_owner, _repo, reference, options) => {
      record('getRef', options)
      return github.refs.get(reference) ?? null
    },

    getRepository: async (_owner, _repo, options) => {
      record('getRepository', options)
      return { defaultBranch: 'main' }
    },

    getRateLimitStatus: () => ({ resetAt: new Date(0), remaining: 5000 }),
  }

  return { ...github, client }
}

/**
 * Read a file from the tree of a commit.
 *
 * @param github - Stand-in.
 * @param sha - Commit SHA.
 * @param path - Repository path.
 * @returns Content, or undefined when absent.
 */
export function readCommittedFile(
  github: MemoryGitHub,
  sha: string,
  path: string,
): string | undefined {
  let commit = github.commits.get(sha)
  let blob = commit ? github.trees.get(commit.tree)?.get(path) : undefined
  return blob === undefined ? undefined : github.blobs.get(blob)
}
