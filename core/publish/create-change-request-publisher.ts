import type { ChangeRequestPublisher } from '../../types/change-request-publisher'
import type {
  PullRequestInfo,
  TreeEntryInput,
  GitHubClient,
  TreeEntry,
} from '../../types/github-client'
import type { RequestOptions } from '../../types/request-options'
import type { PublishState } from '../../types/publish-state'
import type { Logger } from '../../types/logger'
import type { Update } from '../../types/update'

import {
  DEFAULT_WORKFLOWS_PATH,
  DEFAULT_BRANCH_PREFIX,
  DEFAULT_LABELS,
} from '../constants'
import { formatCommitMessage, UPDATE_TITLE } from './format-commit-message'
import { renderUpdatedContent } from '../update/render-updated-content'
import { formatPullRequestBody } from './format-pull-request-body'
import { generateBranchName } from './generate-branch-name'
import { GitHubApiError } from '../errors/github-api-error'
import { toRepositoryPath } from './to-repository-path'
import { PublishError } from '../errors/publish-error'

const SYMLINK_MODE = '120000'

/** Options for `createChangeRequestPublisher`. */
export interface ChangeRequestPublisherOptions {
  /** Repository-relative workflows directory. */
  workflowsPath?: string

  /** Prefix of generated branch names. */
  branchPrefix?: string

  /** Local repository root that workflow paths are relative to. */
  rootPath?: string

  /** GitHub API client. */
  client: GitHubClient

  /** Labels added to the pull request. */
  labels?: string[]

  /** Defaults to `console`. */
  logger?: Logger

  /** Repository owner. */
  owner: string

  /** Repository name. */
  repo: string
}

/**
 * Create a publisher that commits updates through the git data API and opens
 * a pull request for them.
 *
 * Steps run in order: resolve the default branch head, render every touched
 * file against its remote content and upload changed blobs, create one tree
 * and one commit on top of the head, point the branch at it, then open (or
 * reuse) the pull request. A failure at any step moves to `Failed` and throws
 * `PublishError` naming the last step completed; nothing after it runs.
 *
 * @param options - Client, repository and presentation options.
 * @returns Publisher.
 */
export function createChangeRequestPublisher(
  options: ChangeRequestPublisherOptions,
): ChangeRequestPublisher {
  let {
    branchPrefix = DEFAULT_BRANCH_PREFIX,
    rootPath = process.cwd(),
    labels = DEFAULT_LABELS,
    logger = console,
    client,
    owner,
    repo,
  } = options
  let workflowsPath = options.workflowsPath ?? DEFAULT_WORKFLOWS_PATH
  let generatedBranch: string | null = null

  return {
    createPR: async (updates, publishOptions = {}) => {
      let { signal } = publishOptions
      let requestOptions: RequestOptions = { signal }
      let branch =
        publishOptions.branch ??
        (generatedBranch ??= generateBranchName(branchPrefix))
      let state: Exclude<PublishState, 'Failed'> = 'Idle'

      async function step<T>(
        next: Exclude<PublishState, 'Failed'>,
        description: string,
        task: () => Promise<T>,
      ): Promise<T> {
        try {
          let value = await task()
          state = next
          return value
        } catch (error) {
          if (error instanceof PublishError) {
            throw error
          }
          throw new PublishError(state, `Cannot ${description}`, error)
        }
      }

      let paths = new Map<string, string>()
      let groups = new Map<string, Update[]>()
      for (let update of updates) {
        let path = toRepositoryPath(update.file, { workflowsPath, rootPath })
        paths.set(update.file, path)
        groups.set(path, [...(groups.get(path) ?? []), update])
      }

      let base = await step('BaseResolved', 'resolve base branch', async () => {
        let { defaultBranch } = await client.getRepository(
          owner,
          repo,
          requestOptions,
        )
        let sha = await client.getRef(
          owner,
          repo,
          `heads/${defaultBranch}`,
          requestOptions,
        )
        if (!sha) {
          throw new Error(`branch ${defaultBranch} not found`)
        }
        let commit = await client.getCommit(owner, repo, sha, requestOptions)
        return { branch: defaultBranch, tree: commit.treeSha, sha }
      })

      let entries = await step('BlobsCreated', 'create blobs', async () => {
        let trees = new Map<string, Promise<TreeEntry[]>>()
        let created = await Promise.all(
          [...groups].map(
            async ([path, fileUpdates]): Promise<TreeEntryInput | null> => {
              let content = await client.getFileContent(
                owner,
                repo,
                { ref: base.sha, path },
                requestOptions,
              )
              if (content === null) {
                throw new Error(`${path} does not exist on ${base.branch}`)
              }

              let render = renderUpdatedContent(content, fileUpdates)
              if (render.failures.length > 0) {
                throw new AggregateError(
                  render.failures,
                  `${render.failures.length} update(s) do not apply to ${path}`,
                )
              }
              if (render.content === content) {
                return null
              }

              let mode = await findFileMode(
                { tree: base.tree, trees, path },
                requestOptions,
              )
              let sha = await client.createBlob(
                owner,
                repo,
                render.content,
                requestOptions,
              )
              return { mode, path, sha }
            },
          ),
        )
        return created.filter(
          (entry): entry is TreeEntryInput => entry !== null,
        )
      })

      if (entries.length === 0) {
        logger.info(`Every file on ${base.branch} is already up to date`)
        return { state: 'Unchanged' }
      }

      let tree = await step('TreeCreated', 'create tree', () =>
        client.createTree(
          owner,
          repo,
          { baseTree: base.tree, entries },
          requestOptions,
        ),
      )

      let commit = await step('CommitCreated', 'create commit', () =>
        client.createCommit(
          owner,
          repo,
          {
            message: formatCommitMessage(updates, paths),
            parents: [base.sha],
            tree,
          },
          requestOptions,
        ),
      )

      let head = await step('RefUpdated', `update branch ${branch}`, () =>
        pointBranch(
          { baseSha: base.sha, commit, branch, tree },
          requestOptions,
        ),
      )

      let pullRequest = await step(
        'RequestOpened',
        'open pull request',
        async () => {
          let existing = await client.findPullRequest(
            owner,
            repo,
            branch,
            base.branch,
            requestOptions,
          )
          if (existing) {
            return { ...existing, reused: true }
          }
          let created = await client.createPullRequest(
            owner,
            repo,
            {
              body: formatPullRequestBody(updates, paths),
              title: UPDATE_TITLE,
              base: base.branch,
              head: branch,
            },
            requestOptions,
          )
          await addLabels(created, requestOptions)
          return { ...created, reused: false }
        },
      )

      return {
        pullRequest: { number: pullRequest.number, url: pullRequest.url },
        reused: head.reused || pullRequest.reused,
        state: 'RequestOpened',
        commit: head.sha,
        branch,
      }
    },

    setWorkflowsPath: path => {
      workflowsPath = path
    },
  }

  /**
   * Create the branch, or move an existing one forward.
   *
   * @param target - Branch, new commit and the tree and base it was built
   *   from.
   * @param requestOptions - Abort signal.
   * @returns Commit the branch points to and whether it was already there.
   */
  async function pointBranch(
    target: { baseSha: string; commit: string; branch: string; tree: string },
    requestOptions: RequestOptions,
  ): Promise<{ reused: boolean; sha: string }> {
    let ref = `heads/${target.branch}`
    try {
      await client.createRef(
        owner,
        repo,
        { sha: target.commit, ref },
        requestOptions,
      )
      return { sha: target.commit, reused: false }
    } catch (error) {
      if (!isUnprocessable(error)) {
        throw error
      }
    }

    try {
      await client.updateRef(
        owner,
        repo,
        { sha: target.commit, force: false, ref },
        requestOptions,
      )
      return { sha: target.commit, reused: false }
    } catch (error) {
      if (!isUnprocessable(error)) {
        throw error
      }

      let current = await client.getRef(owner, repo, ref, requestOptions)
      let existing = current
        ? await client.getCommit(owner, repo, current, requestOptions)
        : null
      if (
        existing?.treeSha === target.tree &&
        existing.parents.includes(target.baseSha)
      ) {
        logger.info(`Branch ${target.branch} already holds these changes`)
        return { sha: existing.sha, reused: true }
      }
      throw error
    }
  }

  /**
   * Find the mode of a file by walking the base tree one directory at a time.
   *
   * @param target - Root tree, repository path and the listings read so far.
   * @param requestOptions - Abort signal.
   * @returns Mode of the file entry.
   */
  async function findFileMode(
    target: {
      trees: Map<string, Promise<TreeEntry[]>>
      tree: string
      path: string
    },
    requestOptions: RequestOptions,
  ): Promise<string> {
    let segments = target.path.split('/')
    let current = target.tree

    for (let [index, segment] of segments.entries()) {
      let listing = target.trees.get(current)
      if (!listing) {
        listing = client.getTree(owner, repo, current, requestOptions)
        target.trees.set(current, listing)
      }
      let entry = (await listing).find(item => item.path === segment)
      if (!entry) {
        break
      }
      if (index < segments.length - 1) {
        current = entry.sha
        continue
      }
      if (entry.type !== 'blob' || entry.mode === SYMLINK_MODE) {
        throw new Error(`${target.path} is not a regular file`)
      }
      return entry.mode
    }

    throw new Error(`${target.path} is missing from the base tree`)
  }

  /**
   * Add labels without failing the run.
   *
   * @param pullRequest - Newly opened pull request.
   * @param requestOptions - Abort signal.
   */
  async function addLabels(
    pullRequest: PullRequestInfo,
    requestOptions: RequestOptions,
  ): Promise<void> {
    if (labels.length === 0) {
      return
    }
    try {
      await client.addLabels(
        owner,
        repo,
        { number: pullRequest.number, labels },
        requestOptions,
      )
    } catch (error) {
      logger.warn(`Cannot label pull request #${pullRequest.number}`, error)
    }
  }
}

function isUnprocessable(error: unknown): boolean {
  return error instanceof GitHubApiError && error.status === 422
}
