import type { GitHubClientContext } from '../../types/github-client-context'
import type { GitHubClient } from '../../types/github-client'

import {
  DEFAULT_MAX_TAG_PAGES,
  DEFAULT_GITHUB_API_URL,
  DEFAULT_TIMEOUT,
} from '../constants'
import { createPullRequest } from './create-pull-request'
import { resolveCommitSha } from './resolve-commit-sha'
import { findPullRequest } from './find-pull-request'
import { getFileContent } from './get-file-content'
import { getRepository } from './get-repository'
import { createCommit } from './create-commit'
import { getAllTags } from './get-all-tags'
import { createBlob } from './create-blob'
import { createTree } from './create-tree'
import { updateRef } from './update-ref'
import { createRef } from './create-ref'
import { addLabels } from './add-labels'
import { getCommit } from './get-commit'
import { getTree } from './get-tree'
import { getRef } from './get-ref'

/** Options for `createGitHubClient`. */
export interface GitHubClientOptions {
  /** Per-request timeout in milliseconds. */
  timeout?: number

  /** REST API base URL (GitHub Enterprise). */
  baseUrl?: string

  /** Token; requests are unauthenticated without one. */
  token?: string
}

/**
 * Create a functional GitHub API client with internal caches and rate-limit.
 *
 * @param options - Token, base URL and timeout.
 * @returns Client with bound methods.
 */
export function createGitHubClient(
  options: GitHubClientOptions = {},
): GitHubClient {
  let {
    baseUrl = DEFAULT_GITHUB_API_URL,
    timeout = DEFAULT_TIMEOUT,
    token,
  } = options

  let context: GitHubClientContext = {
    caches: {
      commits: new Map(),
      tags: new Map(),
    },
    baseUrl: baseUrl.replace(/\/+$/u, ''),
    rateLimitRemaining: token ? 5000 : 60,
    rateLimitReset: new Date(),
    timeout,
    token,
  }

  return {
    getAllTags: (owner, repo, tagOptions = {}) => {
      let { maxPages = DEFAULT_MAX_TAG_PAGES, ...requestOptions } = tagOptions
      return getAllTags(context, { maxPages, owner, repo }, requestOptions)
    },
    getRef: async (owner, repo, reference, requestOptions) =>
      (await getRef(context, { reference, owner, repo }, requestOptions))
        ?.sha ?? null,
    createPullRequest: (owner, repo, pull, requestOptions) =>
      createPullRequest(context, { ...pull, owner, repo }, requestOptions),
    findPullRequest: (owner, repo, head, base, requestOptions) =>
      findPullRequest(context, { owner, head, base, repo }, requestOptions),
    resolveCommitSha: (owner, repo, reference, requestOptions) =>
      resolveCommitSha(context, { reference, owner, repo }, requestOptions),
    getFileContent: (owner, repo, file, requestOptions) =>
      getFileContent(context, { ...file, owner, repo }, requestOptions),
    createBlob: (owner, repo, content, requestOptions) =>
      createBlob(context, { content, owner, repo }, requestOptions),
    createCommit: (owner, repo, commit, requestOptions) =>
      createCommit(context, { ...commit, owner, repo }, requestOptions),
    createTree: (owner, repo, tree, requestOptions) =>
      createTree(context, { ...tree, owner, repo }, requestOptions),
    updateRef: (owner, repo, reference, requestOptions) =>
      updateRef(context, { ...reference, owner, repo }, requestOptions),
    createRef: (owner, repo, reference, requestOptions) =>
      createRef(context, { ...reference, owner, repo }, requestOptions),
    addLabels: (owner, repo, issue, requestOptions) =>
      addLabels(context, { ...issue, owner, repo }, requestOptions),
    getTree: (owner, repo, sha, requestOptions) =>
      getTree(context, { owner, repo, sha }, requestOptions),
    getCommit: (owner, repo, sha, requestOptions) =>
      getCommit(context, { owner, repo, sha }, requestOptions),
    getRepository: (owner, repo, requestOptions) =>
      getRepository(context, { owner, repo }, requestOptions),
    getRateLimitStatus: () => ({
      remaining: context.rateLimitRemaining,
      resetAt: context.rateLimitReset,
    }),
  }
}
