import { beforeEach, describe, expect, it, vi } from 'vitest'

import type { MemoryGitHub } from '../helpers/create-memory-github'

import {
  createVersionChecker,
  getDisplayVersion,
} from '../../core/version-checker/create-version-checker'
import { createMemoryGitHub } from '../helpers/create-memory-github'
import { GitHubApiError } from '../../core/errors/github-api-error'
import { ResolutionError } from '../../core/errors/resolution-error'
import { createReference } from '../helpers/create-reference'

let oldSha = '1'.repeat(40)
let newSha = '2'.repeat(40)
let rcSha = '3'.repeat(40)

describe('createVersionChecker', () => {
  let github: MemoryGitHub

  beforeEach(() => {
    github = createMemoryGitHub()
    github.actionRefs.set('actions/checkout@v3', oldSha)
    github.actionRefs.set('actions/checkout@v4', newSha)
    github.tags.set('actions/checkout', [
      { tag: 'v5.0.0-rc.1', sha: rcSha },
      { tag: 'v4.1.0', sha: newSha },
      { tag: 'v4', sha: newSha },
      { tag: 'v3', sha: oldSha },
    ])
  })

  it('reports an update to the latest stable tag', async () => {
    let checker = createVersionChecker({
      client: github.client,
      stableOnly: true,
    })

    let result = await checker.isUpdateAvailable(
      createReference('- uses: actions/checkout@v3'),
    )

    expect(result).toEqual({
      latestVersion: 'v4.1.0',
      currentHash: oldSha,
      latestHash: newSha,
      available: true,
    })
  })

  it('includes pre-releases unless stable only', async () => {
    let checker = createVersionChecker({ client: github.client })

    let latest = await checker.getLatestVersion(
      createReference('- uses: actions/checkout@v3'),
    )

    expect(latest).toEqual({ version: 'v5.0.0-rc.1', hash: rcSha })
  })

  it('does not report a tag pointing at the same commit', async () => {
    let checker = createVersionChecker({
      client: github.client,
      stableOnly: true,
    })

    let result = await checker.isUpdateAvailable(
      createReference('- uses: actions/checkout@v4'),
    )

    expect(result.available).toBeFalsy()
    expect(result.currentHash).toBe(result.latestHash)
  })

  it('never reports a downgrade', async () => {
    let checker = createVersionChecker({
      client: github.client,
      stableOnly: true,
    })
    let pinned = '9'.repeat(40)

    let result = await checker.isUpdateAvailable(
      createReference(`- uses: actions/checkout@${pinned} # v5.0.0`),
    )

    expect(result).toEqual({
      latestVersion: 'v4.1.0',
      latestHash: newSha,
      currentHash: pinned,
      available: false,
    })
  })

  it('uses a pinned hash without a lookup', async () => {
    let checker = createVersionChecker({ client: github.client })
    let reference = createReference(`- uses: actions/checkout@${'A'.repeat(40)}`)

    let hash = await checker.getCommitHash(reference, reference.version)

    expect(hash).toBe('a'.repeat(40))
    expect(github.calls).toEqual([])
  })

  it('wraps failed lookups in ResolutionError', async () => {
    let checker = createVersionChecker({ client: github.client })
    let reference = createReference('- uses: actions/checkout@v9')

    let error = await checker
      .getCommitHash(reference, 'v9')
      .catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(ResolutionError)
    expect(error).toHaveProperty(
      'message',
      'actions/checkout@v9: cannot resolve v9',
    )
    expect(error).toHaveProperty('cause.status', 404)
  })

  it('fails when a repository has no semver tags', async () => {
    github.tags.set('octo/tool', [{ tag: 'latest', sha: newSha }])
    let checker = createVersionChecker({ client: github.client })

    await expect(
      checker.getLatestVersion(createReference('- uses: octo/tool@main')),
    ).rejects.toThrow('octo/tool@main: no semver tags in octo/tool')
  })

  it('fails when tags cannot be listed', async () => {
    let checker = createVersionChecker({ client: github.client })

    let error = await checker
      .getLatestVersion(createReference('- uses: octo/missing@v1'))
      .catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(ResolutionError)
    expect(error).toHaveProperty('cause', expect.any(GitHubApiError))
  })

  it('passes the tag page limit to the client', async () => {
    let getAllTags = vi.spyOn(github.client, 'getAllTags')
    let checker = createVersionChecker({
      client: github.client,
      maxTagPages: 2,
    })

    await checker.getLatestVersion(
      createReference('- uses: actions/checkout@v3'),
    )

    expect(getAllTags).toHaveBeenCalledWith('actions', 'checkout', {
      maxPages: 2,
    })
  })
})

describe('getDisplayVersion', () => {
  it('returns the ref of a tag pin', () => {
    expect(getDisplayVersion(createReference('- uses: a/b@v2'))).toBe('v2')
  })

  it('returns the annotated version of a hash pin', () => {
    let reference = createReference(`- uses: a/b@${oldSha} # v2 | trail: v1`)

    expect(getDisplayVersion(reference)).toBe('v2')
  })

  it('returns null for a bare hash pin', () => {
    expect(getDisplayVersion(createReference(`- uses: a/b@${oldSha}`))).toBe(
      null,
    )
  })
})
