import { beforeEach, describe, expect, it, vi } from 'vitest'

import { createContext, jsonResponse } from '../helpers/create-context'
import { resolveCommitSha } from '../../core/api/resolve-commit-sha'

let commitSha = 'A'.repeat(40)
let tagObjectSha = 'b'.repeat(40)

/**
 * Route fetch calls by URL suffix.
 *
 * @param routes - Map of URL suffix to response body; missing routes 404.
 * @returns Fetch spy.
 */
function route(routes: Record<string, unknown>) {
  return vi.spyOn(globalThis, 'fetch').mockImplementation(input => {
    let url = String(input)
    for (let [suffix, body] of Object.entries(routes)) {
      if (url.endsWith(suffix)) {
        return Promise.resolve(jsonResponse(body))
      }
    }
    return Promise.resolve(jsonResponse({ message: 'Not Found' }, 404))
  })
}

describe('resolveCommitSha', () => {
  beforeEach(() => vi.restoreAllMocks())

  it('resolves a lightweight tag', async () => {
    route({
      '/repos/o/r/git/ref/tags/v1': {
        object: { type: 'commit', sha: commitSha },
      },
    })

    await expect(
      resolveCommitSha(createContext(), { reference: 'v1', owner: 'o', repo: 'r' }),
    ).resolves.toBe('a'.repeat(40))
  })

  it('dereferences annotated tags', async () => {
    route({
      [`/repos/o/r/git/tags/${tagObjectSha}`]: {
        object: { type: 'commit', sha: commitSha },
      },
      '/repos/o/r/git/ref/tags/v2': {
        object: { sha: tagObjectSha, type: 'tag' },
      },
    })

    await expect(
      resolveCommitSha(createContext(), { reference: 'v2', owner: 'o', repo: 'r' }),
    ).resolves.toBe('a'.repeat(40))
  })

  it('falls back to branches', async () => {
    let spy = route({
      '/repos/o/r/git/ref/heads/main': {
        object: { type: 'commit', sha: commitSha },
      },
    })

    await expect(
      resolveCommitSha(createContext(), {
        reference: 'main',
        owner: 'o',
        repo: 'r',
      }),
    ).resolves.toBe('a'.repeat(40))
    expect(spy).toHaveBeenCalledTimes(2)
  })

  it('rejects with 404 when neither a tag nor a branch exists', async () => {
    route({})

    await expect(
      resolveCommitSha(createContext(), {
        reference: 'missing',
        owner: 'o',
        repo: 'r',
      }),
    ).rejects.toHaveProperty('status', 404)
  })

  it('caches resolved commits', async () => {
    let spy = route({
      '/repos/o/r/git/ref/tags/v1': {
        object: { type: 'commit', sha: commitSha },
      },
    })
    let context = createContext()
    let parameters = { reference: 'v1', owner: 'o', repo: 'r' }

    await resolveCommitSha(context, parameters)
    await resolveCommitSha(context, parameters)

    expect(spy).toHaveBeenCalledOnce()
  })
})
