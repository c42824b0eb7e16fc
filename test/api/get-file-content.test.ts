import { beforeEach, describe, expect, it, vi } from 'vitest'

import { createContext, jsonResponse } from '../helpers/create-context'
import { getFileContent } from '../../core/api/get-file-content'

let parameters = {
  path: '.github/workflows/ci.yml',
  owner: 'o',
  ref: 'abc',
  repo: 'r',
}

describe('getFileContent', () => {
  beforeEach(() => vi.restoreAllMocks())

  it('decodes base64 content', async () => {
    let encoded = Buffer.from('name: CI\n', 'utf8').toString('base64')
    let spy = vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      jsonResponse({
        content: `${encoded.slice(0, 4)}\n${encoded.slice(4)}`,
        encoding: 'base64',
        type: 'file',
        sha: 'blob',
      }),
    )

    await expect(getFileContent(createContext(), parameters)).resolves.toBe(
      'name: CI\n',
    )
    expect(spy.mock.calls[0]?.[0]).toBe(
      'https://api.github.com/repos/o/r/contents/.github/workflows/ci.yml?ref=abc',
    )
  })

  it('reads large files through the blob endpoint', async () => {
    vi.spyOn(globalThis, 'fetch')
      .mockResolvedValueOnce(
        jsonResponse({ encoding: 'none', type: 'file', sha: 'big', content: '' }),
      )
      .mockResolvedValueOnce(
        jsonResponse({
          content: Buffer.from('on: push\n').toString('base64'),
          encoding: 'base64',
          sha: 'big',
        }),
      )

    await expect(getFileContent(createContext(), parameters)).resolves.toBe(
      'on: push\n',
    )
  })

  it('rejects content that is not valid UTF-8', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      jsonResponse({
        content: Buffer.from([0x75, 0xc3, 0x28]).toString('base64'),
        encoding: 'base64',
        type: 'file',
        sha: 'blob',
      }),
    )

    await expect(getFileContent(createContext(), parameters)).rejects.toThrow(
      TypeError,
    )
  })

  it('returns null for missing files', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      jsonResponse({ message: 'Not Found' }, 404),
    )

    await expect(
      getFileContent(createContext(), parameters),
    ).resolves.toBeNull()
  })
})
