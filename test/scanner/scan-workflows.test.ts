import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { mkdtemp, rm, stat, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'

import { DiscoveryError } from '../../core/errors/discovery-error'
import { scanWorkflows } from '../../core/scanner/scan-workflows'

vi.mock('node:fs/promises', async importOriginal => {
  let actual = await importOriginal<typeof import('node:fs/promises')>()
  return { ...actual, stat: vi.fn(actual.stat) }
})

describe('scanWorkflows', () => {
  let root: string

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'scan-workflows-'))
  })

  afterEach(async () => {
    vi.mocked(stat).mockClear()
    await rm(root, { recursive: true, force: true })
  })

  it('lists workflow files', async () => {
    await writeFile(join(root, 'ci.yml'), '')
    await writeFile(join(root, 'notes.txt'), '')

    await expect(scanWorkflows(root)).resolves.toEqual([join(root, 'ci.yml')])
  })

  it('returns an empty list when the directory is missing', async () => {
    await expect(scanWorkflows(join(root, 'missing'))).resolves.toEqual([])
  })

  it('raises DiscoveryError when the root is a file', async () => {
    let file = join(root, 'ci.yml')
    await writeFile(file, '')

    await expect(scanWorkflows(file)).rejects.toThrow(
      `Cannot read workflows directory ${file}: not a directory`,
    )
  })

  it('raises DiscoveryError when the root cannot be read', async () => {
    vi.mocked(stat).mockRejectedValueOnce(
      Object.assign(new Error('permission denied'), { code: 'EACCES' }),
    )

    let error = await scanWorkflows(root).catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(DiscoveryError)
    expect(error).toHaveProperty('root', root)
  })
})
