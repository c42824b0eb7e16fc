import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'

import { parseActionReferences } from '../../core/scanner/parse-action-references'
import { ParseError } from '../../core/errors/parse-error'

describe('parseActionReferences', () => {
  let root: string

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'parse-refs-'))
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  it('reads references from a file', async () => {
    let file = join(root, 'ci.yml')
    await writeFile(file, 'steps:\n  - uses: actions/checkout@v4\n')

    let references = await parseActionReferences(file)

    expect(references).toHaveLength(1)
    expect(references[0]).toMatchObject({ file, owner: 'actions', line: 2 })
  })

  it('raises ParseError for invalid UTF-8', async () => {
    let file = join(root, 'bad.yml')
    await writeFile(file, Buffer.from([0x75, 0xc3, 0x28]))

    let error = await parseActionReferences(file).catch(
      (caught: unknown) => caught,
    )

    expect(error).toBeInstanceOf(ParseError)
    expect(error).toHaveProperty('file', file)
  })

  it('raises ParseError for unreadable files', async () => {
    await expect(
      parseActionReferences(join(root, 'missing.yml')),
    ).rejects.toThrow(ParseError)
  })
})
