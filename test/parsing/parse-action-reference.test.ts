import { describe, expect, it } from 'vitest'

import { parseActionReference } from '../../core/parsing/parse-action-reference'

describe('parseActionReference', () => {
  it('parses external action with version tag', () => {
    expect(parseActionReference('actions/checkout@v4')).toEqual({
      owner: 'actions',
      repo: 'checkout',
      name: 'checkout',
      version: 'v4',
    })
  })

  it('parses external action with SHA hash', () => {
    let sha = '8f152de45cc393bb48ce5d89d36b731f54556e65'
    expect(parseActionReference(`actions/setup-node@${sha}`)).toEqual({
      name: 'setup-node',
      repo: 'setup-node',
      owner: 'actions',
      version: sha,
    })
  })

  it('keeps the sub-path in the name', () => {
    expect(parseActionReference('github/codeql-action/init@v3')).toEqual({
      name: 'codeql-action/init',
      repo: 'codeql-action',
      owner: 'github',
      version: 'v3',
    })
  })

  it('returns null for local actions', () => {
    expect(parseActionReference('./.github/actions/build')).toBeNull()
    expect(parseActionReference('../shared/action@v1')).toBeNull()
  })

  it('returns null for docker images', () => {
    expect(parseActionReference('docker://alpine:3.20')).toBeNull()
  })

  it('returns null for expressions', () => {
    expect(parseActionReference('${{ matrix.action }}@v1')).toBeNull()
  })

  it('returns null without an owner or a ref', () => {
    expect(parseActionReference('actions/checkout')).toBeNull()
    expect(parseActionReference('checkout@v4')).toBeNull()
    expect(parseActionReference('actions/checkout@')).toBeNull()
    expect(parseActionReference('a/b@v1@v2')).toBeNull()
    expect(parseActionReference('a//b@v1')).toBeNull()
    expect(parseActionReference('')).toBeNull()
  })
})
