import { describe, expect, it } from 'vitest'

import {
  verifyYamlIntegrity,
  isValidYaml,
} from '../../core/update/verify-yaml-integrity'

describe('isValidYaml', () => {
  it('accepts well-formed documents', () => {
    expect(isValidYaml('a: 1\n---\nb: [1, 2]\n')).toBeTruthy()
  })

  it('rejects broken documents', () => {
    expect(isValidYaml('a: [1, 2\n')).toBeFalsy()
  })
})

describe('verifyYamlIntegrity', () => {
  it('fails when an edit breaks a valid file', () => {
    expect(verifyYamlIntegrity('a: [1]\n', 'a: [1\n')).toBeFalsy()
  })

  it('passes when the file was already broken', () => {
    expect(verifyYamlIntegrity('a: [1\n', 'a: [2\n')).toBeTruthy()
  })

  it('passes a valid edit', () => {
    expect(verifyYamlIntegrity('a: 1\n', 'a: 2 # two\n')).toBeTruthy()
  })
})
