import { describe, expect, it } from 'vitest'

import { isSha } from '../../core/versions/is-sha'

describe('isSha', () => {
  it('accepts 40 hex characters in any case', () => {
    expect(isSha('8f152de45cc393bb48ce5d89d36b731f54556e65')).toBeTruthy()
    expect(isSha('8F152DE45CC393BB48CE5D89D36B731F54556E65')).toBeTruthy()
  })

  it('rejects abbreviated hashes and tags', () => {
    expect(isSha('8f152de')).toBeFalsy()
    expect(isSha('v4')).toBeFalsy()
    expect(isSha(`${'a'.repeat(40)}0`)).toBeFalsy()
  })

  it('rejects missing values', () => {
    expect(isSha(null)).toBeFalsy()
    expect(isSha(undefined)).toBeFalsy()
  })
})
