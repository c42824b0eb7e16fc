import { describe, expect, it } from 'vitest'

import { collectIgnoredLines } from '../../core/ignore/collect-ignored-lines'

describe('collectIgnoredLines', () => {
  it('ignores the whole file', () => {
    let result = collectIgnoredLines([
      'name: CI',
      '# actions-pinner-ignore-file',
      'jobs: {}',
    ])

    expect(result.file).toBeTruthy()
  })

  it('ignores the next line only', () => {
    let result = collectIgnoredLines([
      '# actions-pinner-ignore-next-line',
      '- uses: a/b@v1',
      '- uses: c/d@v1',
    ])

    expect([...result.lines]).toEqual([2])
  })

  it('ignores blocks including their markers', () => {
    let result = collectIgnoredLines([
      '- uses: a/b@v1',
      '# actions-pinner-ignore-start',
      '- uses: c/d@v1',
      '# actions-pinner-ignore-end',
      '- uses: e/f@v1',
    ])

    expect([...result.lines]).toEqual([2, 3, 4])
    expect(result.file).toBeFalsy()
  })

  it('ignores lines with an inline directive', () => {
    let result = collectIgnoredLines([
      '- uses: a/b@v1 # actions-pinner-ignore',
      '- uses: c/d@v1',
    ])

    expect([...result.lines]).toEqual([1])
  })
})
