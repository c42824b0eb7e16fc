import { describe, expect, it } from 'vitest'

import { formatAnnotation } from '../../core/parsing/format-annotation'
import { parseAnnotation } from '../../core/parsing/parse-annotation'

describe('formatAnnotation', () => {
  it('renders version only', () => {
    expect(formatAnnotation({ version: 'v5', trail: [], note: '' })).toBe('v5')
  })

  it('renders trail and note', () => {
    expect(
      formatAnnotation({ trail: ['v2', 'v4'], note: 'docs', version: 'v5' }),
    ).toBe('v5 | trail: v2 -> v4 | docs')
  })

  it('is read back by parseAnnotation', () => {
    let annotation = { trail: ['v1'], note: 'pinned', version: 'v2.1.0' }

    expect(parseAnnotation(formatAnnotation(annotation))).toEqual(annotation)
  })
})
