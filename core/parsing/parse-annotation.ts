import type { Annotation } from '../../types/annotation'

/** Separates annotation sections. */
export const ANNOTATION_SEPARATOR = ' | '

/** Introduces the version trail. */
export const TRAIL_PREFIX = 'trail: '

/** Separates trail entries. */
export const TRAIL_SEPARATOR = ' -> '

/**
 * Parse the comment that follows a pinned reference.
 *
 * Grammar: `version [" | trail: " entry {" -> " entry}] [" | " note]`. A
 * comment whose first word does not look like a version is kept whole as the
 * note. A single word such as a branch name counts as a version; in longer
 * comments only numeric versions and hashes do.
 *
 * @example
 *
 * ```ts
 * parseAnnotation('v5 | trail: v2 -> v4 | keep in sync with docs')
 * // { version: 'v5', trail: ['v2', 'v4'], note: 'keep in sync with docs' }
 * ```
 *
 * @param comment - Comment text without the leading `#`.
 * @returns Parsed annotation.
 */
export function parseAnnotation(comment: string): Annotation {
  let text = comment.trim()
  let sections = text.split(ANNOTATION_SEPARATOR)
  let head = sections[0]?.trim() ?? ''
  let [first = ''] = head.split(/\s+/u)

  let isVersion =
    head === first ? isVersionWord(first) : isNumericVersion(first)
  if (!text || !isVersion) {
    return { version: null, note: text, trail: [] }
  }

  let notes: string[] = []
  let headRest = head.slice(first.length).trim()
  if (headRest) {
    notes.push(headRest)
  }

  let trail: string[] | null = null
  for (let section of sections.slice(1)) {
    let trimmed = section.trim()
    if (trail === null && trimmed.startsWith(TRAIL_PREFIX)) {
      trail = trimmed
        .slice(TRAIL_PREFIX.length)
        .split(TRAIL_SEPARATOR)
        .map(entry => entry.trim())
        .filter(Boolean)
    } else if (trimmed) {
      notes.push(trimmed)
    }
  }

  return {
    note: notes.join(ANNOTATION_SEPARATOR),
    trail: trail ?? [],
    version: first,
  }
}

function isVersionWord(word: string): boolean {
  return /^[\w][\w.+/-]*$/u.test(word)
}

function isNumericVersion(word: string): boolean {
  return (
    /^v?\d+(?:\.\d+){0,2}(?:[-+][\w.-]+)?$/u.test(word) ||
    /^[\da-f]{7,40}$/iu.test(word)
  )
}
