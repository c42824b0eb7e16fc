import { IGNORE_DIRECTIVES } from '../constants'

/** Lines excluded from scanning by comment directives. */
export interface IgnoredLines {
  /** One-based line numbers to skip. */
  lines: Set<number>

  /** True when the whole file is excluded. */
  file: boolean
}

/**
 * Collect the lines excluded by inline comment directives.
 *
 * Supported directives (lowercase, exact match):
 *
 * - `actions-pinner-ignore-file`
 * - `actions-pinner-ignore-start` … `actions-pinner-ignore-end`
 * - `actions-pinner-ignore-next-line`
 * - `actions-pinner-ignore` (inline on the same line).
 *
 * "next-line" applies strictly to the immediate next physical line. Block
 * directives behave as a simple toggle; nested blocks are not supported.
 *
 * @param lines - File content split into lines.
 * @returns Ignored line numbers and the file-level flag.
 */
export function collectIgnoredLines(lines: string[]): IgnoredLines {
  let ignored = new Set<number>()
  let inBlock = false

  for (let [index, text] of lines.entries()) {
    let current = index + 1

    if (text.includes(IGNORE_DIRECTIVES.file)) {
      return { lines: new Set(), file: true }
    }

    if (text.includes(IGNORE_DIRECTIVES.start)) {
      inBlock = true
    }

    if (inBlock) {
      ignored.add(current)
    }

    if (text.includes(IGNORE_DIRECTIVES.end)) {
      ignored.add(current)
      inBlock = false
    }

    if (text.includes(IGNORE_DIRECTIVES.nextLine)) {
      ignored.add(current + 1)
    } else if (
      text.includes(IGNORE_DIRECTIVES.inline) &&
      !text.includes(IGNORE_DIRECTIVES.start) &&
      !text.includes(IGNORE_DIRECTIVES.end)
    ) {
      ignored.add(current)
    }
  }

  return { lines: ignored, file: false }
}
