import type { ActionReference } from '../../types/action-reference'

import { parseActionReference } from '../parsing/parse-action-reference'
import { collectIgnoredLines } from '../ignore/collect-ignored-lines'
import { findCommentStart } from '../parsing/find-comment-start'

/** Options for reference extraction. */
export interface ExtractOptions {
  /** `owner/repo` of the scanned repository; its own references are skipped. */
  repository?: string
}

/** Position of a `uses:` value on a line. */
interface UsesValue {
  /** Index of the first character of the value, quotes excluded. */
  start: number

  /** Raw value. */
  value: string
}

/** `uses:` key at the start of a block mapping entry. */
const BLOCK_USES_PATTERN = /^\s*(?:-\s+)*(?<quote>["']?)uses\k<quote>\s*:[ \t]*/u

/** `uses:` key right after `{` or `,` of a flow mapping. */
const FLOW_USES_PATTERN = /\s*(?<quote>["']?)uses\k<quote>\s*:[ \t]*/uy

/** Header of a literal or folded block scalar. */
const BLOCK_SCALAR_PATTERN =
  /^(?<prefix>\s*(?:-\s+)*)(?<key>(?:"[^"]*"|'[^']*'|[^\s"'#][^#]*?)\s*:\s+)?[>|][1-9+-]{0,2}$/u

/** Unquoted scalar up to the first flow indicator or whitespace. */
const PLAIN_VALUE_PATTERN = /[^\s,\]}]+/uy

/**
 * Extract pinned action references from workflow text.
 *
 * Works line by line and does not require the file to be valid YAML. Block
 * scalar bodies and comment lines are skipped.
 *
 * @param content - Decoded file content.
 * @param file - Path recorded on each reference.
 * @param options - Extraction options.
 * @returns References in source order.
 */
export function extractActionReferences(
  content: string,
  file: string,
  options: ExtractOptions = {},
): ActionReference[] {
  let lines = content.split('\n')
  let ignored = collectIgnoredLines(lines)
  if (ignored.file) {
    return []
  }

  let ownRepository = options.repository?.toLowerCase()
  let references: ActionReference[] = []
  let blockScalarIndent: number | null = null

  for (let [index, rawLine] of lines.entries()) {
    let line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine
    let lineNumber = index + 1

    if (blockScalarIndent !== null) {
      if (line.trim() === '' || getIndent(line) > blockScalarIndent) {
        continue
      }
      blockScalarIndent = null
    }

    if (line.trimStart().startsWith('#')) {
      continue
    }

    let commentStart = findCommentStart(line)
    let code = commentStart === -1 ? line : line.slice(0, commentStart)
    let comment =
      commentStart === -1 ? '' : line.slice(commentStart + 1).trim()

    let header = BLOCK_SCALAR_PATTERN.exec(code.trimEnd())
    if (header?.groups) {
      let prefix = header.groups['prefix'] ?? ''
      blockScalarIndent = header.groups['key']
        ? prefix.length
        : getIndent(prefix)
    }

    if (ignored.lines.has(lineNumber)) {
      continue
    }

    for (let { start, value } of findUsesValues(code)) {
      let parsed = parseActionReference(value)
      if (!parsed) {
        continue
      }

      if (
        ownRepository &&
        `${parsed.owner}/${parsed.repo}`.toLowerCase() === ownRepository
      ) {
        continue
      }

      references.push({
        endColumn: start + value.length + 1,
        column: start + 1,
        line: lineNumber,
        ...parsed,
        comment,
        file,
      })
    }
  }

  return references
}

/**
 * Locate `uses:` values in block and flow style on one line.
 *
 * @param code - Line content without its comment.
 * @returns Values with their start index.
 */
function findUsesValues(code: string): UsesValue[] {
  let block = BLOCK_USES_PATTERN.exec(code)
  if (block) {
    let value = readValue(code, block[0].length)
    return value ? [value] : []
  }

  let values: UsesValue[] = []
  let quote: '"' | "'" | null = null
  let depth = 0

  for (let index = 0; index < code.length; index++) {
    let char = code[index]

    if (quote) {
      if (char === '\\' && quote === '"') {
        index++
      } else if (char === quote) {
        quote = null
      }
      continue
    }

    if (char === '"' || char === "'") {
      quote = char
    } else if (char === '{') {
      depth++
    } else if (char === '}') {
      depth = Math.max(0, depth - 1)
    }

    if (depth > 0 && (char === '{' || char === ',')) {
      FLOW_USES_PATTERN.lastIndex = index + 1
      let key = FLOW_USES_PATTERN.exec(code)
      if (key) {
        let value = readValue(code, index + 1 + key[0].length)
        if (value) {
          values.push(value)
        }
      }
    }
  }

  return values
}

/**
 * Read a single-quoted, double-quoted or plain scalar.
 *
 * @param code - Line content without its comment.
 * @param position - Index where the value starts.
 * @returns The value and its start, or null when none can be read.
 */
function readValue(code: string, position: number): UsesValue | null {
  let opening = code[position]

  if (opening === '"' || opening === "'") {
    let closing = code.indexOf(opening, position + 1)
    if (closing === -1) {
      return null
    }
    let value = code.slice(position + 1, closing)
    return value ? { start: position + 1, value } : null
  }

  PLAIN_VALUE_PATTERN.lastIndex = position
  let match = PLAIN_VALUE_PATTERN.exec(code)
  return match ? { start: position, value: match[0] } : null
}

function getIndent(text: string): number {
  return text.length - text.trimStart().length
}
