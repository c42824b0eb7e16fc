import type { RenderResult } from '../../types/update-manager'
import type { Update } from '../../types/update'

import { findCommentStart } from '../parsing/find-comment-start'
import { formatAnnotation } from '../parsing/format-annotation'
import { parseAnnotation } from '../parsing/parse-annotation'
import { ApplyError } from '../errors/apply-error'

/** Text after a token that still allows the comment to be rewritten. */
const CLOSING_PUNCTUATION = /^[\s"'\]},]*$/u

/** Character that would continue a reference token. */
const TOKEN_CHARACTER = /[\w./@-]/u

/**
 * Apply updates to file content.
 *
 * Edits are made rightmost span first so earlier columns stay valid. Every
 * byte outside the edited spans is kept, including quotes, flow punctuation
 * and CRLF line endings.
 *
 * For each update the span must still hold `owner/name@version` as scanned; a
 * span already holding the new hash is skipped. The trailing comment is
 * rewritten with the new version and trail unless other content follows the
 * token on the line, in which case only the token changes.
 *
 * @param original - Current file content.
 * @param updates - Updates for this file.
 * @returns Rendered content with applied, skipped and failed updates.
 */
export function renderUpdatedContent(
  original: string,
  updates: readonly Update[],
): RenderResult {
  let lines = original.split('\n')
  let result: RenderResult = {
    content: original,
    failures: [],
    applied: [],
    skipped: [],
  }

  let ordered = [...updates].sort(
    (a, b) =>
      b.reference.line - a.reference.line ||
      b.reference.column - a.reference.column,
  )

  for (let update of ordered) {
    let { reference } = update
    let index = reference.line - 1
    let rawLine = lines[index]

    if (rawLine === undefined) {
      result.failures.push(
        new ApplyError(update, 'stale-span', 'line no longer exists'),
      )
      continue
    }

    let hasCarriageReturn = rawLine.endsWith('\r')
    let line = hasCarriageReturn ? rawLine.slice(0, -1) : rawLine
    let start = reference.column - 1
    let end = reference.endColumn - 1
    let prefix = `${reference.owner}/${reference.name}@`
    let newToken = `${prefix}${update.newHash}`

    if (isTokenAt(line, start, newToken)) {
      result.skipped.push(update)
      continue
    }

    let oldToken = `${prefix}${reference.version}`
    if (!isTokenAt(line, start, oldToken)) {
      let found = line.slice(start, end) || 'nothing'
      result.failures.push(
        new ApplyError(
          update,
          'stale-span',
          `expected ${oldToken} but found ${found}`,
        ),
      )
      continue
    }

    let commentStart = findCommentStart(line, end)
    let after = line.slice(end, commentStart === -1 ? undefined : commentStart)
    let head = `${line.slice(0, start)}${newToken}`

    let updated: string
    if (!CLOSING_PUNCTUATION.test(after)) {
      updated = `${head}${line.slice(end)}`
    } else {
      let comment = commentStart === -1 ? '' : line.slice(commentStart + 1)
      let annotation = formatAnnotation({
        note: parseAnnotation(comment).note,
        version: update.newVersion,
        trail: [...update.trail],
      })
      let spacer = commentStart === -1 && !/\s$/u.test(after) ? ' ' : ''
      updated = `${head}${after}${spacer}# ${annotation}`
    }

    lines[index] = hasCarriageReturn ? `${updated}\r` : updated
    result.applied.push(update)
  }

  result.content = lines.join('\n')
  return result
}

/**
 * Check that `token` starts at `start` and is not followed by more token
 * characters.
 *
 * @param line - Line without its line ending.
 * @param start - Zero-based start index.
 * @param token - Expected token.
 * @returns True when the whole token is found at `start`.
 */
function isTokenAt(line: string, start: number, token: string): boolean {
  if (!line.startsWith(token, start)) {
    return false
  }
  let next = line[start + token.length]
  return next === undefined || !TOKEN_CHARACTER.test(next)
}
