import type { ActionReference } from '../../types/action-reference'
import type { Logger } from '../../types/logger'

/**
 * Parse --exclude patterns into regular expressions.
 *
 * Supports two forms:
 *
 * - Raw regex literal with optional flags: `/pattern/i`
 * - Plain pattern string compiled as case-insensitive regex: `pattern`.
 *
 * Invalid patterns are skipped with a warning.
 *
 * @param patterns - Pattern strings as given on the command line.
 * @param logger - Receives warnings about invalid patterns.
 * @returns Array of RegExp objects.
 */
export function parseExcludePatterns(
  patterns: string[],
  logger: Logger = console,
): RegExp[] {
  let result: RegExp[] = []

  for (let original of patterns) {
    let input = original.trim()
    if (!input) {
      continue
    }

    let body = input
    let flags = 'i'
    let lastSlash = input.lastIndexOf('/')
    if (input.startsWith('/') && lastSlash > 0) {
      body = input.slice(1, lastSlash)
      flags = input.slice(lastSlash + 1) || 'i'
    }

    try {
      result.push(new RegExp(body, flags))
    } catch (error) {
      logger.warn(`Invalid regex exclude: ${original}`, error)
    }
  }

  return result
}

/**
 * Build a predicate that keeps references not matched by any pattern.
 *
 * Patterns are tested against `owner/name`.
 *
 * @param patterns - Compiled exclude patterns.
 * @returns Predicate for `Array.prototype.filter`.
 */
export function createExcludeFilter(
  patterns: RegExp[],
): (reference: ActionReference) => boolean {
  return reference => {
    let name = `${reference.owner}/${reference.name}`
    return !patterns.some(pattern => {
      pattern.lastIndex = 0
      return pattern.test(name)
    })
  }
}
