import type { ActionReference } from '../../types/action-reference'
import type { ExtractOptions } from './extract-action-references'

import { extractActionReferences } from './extract-action-references'
import { readTextFile } from '../fs/read-text-file'
import { ParseError } from '../errors/parse-error'

/**
 * Read one workflow file and extract its action references.
 *
 * @param file - Workflow file path.
 * @param options - Extraction options.
 * @returns References in source order.
 * @throws {ParseError} When the file cannot be read or is not valid UTF-8.
 */
export async function parseActionReferences(
  file: string,
  options: ExtractOptions = {},
): Promise<ActionReference[]> {
  let content: string
  try {
    content = await readTextFile(file)
  } catch (error) {
    throw new ParseError(file, error)
  }

  return extractActionReferences(content, file, options)
}
