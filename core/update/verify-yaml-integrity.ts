import { parseAllDocuments } from 'yaml'

/**
 * Check whether text parses as YAML without errors.
 *
 * @param content - File content.
 * @returns True when every document in the stream is well-formed.
 */
export function isValidYaml(content: string): boolean {
  for (let document of parseAllDocuments(content)) {
    if (document.errors.length > 0) {
      return false
    }
  }
  return true
}

/**
 * Check that an edit did not break a file that was valid YAML before it.
 *
 * @param before - Content before the edit.
 * @param after - Content after the edit.
 * @returns False only when `before` parsed and `after` does not.
 */
export function verifyYamlIntegrity(before: string, after: string): boolean {
  return isValidYaml(after) || !isValidYaml(before)
}
