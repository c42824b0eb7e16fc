/**
 * A `uses: owner/name@version` pin found in a workflow file.
 *
 * The span `line:column..endColumn` covers exactly the `owner/name@version`
 * token, without surrounding quotes.
 */
export interface ActionReference {
  /** Trailing comment text without the leading `#`, or an empty string. */
  comment: string

  /** 1-based column one past the last character of the version. */
  endColumn: number

  /** Pinned ref as written: tag, branch or 40-hex commit hash. */
  version: string

  /** 1-based column of the first character of the owner. */
  column: number

  /** Repository owner. */
  owner: string

  /** Path of the workflow file. */
  file: string

  /** Everything between `owner/` and `@` (repository plus optional path). */
  name: string

  /** Repository name, the first segment of `name`. */
  repo: string

  /** 1-based line number of the token. */
  line: number
}
