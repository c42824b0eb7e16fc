/** Components of an `owner/name@version` reference. */
export interface ParsedActionReference {
  /** Ref after `@`. */
  version: string

  /** Repository owner. */
  owner: string

  /** Repository plus optional sub-path. */
  name: string

  /** Repository name. */
  repo: string
}

/**
 * Parses a `uses:` value into its components.
 *
 * @example
 *
 * ```ts
 * parseActionReference('github/codeql-action/init@v3')
 * // {
 * //   owner: 'github',
 * //   name: 'codeql-action/init',
 * //   repo: 'codeql-action',
 * //   version: 'v3',
 * // }
 * ```
 *
 * @param reference - The value of a `uses:` key.
 * @returns Components, or null for local paths, docker images, expressions and
 *   anything without an owner or a ref.
 */
export function parseActionReference(
  reference: string,
): ParsedActionReference | null {
  if (
    !reference ||
    reference.startsWith('./') ||
    reference.startsWith('../') ||
    reference.startsWith('docker://') ||
    reference.includes('${{') ||
    /\s/u.test(reference)
  ) {
    return null
  }

  let parts = reference.split('@')
  if (parts.length !== 2) {
    return null
  }

  let [name, version] = parts
  if (!name || !version) {
    return null
  }

  let segments = name.split('/')
  if (segments.length < 2 || segments.some(segment => !segment)) {
    return null
  }

  let [owner, repo, ...path] = segments
  if (!owner || !repo) {
    return null
  }

  return {
    name: [repo, ...path].join('/'),
    version,
    owner,
    repo,
  }
}
