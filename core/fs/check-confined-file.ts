import { isAbsolute, relative, resolve, sep } from 'node:path'
import { lstat } from 'node:fs/promises'

import { isMissingPathError } from './is-missing-path-error'

/** Why a path may not be edited. */
export interface PathViolation {
  code: 'not-regular-file' | 'outside-root'
  message: string
}

/**
 * Check that a file lies inside `rootPath` and is a regular file.
 *
 * Symbolic links are rejected whatever they point to, since replacing one
 * through a rename would turn it into a plain file. A path that does not exist
 * passes; reading it reports the missing file.
 *
 * @param file - Path to check, relative to the working directory.
 * @param rootPath - Directory every edited file must be inside.
 * @returns The violation, or null when the path may be edited.
 */
export async function checkConfinedFile(
  file: string,
  rootPath: string,
): Promise<PathViolation | null> {
  let root = resolve(rootPath)
  let absolute = resolve(file)
  let fromRoot = relative(root, absolute)

  if (
    fromRoot === '..' ||
    fromRoot.startsWith(`..${sep}`) ||
    isAbsolute(fromRoot)
  ) {
    return { message: `path is outside ${root}`, code: 'outside-root' }
  }

  try {
    let info = await lstat(absolute)
    if (!info.isFile()) {
      return { message: 'not a regular file', code: 'not-regular-file' }
    }
  } catch (error) {
    if (!isMissingPathError(error)) {
      throw error
    }
  }

  return null
}
