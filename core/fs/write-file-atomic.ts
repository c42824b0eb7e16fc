import { writeFile, rename, unlink, stat } from 'node:fs/promises'
import { randomBytes } from 'node:crypto'

import { isMissingPathError } from './is-missing-path-error'

/**
 * Replace a file's content through a temporary sibling and a rename.
 *
 * The file mode of an existing target is kept.
 *
 * @param filePath - Target file.
 * @param content - New UTF-8 content.
 */
export async function writeFileAtomic(
  filePath: string,
  content: string,
): Promise<void> {
  let mode: number | undefined
  try {
    mode = (await stat(filePath)).mode
  } catch (error) {
    if (!isMissingPathError(error)) {
      throw error
    }
  }

  let temporary = `${filePath}.${randomBytes(4).toString('hex')}.tmp`
  try {
    await writeFile(temporary, content, { encoding: 'utf8', mode })
    await rename(temporary, filePath)
  } catch (error) {
    await unlink(temporary).catch(() => undefined)
    throw error
  }
}
