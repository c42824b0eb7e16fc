import { readdir, lstat } from 'node:fs/promises'
import { join } from 'node:path'

import { isYamlFile } from './is-yaml-file'

/**
 * Recursively finds all YAML files in a directory.
 *
 * Symbolic links are never followed. Entries below the root that cannot be
 * read are skipped; a failure to list the root itself is thrown.
 *
 * @param directory - The path to the directory to search.
 * @returns A promise that resolves to the sorted paths of YAML files.
 */
export async function findYamlFilesRecursive(
  directory: string,
): Promise<string[]> {
  let results: string[] = []

  async function walk(current: string): Promise<void> {
    let entries = await readdir(current)

    let promises = entries.map(async entry => {
      try {
        let fullPath = join(current, entry)

        let entryStat = await lstat(fullPath)

        if (entryStat.isSymbolicLink()) {
          return
        }

        if (entryStat.isDirectory()) {
          await walk(fullPath)
        } else if (entryStat.isFile() && isYamlFile(entry)) {
          results.push(fullPath)
        }
      } catch {
        /**
         * Skip inaccessible entries.
         */
      }
    })

    await Promise.all(promises)
  }

  await walk(directory)

  return results.sort()
}
