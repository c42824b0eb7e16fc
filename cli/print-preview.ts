import pc from 'picocolors'

import type { Update } from '../types/update'

import { getUpdateLevel } from '../core/versions/get-update-level'
import { SHORT_HASH_LENGTH } from '../core/constants'

/**
 * Print the updates a run would make, grouped by file.
 *
 * @param updates - Updates to show.
 */
export function printPreview(updates: readonly Update[]): void {
  console.info(pc.yellow('\n📋 Dry Run - No changes will be made\n'))

  let byFile = new Map<string, Update[]>()
  for (let update of updates) {
    byFile.set(update.file, [...(byFile.get(update.file) ?? []), update])
  }

  for (let [file, fileUpdates] of byFile) {
    console.info(pc.cyan(file))
    for (let update of fileUpdates) {
      let { reference } = update
      let level = getUpdateLevel(update.oldVersion, update.newVersion)
      let newVersion =
        level === 'major'
          ? pc.redBright(update.newVersion)
          : pc.green(update.newVersion)
      console.info(
        `  ${reference.line}: ${reference.owner}/${reference.name} ` +
          `${pc.gray(update.oldVersion)} → ${newVersion} ` +
          pc.gray(`(${update.newHash.slice(0, SHORT_HASH_LENGTH)})`),
      )
    }
    console.info('')
  }
}
