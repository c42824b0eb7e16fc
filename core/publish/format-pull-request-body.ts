import type { Update } from '../../types/update'

import { SHORT_HASH_LENGTH } from '../constants'

/**
 * Build the Markdown body of the pull request.
 *
 * @param updates - Updates in the pull request.
 * @param paths - Repository path of each update's file.
 * @returns Markdown body.
 */
export function formatPullRequestBody(
  updates: readonly Update[],
  paths: ReadonlyMap<string, string>,
): string {
  let short = (hash: string): string => hash.slice(0, SHORT_HASH_LENGTH)
  let sections = updates.map(update => {
    let { reference } = update
    let path = paths.get(update.file) ?? update.file
    let lines = [
      `* \`${reference.owner}/${reference.name}\` in \`${path}\``,
      `  * From: ${update.oldVersion} (\`${short(update.oldHash)}\`)`,
      `  * To: ${update.newVersion} (\`${short(update.newHash)}\`)`,
    ]
    if (update.originalVersion !== update.oldVersion) {
      lines.push(`  * Original version: ${update.originalVersion}`)
    }
    return lines.join('\n')
  })

  return [
    'This pull request pins the following actions to the commit of their latest release:',
    '',
    sections.join('\n\n'),
    '',
    '---',
    'Actions are pinned to full commit hashes. Each trailing comment keeps the released version and the versions it replaced.',
  ].join('\n')
}
