import type { Update } from '../../types/update'

/** Title shared by the commit and the pull request. */
export const UPDATE_TITLE = 'Update GitHub Actions dependencies'

/**
 * Build the commit message for a batch of updates.
 *
 * @param updates - Updates in the commit.
 * @param paths - Repository path of each update's file.
 * @returns Title, blank line, one bullet per update.
 */
export function formatCommitMessage(
  updates: readonly Update[],
  paths: ReadonlyMap<string, string>,
): string {
  let lines = updates.map(update => {
    let { reference } = update
    let path = paths.get(update.file) ?? update.file
    return `* ${reference.owner}/${reference.name} ${update.oldVersion} -> ${update.newVersion} in ${path}`
  })
  return `${UPDATE_TITLE}\n\n${lines.join('\n')}\n`
}
