import pc from 'picocolors'

import type { PipelineResult } from '../types/pipeline-result'

/**
 * Print the totals of a run and its outcome.
 *
 * @param result - Pipeline result.
 */
export function printSummary(result: PipelineResult): void {
  let pluralRules = new Intl.PluralRules('en-US', { type: 'cardinal' })
  let plural = (count: number, noun: string): string =>
    `${pc.yellow(count)} ${pluralRules.select(count) === 'one' ? noun : `${noun}s`}`

  console.info(
    `\nScanned ${plural(result.files.length, 'file')}, ` +
      `${plural(result.references.length, 'reference')}, ` +
      `found ${plural(result.updates.length, 'update')}` +
      (result.errors.length > 0
        ? `, ${pc.redBright(result.errors.length)} skipped with errors`
        : ''),
  )

  if (result.apply) {
    console.info(
      pc.green(
        `✓ Updated ${result.apply.applied.length} reference(s) in ` +
          `${result.apply.files.length} file(s)`,
      ),
    )
  }

  if (result.publish?.state === 'RequestOpened') {
    let { pullRequest, reused } = result.publish
    console.info(
      pc.green(
        `✓ ${reused ? 'Updated' : 'Opened'} pull request #${pullRequest.number}: ${pullRequest.url}`,
      ),
    )
  } else if (result.publish?.state === 'Unchanged') {
    console.info(pc.gray('Nothing to publish'))
  }
}
