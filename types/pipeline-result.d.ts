import type { PublishResult } from './change-request-publisher'
import type { ActionReference } from './action-reference'
import type { ApplyResult } from './update-manager'
import type { RunMode } from './run-mode'
import type { Update } from './update'

/** Summary of one pipeline run. */
export interface PipelineResult {
  /** Error that failed the run, or null. */
  fatal: Error | null

  /** Per-item errors that were logged and skipped. */
  errors: Error[]

  /** Every reference that was checked. */
  references: ActionReference[]

  /** Outcome of the `publish` mode. */
  publish?: PublishResult

  /** Outcome of the `stage` mode. */
  apply?: ApplyResult

  /** Updates built in this run. */
  updates: Update[]

  /** Workflow files that were discovered. */
  files: string[]

  mode: RunMode
}
