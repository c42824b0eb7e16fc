import type { ApplyError } from '../core/errors/apply-error'
import type { ActionReference } from './action-reference'
import type { RequestOptions } from './request-options'
import type { Update } from './update'

/** Result of rendering a batch of updates into one file's content. */
export interface RenderResult {
  /** Updates whose span already held the new hash. */
  skipped: Update[]

  /** Updates that could not be made. */
  failures: ApplyError[]

  /** Updates written into `content`. */
  applied: Update[]

  /** Rendered content. */
  content: string
}

/** Result of applying updates to the working tree. */
export interface ApplyResult {
  /** Updates that could not be made. */
  failures: ApplyError[]

  /** Updates already present in their files. */
  skipped: Update[]

  /** Updates written to disk. */
  applied: Update[]

  /** Files that were rewritten. */
  files: string[]
}

/** Options for `applyUpdates`. */
export interface ApplyOptions extends RequestOptions {
  /** Render every file first and write nothing if any update fails. */
  atomic?: boolean
}

/** Builds updates and applies them to local files. */
export interface UpdateManager {
  /** Build an update, or null when the reference already has `newHash`. */
  createUpdate(
    file: string,
    reference: ActionReference,
    newVersion: string,
    newHash: string,
    options?: RequestOptions,
  ): Promise<Update | null>

  /** Apply updates with one exclusive read-modify-write pass per file. */
  applyUpdates(updates: Update[], options?: ApplyOptions): Promise<ApplyResult>
}
