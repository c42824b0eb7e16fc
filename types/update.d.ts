import type { ActionReference } from './action-reference'

/**
 * A one-shot, immutable instruction to move a pinned reference to a new
 * commit. `newHash` never equals `oldHash`.
 */
export interface Update {
  /** Superseded display versions, oldest first, ending with `oldVersion`. */
  readonly trail: readonly string[]

  /** The reference as it was scanned. */
  readonly reference: ActionReference

  /** First version ever recorded for this reference. */
  readonly originalVersion: string

  /** Display label for the new pin. Never used for resolution. */
  readonly newVersion: string

  /** Display label of the current pin. */
  readonly oldVersion: string

  /** Commit hash the current pin resolves to. */
  readonly oldHash: string

  /** New 40-hex commit hash. */
  readonly newHash: string

  /** File the update applies to. */
  readonly file: string
}
