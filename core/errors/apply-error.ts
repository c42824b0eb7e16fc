import type { Update } from '../../types/update'

/** Why a local edit could not be made. */
export type ApplyErrorCode =
  | 'not-regular-file'
  | 'outside-root'
  | 'invalid-yaml'
  | 'missing-file'
  | 'write-failed'
  | 'stale-span'
  | 'cancelled'

/** A single update could not be applied. */
export class ApplyError extends Error {
  /** Failure category. */
  public readonly code: ApplyErrorCode

  /** Update that was not applied. */
  public readonly update: Update

  public constructor(
    update: Update,
    code: ApplyErrorCode,
    message: string,
    cause?: unknown,
  ) {
    let { line, column } = update.reference
    super(`${update.file}:${line}:${column}: ${message}`, { cause })
    this.name = 'ApplyError'
    this.update = update
    this.code = code
  }
}
