import type { ActionReference } from '../../types/action-reference'

/** Remote lookup failed for a single reference. */
export class ResolutionError extends Error {
  /** Reference that was skipped. */
  public readonly reference: ActionReference

  public constructor(
    reference: ActionReference,
    message: string,
    cause?: unknown,
  ) {
    let { version, owner, name } = reference
    super(`${owner}/${name}@${version}: ${message}`, { cause })
    this.name = 'ResolutionError'
    this.reference = reference
  }
}
