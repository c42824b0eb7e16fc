import type { PublishState } from '../../types/publish-state'

/** Building the pull request failed; no pull request was opened. */
export class PublishError extends Error {
  /** Last step completed before the failure. */
  public readonly failedAfter: Exclude<PublishState, 'Failed'>

  /** Always `Failed`. */
  public readonly state: Extract<PublishState, 'Failed'>

  public constructor(
    failedAfter: Exclude<PublishState, 'Failed'>,
    message: string,
    cause?: unknown,
  ) {
    let reason = cause instanceof Error ? `: ${cause.message}` : ''
    super(`${message}${reason}`, { cause })
    this.name = 'PublishError'
    this.failedAfter = failedAfter
    this.state = 'Failed'
  }
}
