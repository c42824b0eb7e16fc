/** The workflows root exists but cannot be listed. Aborts the run. */
export class DiscoveryError extends Error {
  /** Directory that could not be read. */
  public readonly root: string

  public constructor(root: string, cause: unknown) {
    let reason = cause instanceof Error ? cause.message : String(cause)
    super(`Cannot read workflows directory ${root}: ${reason}`, { cause })
    this.name = 'DiscoveryError'
    this.root = root
  }
}
