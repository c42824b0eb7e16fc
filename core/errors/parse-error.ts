/** A workflow file could not be read or is not valid UTF-8 text. */
export class ParseError extends Error {
  /** File that was skipped. */
  public readonly file: string

  public constructor(file: string, cause: unknown) {
    let reason = cause instanceof Error ? cause.message : String(cause)
    super(`Cannot parse ${file}: ${reason}`, { cause })
    this.name = 'ParseError'
    this.file = file
  }
}
