/** Parsed form of the trailing comment written after a pinned hash. */
export interface Annotation {
  /** Display version, or null when the comment carries none. */
  version: string | null

  /** Superseded versions, oldest first. */
  trail: string[]

  /** Free text that is not part of the annotation. */
  note: string
}
