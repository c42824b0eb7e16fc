/** Tag name together with the commit it points to. */
export interface TagInfo {
  /** Commit SHA the tag points to (null when the listing did not include it). */
  sha: string | null

  /** Tag name (e.g. v1.2.3). */
  tag: string
}
