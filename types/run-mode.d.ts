/**
 * What to do with the resolved updates.
 *
 * - `preview`: report only.
 * - `stage`: rewrite local files.
 * - `publish`: open a pull request.
 */
export type RunMode = 'preview' | 'publish' | 'stage'
