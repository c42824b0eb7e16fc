/**
 * Percent-encode each segment of a slash-separated path.
 *
 * @param path - Ref name or repository path.
 * @returns Path safe to put into a URL.
 */
export function encodePath(path: string): string {
  return path.split('/').map(encodeURIComponent).join('/')
}
