import { isAbsolute, relative, resolve, posix, sep } from 'node:path'

/**
 * Map a local workflow path to the path of the same file in the repository.
 *
 * Paths inside `rootPath` become repository-relative. Other absolute paths are
 * cut at the workflows directory, falling back to the file name placed in it.
 *
 * @param file - Local file path.
 * @param options - Path context.
 * @param options.rootPath - Local repository root.
 * @param options.workflowsPath - Repository-relative workflows directory.
 * @returns Repository-relative POSIX path.
 */
export function toRepositoryPath(
  file: string,
  options: { workflowsPath: string; rootPath: string },
): string {
  let root = resolve(options.rootPath)
  let absolute = resolve(root, file)
  let fromRoot = relative(root, absolute)

  if (fromRoot && !fromRoot.startsWith('..') && !isAbsolute(fromRoot)) {
    return toPosix(fromRoot)
  }

  let workflowsPath = toPosix(options.workflowsPath).replace(
    /^\.\/|\/+$/gu,
    '',
  )
  let posixFile = toPosix(absolute)
  let marker = `/${workflowsPath}/`
  let markerIndex = posixFile.lastIndexOf(marker)

  if (markerIndex !== -1) {
    return `${workflowsPath}/${posixFile.slice(markerIndex + marker.length)}`
  }

  return posix.join(workflowsPath, posix.basename(posixFile))
}

function toPosix(path: string): string {
  return path.split(sep).join('/')
}
