import { stat } from 'node:fs/promises'

import { findYamlFilesRecursive } from '../fs/find-yaml-files-recursive'
import { isMissingPathError } from '../fs/is-missing-path-error'
import { DiscoveryError } from '../errors/discovery-error'

/**
 * List workflow files beneath a directory.
 *
 * @param root - Workflows directory.
 * @returns Sorted `.yml`/`.yaml` paths, or an empty list when `root` does not
 *   exist.
 * @throws {DiscoveryError} When `root` exists but cannot be listed.
 */
export async function scanWorkflows(root: string): Promise<string[]> {
  try {
    let info = await stat(root)
    if (!info.isDirectory()) {
      throw new Error('not a directory')
    }
  } catch (error) {
    if (isMissingPathError(error)) {
      return []
    }
    throw new DiscoveryError(root, error)
  }

  try {
    return await findYamlFilesRecursive(root)
  } catch (error) {
    throw new DiscoveryError(root, error)
  }
}
