import type { ActionReference } from '../../types/action-reference'
import type { Update } from '../../types/update'

import { getDisplayVersion } from '../version-checker/create-version-checker'
import { parseAnnotation } from '../parsing/parse-annotation'
import { SHORT_HASH_LENGTH } from '../constants'
import { buildTrail } from './build-trail'

/**
 * Build a frozen update for a reference whose commit is known.
 *
 * @param parameters - Update inputs.
 * @param parameters.reference - Scanned reference.
 * @param parameters.file - File the update applies to.
 * @param parameters.oldHash - Commit the reference currently resolves to.
 * @param parameters.newVersion - Display label of the new pin.
 * @param parameters.newHash - New commit hash.
 * @returns Update, or null when the reference already has `newHash`.
 */
export function createUpdate(parameters: {
  reference: ActionReference
  newVersion: string
  oldHash: string
  newHash: string
  file: string
}): Update | null {
  let { newVersion, reference, oldHash, file } = parameters
  let newHash = parameters.newHash.toLowerCase()

  if (oldHash.toLowerCase() === newHash) {
    return null
  }

  let oldVersion =
    getDisplayVersion(reference) ??
    reference.version.slice(0, SHORT_HASH_LENGTH)
  let { trail: previousTrail } = parseAnnotation(reference.comment)
  let trail = Object.freeze(buildTrail(previousTrail, oldVersion, newVersion))

  return Object.freeze({
    originalVersion: trail[0] ?? oldVersion,
    oldHash: oldHash.toLowerCase(),
    newVersion,
    oldVersion,
    reference,
    newHash,
    trail,
    file,
  })
}
