import { MAX_TRAIL_LENGTH } from '../constants'

/**
 * Append a superseded version to a trail and cap its length.
 *
 * The first entry is the original version and always survives; the rest keep
 * the most recent entries. The trail is not extended when the superseded
 * version equals the next one (a moving tag re-pinned).
 *
 * @param trail - Existing trail, oldest first.
 * @param superseded - Display version being replaced.
 * @param next - Display version replacing it.
 * @returns New trail.
 */
export function buildTrail(
  trail: readonly string[],
  superseded: string,
  next: string,
): string[] {
  let result = superseded === next ? [...trail] : [...trail, superseded]

  if (result.length <= MAX_TRAIL_LENGTH) {
    return result
  }

  let [original = superseded] = result
  return [original, ...result.slice(-(MAX_TRAIL_LENGTH - 1))]
}
