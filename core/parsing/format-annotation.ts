import type { Annotation } from '../../types/annotation'

import {
  ANNOTATION_SEPARATOR,
  TRAIL_SEPARATOR,
  TRAIL_PREFIX,
} from './parse-annotation'

/**
 * Render an annotation back to comment text (without the `#`).
 *
 * @param annotation - Annotation with a version.
 * @returns Comment text such as `v5 | trail: v2 -> v4`.
 */
export function formatAnnotation(
  annotation: { version: string } & Annotation,
): string {
  let sections = [annotation.version]

  if (annotation.trail.length > 0) {
    sections.push(
      `${TRAIL_PREFIX}${annotation.trail.join(TRAIL_SEPARATOR)}`,
    )
  }

  if (annotation.note) {
    sections.push(annotation.note)
  }

  return sections.join(ANNOTATION_SEPARATOR)
}
