/**
 * @fileoverview Fallback Position Estimator
 *
 * When a section heading cannot be located, insertion still has to happen
 * somewhere. Each insertable section maps to a fixed fraction of the text
 * (abstract near the top, conclusion near the bottom); the raw offset is
 * then snapped forward to a nearby newline.
 *
 * Only insertion uses this. Deletion never guesses a span.
 *
 * Results from here are approximations and every caller must pair them
 * with `sectionFound: false`.
 *
 * @module lib/section-detection/fallback-estimator
 */

import { resolveMutationOptions, type MutationOptions } from './config'
import type { LineOffsetIndex } from './line-offset-index'
import type { InsertionPosition } from './types'

export function estimateSectionOffset(
  document: LineOffsetIndex,
  tag: InsertionPosition,
  options?: MutationOptions
): number {
  const { fallbackPositions, snapWindow } = resolveMutationOptions(options)
  const raw = Math.floor(document.length * fallbackPositions[tag])
  return document.snapToNewline(raw, snapWindow)
}
