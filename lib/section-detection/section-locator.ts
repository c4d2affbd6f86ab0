/**
 * @fileoverview Section Locator
 *
 * Finds the heading line of a requested section. Lines are scanned in
 * document order and the FIRST line matching any rule of the tag wins, so
 * a later repeat of the same heading (an appendix "Conclusion", a table of
 * contents entry after the real heading) is never chosen over an earlier
 * one.
 *
 * Absence is a normal outcome: the locator returns null and never throws.
 *
 * @module lib/section-detection/section-locator
 */

import { DEFAULT_HEADING_REGISTRY, matchHeading, type HeadingRegistry } from './heading-registry'
import type { LineOffsetIndex } from './line-offset-index'
import type { HeadingTag, SectionHeading } from './types'

export function locateSection(document: LineOffsetIndex, tag: HeadingTag): SectionHeading | null
export function locateSection<T extends string>(
  document: LineOffsetIndex,
  tag: T,
  registry: HeadingRegistry<T>
): SectionHeading<T> | null
export function locateSection(
  document: LineOffsetIndex,
  tag: string,
  registry: HeadingRegistry<string> = DEFAULT_HEADING_REGISTRY
): SectionHeading<string> | null {
  const { lines } = document
  for (let i = 0; i < lines.length; i++) {
    const rule = matchHeading(registry, tag, lines[i])
    if (rule) {
      return { tag, line: i, rule }
    }
  }
  return null
}
