/**
 * @fileoverview Section Range Resolver
 *
 * Given a heading line, finds where the section body stops: the first
 * later line that looks like a top-level heading, or the end of the
 * document.
 *
 * A line is a top-level heading when it is either
 *
 * - numbered: an integer, an optional ".", whitespace, then an uppercase
 *   letter ("4 EXPERIMENTS", "5. Conclusion"). Decimal numbering such as
 *   "4.1 Dataset Details" never matches: after "4." the next character
 *   must be whitespace, and "1" is not.
 * - all caps: at least three uppercase letters followed only by
 *   uppercase letters and spaces ("RELATED WORK", "ACKNOWLEDGMENTS:").
 *
 * Known limitation: a body line written entirely in capitals ("CNN LSTM
 * GRU") also terminates the section. Sources in this pipeline do not
 * disambiguate that case and neither does this resolver.
 *
 * @module lib/section-detection/section-range
 */

import type { LineOffsetIndex } from './line-offset-index'
import type { HeadingTag, SectionHeading, SectionSpan } from './types'

// Case-sensitive: capitalisation marks a heading
const NUMBERED_HEADING = /^\s*\d+\.?\s+[A-Z]/
const ALL_CAPS_HEADING = /^\s*[A-Z]{3,}[A-Z\s]*\s*[:-]?\s*$/

/**
 * Sections that always run to the end of the document. Reference lists
 * are trailing and their entries often look like headings.
 */
const TRAILING_SECTIONS: ReadonlySet<string> = new Set<HeadingTag>(['REFERENCES'])

export function isTopLevelHeading(line: string): boolean {
  return NUMBERED_HEADING.test(line) || ALL_CAPS_HEADING.test(line)
}

/**
 * Returns the exclusive end line of the section starting at `startLine`.
 *
 * Always satisfies `startLine < end <= lineCount` for a valid start.
 */
export function resolveSectionEnd(document: LineOffsetIndex, startLine: number): number {
  const { lines } = document
  for (let i = startLine + 1; i < lines.length; i++) {
    if (isTopLevelHeading(lines[i])) {
      return i
    }
  }
  return lines.length
}

/**
 * Full span for a located heading.
 */
export function resolveSectionSpan<T extends string>(
  document: LineOffsetIndex,
  heading: SectionHeading<T>
): SectionSpan<T> {
  const endLine = TRAILING_SECTIONS.has(heading.tag)
    ? document.lineCount
    : resolveSectionEnd(document, heading.line)

  return { tag: heading.tag, startLine: heading.line, endLine }
}
