/**
 * @fileoverview Payload insertion (attack variants).
 *
 * Insertion fails open. The payload always lands somewhere; `sectionFound`
 * records whether "somewhere" was really the requested section.
 *
 * Located section: the payload goes `insertionDepth` (default 70%) of the
 * way through the section body, i.e. between the line after the heading
 * and the resolved end, so it reads as section content rather than as a
 * header injection. Missing section: the fallback estimator picks the
 * offset. Both offsets are snapped forward to a newline within
 * `snapWindow` characters.
 *
 * The payload is wrapped as its own paragraph (`"\n\n" + payload +
 * "\n\n"`), so the output is always exactly `payload.length + 4`
 * characters longer than the input.
 *
 * @module lib/text-mutation/insert-payload
 */

import { resolveMutationOptions, type MutationOptions } from '@/lib/section-detection/config'
import { estimateSectionOffset } from '@/lib/section-detection/fallback-estimator'
import { createDocument, type LineOffsetIndex } from '@/lib/section-detection/line-offset-index'
import { locateSection } from '@/lib/section-detection/section-locator'
import { resolveSectionSpan } from '@/lib/section-detection/section-range'
import type { InsertionPosition, SectionHeading } from '@/lib/section-detection/types'
import type { InsertionResult } from './types'

export const PAYLOAD_SEPARATOR = '\n\n'

/**
 * Inserts `payload` into the section named by `position`.
 *
 * @throws {MalformedDocumentError} for empty or non-text input
 * @throws {ValidationError} for invalid options
 */
export function insertPayload(
  text: unknown,
  position: InsertionPosition,
  payload: string,
  options?: MutationOptions
): InsertionResult {
  const document = createDocument(text)
  const resolved = resolveMutationOptions(options)

  const heading = locateSection(document, position, resolved.registry)
  const offset = heading
    ? interiorOffset(document, heading, resolved.insertionDepth, resolved.snapWindow)
    : estimateSectionOffset(document, position, options)

  const mutatedText =
    document.text.slice(0, offset) +
    PAYLOAD_SEPARATOR +
    payload +
    PAYLOAD_SEPARATOR +
    document.text.slice(offset)

  return {
    operation: 'insert',
    tag: position,
    mutatedText,
    sectionFound: heading !== null,
    offset,
  }
}

/**
 * Offset `depth` of the way through the body of a located section.
 * The body starts on the line after the heading.
 */
function interiorOffset(
  document: LineOffsetIndex,
  heading: SectionHeading,
  depth: number,
  snapWindow: number
): number {
  const span = resolveSectionSpan(document, heading)
  const bodyStart = document.offsetOfLine(span.startLine + 1)
  const bodyEnd = document.offsetOfLine(span.endLine)
  const raw = bodyStart + Math.floor((bodyEnd - bodyStart) * depth)
  return document.snapToNewline(raw, snapWindow)
}
