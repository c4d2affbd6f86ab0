/**
 * @fileoverview Section deletion (ablation).
 *
 * Deletion fails closed. An ablation experiment is only valid if the
 * intended content was removed, so there is no fallback estimate here:
 *
 * 1. Heading tags: locate the heading, resolve its span, drop the lines.
 *    No heading ⇒ `section_not_found`.
 * 2. FORMULAS / FIGURES: substitute every content-pattern match.
 *    No match ⇒ `content_not_matched`.
 * 3. Either way, a result whose trimmed length is under
 *    `minResultLength` ⇒ `degenerate_result` (the "section" was most
 *    likely a one-line mention, and its end was the end of the paper).
 *
 * @module lib/text-mutation/delete-section
 */

import { Err, Ok, type Result } from '@/lib/result'
import { resolveMutationOptions, type MutationOptions } from '@/lib/section-detection/config'
import { createDocument } from '@/lib/section-detection/line-offset-index'
import { locateSection } from '@/lib/section-detection/section-locator'
import { resolveSectionSpan } from '@/lib/section-detection/section-range'
import {
  isContentTag,
  type ContentTag,
  type HeadingTag,
} from '@/lib/section-detection/types'
import { removeContent } from './content-patterns'
import type { DeletionFailure, DeletionResult } from './types'

/**
 * Removes a section (or all formulas / figures) from the paper text.
 *
 * @throws {MalformedDocumentError} for empty or non-text input
 * @throws {ValidationError} for invalid options
 */
export function deleteSection(
  text: unknown,
  tag: HeadingTag | ContentTag,
  options?: MutationOptions
): Result<DeletionResult, DeletionFailure> {
  const document = createDocument(text)
  const { registry, minResultLength } = resolveMutationOptions(options)

  let result: DeletionResult

  if (isContentTag(tag)) {
    const removal = removeContent(document.text, tag)
    if (!removal.contentMatched) {
      return Err({
        tag,
        reason: 'content_not_matched',
        message: `No ${tag.toLowerCase()} found in document`,
      })
    }
    result = {
      operation: 'delete',
      tag,
      mutatedText: removal.mutatedText,
      sectionFound: true,
      span: null,
    }
  } else {
    const heading = locateSection(document, tag, registry)
    if (!heading) {
      return Err({
        tag,
        reason: 'section_not_found',
        message: `No ${tag} heading found`,
      })
    }

    const span = resolveSectionSpan(document, heading)
    result = {
      operation: 'delete',
      tag,
      mutatedText: document.withoutLines(span.startLine, span.endLine),
      sectionFound: true,
      span,
    }
  }

  const remaining = result.mutatedText.trim().length
  if (remaining < minResultLength) {
    return Err({
      tag,
      reason: 'degenerate_result',
      message: `Only ${remaining} characters left after removing ${tag} (minimum ${minResultLength})`,
    })
  }

  return Ok(result)
}
