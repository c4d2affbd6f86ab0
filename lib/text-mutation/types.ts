/**
 * @fileoverview Mutation engine type definitions
 * @module lib/text-mutation/types
 */

import type {
  ContentTag,
  HeadingTag,
  InsertionPosition,
  SectionSpan,
  SectionTag,
} from '@/lib/section-detection/types'

export type MutationOperation = 'delete' | 'insert'

interface MutationBase {
  tag: SectionTag
  operation: MutationOperation
  mutatedText: string
  /**
   * True when the target was located by pattern match.
   * For FORMULAS / FIGURES this is the content-matched flag.
   */
  sectionFound: boolean
}

export interface DeletionResult extends MutationBase {
  operation: 'delete'
  tag: HeadingTag | ContentTag
  /** Removed line range; null for content-pattern deletions */
  span: SectionSpan | null
}

export interface InsertionResult extends MutationBase {
  operation: 'insert'
  tag: InsertionPosition
  /** Character offset in the original text where the payload went */
  offset: number
}

export type MutationResult = DeletionResult | InsertionResult

export type DeletionFailureReason =
  /** No heading rule matched any line */
  | 'section_not_found'
  /** FORMULAS / FIGURES pattern matched nothing */
  | 'content_not_matched'
  /** Deletion left an implausibly short document */
  | 'degenerate_result'

export interface DeletionFailure {
  tag: HeadingTag | ContentTag
  reason: DeletionFailureReason
  message: string
}

export interface ContentRemoval {
  mutatedText: string
  contentMatched: boolean
}
