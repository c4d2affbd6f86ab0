/**
 * @fileoverview Section detection type definitions
 * @module lib/section-detection/types
 */

// ============================================================================
// Section Tags
// ============================================================================

/** Every section the engine can target, in reading order. */
export const SECTION_TAGS = [
  'ABSTRACT',
  'INTRODUCTION',
  'METHODS',
  'EXPERIMENTS',
  'CONCLUSION',
  'REFERENCES',
  'FORMULAS',
  'FIGURES',
] as const

export type SectionTag = (typeof SECTION_TAGS)[number]

/**
 * Tags matched by content pattern instead of heading search.
 * Formulas and figures recur inline; they are not sections.
 */
export type ContentTag = Extract<SectionTag, 'FORMULAS' | 'FIGURES'>

/** Tags located through the heading registry. */
export type HeadingTag = Exclude<SectionTag, ContentTag>

/** Tags that can receive an inserted payload. */
export type InsertionPosition = Exclude<HeadingTag, 'REFERENCES'>

export const INSERTION_POSITIONS: readonly InsertionPosition[] = [
  'ABSTRACT',
  'INTRODUCTION',
  'METHODS',
  'EXPERIMENTS',
  'CONCLUSION',
]

export function isContentTag(tag: SectionTag): tag is ContentTag {
  return tag === 'FORMULAS' || tag === 'FIGURES'
}

// ============================================================================
// Heading Rules
// ============================================================================

export interface HeadingRule<T extends string = HeadingTag> {
  /** Section this rule recognises */
  tag: T
  /** Short name of the synonym, e.g. "methodology" */
  label: string
  /** Tests one trimmed line */
  matches: (line: string) => boolean
}

// ============================================================================
// Located Sections
// ============================================================================

export interface SectionHeading<T extends string = HeadingTag> {
  tag: T
  /** Zero-based index of the heading line */
  line: number
  /** Rule that recognised the heading */
  rule: HeadingRule<T>
}

export interface SectionSpan<T extends string = HeadingTag> {
  tag: T
  /** Heading line, inclusive */
  startLine: number
  /** Next top-level heading or the line count, exclusive */
  endLine: number
}
