import type { Paper } from '@/lib/variants/types'

// ============================================================================
// Sample Paper Text
// ============================================================================

/** Smallest document with a locatable abstract and introduction */
export const MINIMAL_PAPER_LINES = [
  'Title: X',
  'ABSTRACT',
  'Some abstract body.',
  '1 INTRODUCTION',
  'Intro body.',
]

export const MINIMAL_PAPER_TEXT = MINIMAL_PAPER_LINES.join('\n')

/** Every heading tag present, one top-level heading per section */
export const SAMPLE_PAPER_LINES = [
  'Title: Probing Review Models With Missing Sections',
  'ABSTRACT',
  'We study how automated reviewers react when a paper loses one of its sections.',
  '1 INTRODUCTION',
  'Automated peer review is spreading across venues.',
  'We ask whether scores depend on the presence of each section.',
  '2 METHODS',
  'We delete one section per variant and keep the rest of the paper intact.',
  'Each variant is scored by the same reviewer model.',
  '3 EXPERIMENTS',
  'Scores drop most when the method description is removed.',
  'Removing the abstract barely changes the decision.',
  '4 CONCLUSION',
  'Section presence matters to automated reviewers.',
  'REFERENCES',
  '[1] A. Author. Scoring Papers Automatically. 2020.',
]

export const SAMPLE_PAPER_TEXT = SAMPLE_PAPER_LINES.join('\n')

/** SAMPLE_PAPER_LINES with lines [start, end) removed */
export function sampleWithoutLines(start: number, end: number): string {
  return SAMPLE_PAPER_LINES.filter((_, i) => i < start || i >= end).join('\n')
}

/** Same paper with the METHODS heading and body dropped */
export const SAMPLE_PAPER_WITHOUT_METHODS = sampleWithoutLines(6, 9)

// ============================================================================
// Papers
// ============================================================================

export function makePaper(overrides: Partial<Paper> = {}): Paper {
  return {
    id: 'paper-1',
    title: 'Probing Review Models',
    text: SAMPLE_PAPER_TEXT,
    originalPath: 'data/train.jsonl:1',
    rates: [6, 8, 5],
    decision: 'Accept',
    ...overrides,
  }
}
