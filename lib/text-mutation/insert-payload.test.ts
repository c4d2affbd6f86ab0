import { describe, it, expect } from 'vitest'
import { MalformedDocumentError } from '@/lib/errors'
import { estimateSectionOffset } from '@/lib/section-detection/fallback-estimator'
import { LineOffsetIndex } from '@/lib/section-detection/line-offset-index'
import { INSERTION_POSITIONS } from '@/lib/section-detection/types'
import {
  MINIMAL_PAPER_TEXT,
  SAMPLE_PAPER_TEXT,
  SAMPLE_PAPER_WITHOUT_METHODS,
} from '@/lib/testing/fixtures'
import { insertPayload } from './insert-payload'

const PAYLOAD = 'PAYLOAD'

describe('insertPayload', () => {
  it('inserts late in a located section, snapped to the line end', () => {
    const result = insertPayload(MINIMAL_PAPER_TEXT, 'ABSTRACT', PAYLOAD)

    expect(result).toEqual({
      operation: 'insert',
      tag: 'ABSTRACT',
      mutatedText: 'Title: X\nABSTRACT\nSome abstract body.\n\nPAYLOAD\n\n\n1 INTRODUCTION\nIntro body.',
      sectionFound: true,
      offset: 37,
    })
  })

  it('falls back to an estimated offset when the section is missing', () => {
    const result = insertPayload(MINIMAL_PAPER_TEXT, 'METHODS', PAYLOAD)

    // floor(64 * 0.35) = 22, snapped to the newline at 37
    expect(result.offset).toBe(37)
    expect(result.sectionFound).toBe(false)
    expect(result.mutatedText).toBe(
      'Title: X\nABSTRACT\nSome abstract body.\n\nPAYLOAD\n\n\n1 INTRODUCTION\nIntro body.'
    )
  })

  it('uses the fallback estimator for a paper missing the section', () => {
    const result = insertPayload(SAMPLE_PAPER_WITHOUT_METHODS, 'METHODS', PAYLOAD)

    expect(result.sectionFound).toBe(false)
    expect(result.offset).toBe(
      estimateSectionOffset(new LineOffsetIndex(SAMPLE_PAPER_WITHOUT_METHODS), 'METHODS')
    )
  })

  it('splits mid-line when snapping is disabled', () => {
    const result = insertPayload(MINIMAL_PAPER_TEXT, 'ABSTRACT', PAYLOAD, { snapWindow: 0 })

    // body spans offsets 18..38; 18 + floor(20 * 0.7) = 32
    expect(result.offset).toBe(32)
    expect(result.mutatedText).toBe(
      'Title: X\nABSTRACT\nSome abstract \n\nPAYLOAD\n\nbody.\n1 INTRODUCTION\nIntro body.'
    )
  })

  it('honours the insertion depth', () => {
    const result = insertPayload(MINIMAL_PAPER_TEXT, 'ABSTRACT', PAYLOAD, {
      insertionDepth: 1,
      snapWindow: 0,
    })

    expect(result.offset).toBe(38)
    expect(result.mutatedText).toBe(
      'Title: X\nABSTRACT\nSome abstract body.\n\n\nPAYLOAD\n\n1 INTRODUCTION\nIntro body.'
    )
  })

  it.each(INSERTION_POSITIONS)('preserves the original text around the payload at %s', (position) => {
    const result = insertPayload(SAMPLE_PAPER_TEXT, position, PAYLOAD)
    const { mutatedText, offset } = result

    expect(result.sectionFound).toBe(true)
    expect(mutatedText.length).toBe(SAMPLE_PAPER_TEXT.length + PAYLOAD.length + 4)
    expect(mutatedText.slice(0, offset)).toBe(SAMPLE_PAPER_TEXT.slice(0, offset))
    expect(mutatedText.slice(offset, offset + PAYLOAD.length + 4)).toBe('\n\nPAYLOAD\n\n')
    expect(mutatedText.slice(offset + PAYLOAD.length + 4)).toBe(SAMPLE_PAPER_TEXT.slice(offset))
  })

  it('places the payload inside the section body', () => {
    const document = new LineOffsetIndex(SAMPLE_PAPER_TEXT)
    const result = insertPayload(SAMPLE_PAPER_TEXT, 'METHODS', PAYLOAD)

    // METHODS heading is line 6, EXPERIMENTS heading line 9
    expect(result.offset).toBeGreaterThan(document.offsetOfLine(7))
    expect(result.offset).toBeLessThan(document.offsetOfLine(9))
  })

  it('still wraps an empty payload', () => {
    const result = insertPayload(MINIMAL_PAPER_TEXT, 'ABSTRACT', '')
    expect(result.mutatedText.length).toBe(MINIMAL_PAPER_TEXT.length + 4)
  })

  it('throws for malformed text', () => {
    expect(() => insertPayload('   ', 'ABSTRACT', PAYLOAD)).toThrow(MalformedDocumentError)
  })
})
