import { describe, it, expect } from 'vitest'
import { MINIMAL_PAPER_TEXT, SAMPLE_PAPER_TEXT } from '@/lib/testing/fixtures'
import { createHeadingRegistry, headingRule } from './heading-registry'
import { LineOffsetIndex } from './line-offset-index'
import { locateSection } from './section-locator'

describe('locateSection', () => {
  it('finds the abstract heading line', () => {
    const heading = locateSection(new LineOffsetIndex(MINIMAL_PAPER_TEXT), 'ABSTRACT')

    expect(heading?.line).toBe(1)
    expect(heading?.tag).toBe('ABSTRACT')
    expect(heading?.rule.label).toBe('abstract')
  })

  it('finds numbered headings', () => {
    expect(locateSection(new LineOffsetIndex(MINIMAL_PAPER_TEXT), 'INTRODUCTION')?.line).toBe(3)
  })

  it('returns null when the section is absent', () => {
    expect(locateSection(new LineOffsetIndex(MINIMAL_PAPER_TEXT), 'METHODS')).toBeNull()
  })

  it('locates every heading of a full paper', () => {
    const document = new LineOffsetIndex(SAMPLE_PAPER_TEXT)

    expect(locateSection(document, 'ABSTRACT')?.line).toBe(1)
    expect(locateSection(document, 'INTRODUCTION')?.line).toBe(3)
    expect(locateSection(document, 'METHODS')?.line).toBe(6)
    expect(locateSection(document, 'EXPERIMENTS')?.line).toBe(9)
    expect(locateSection(document, 'CONCLUSION')?.line).toBe(12)
    expect(locateSection(document, 'REFERENCES')?.line).toBe(14)
  })

  it('picks the first matching line when a heading repeats', () => {
    const document = new LineOffsetIndex('Conclusion\nEarly summary.\n5 CONCLUSION\nReal one.')
    const heading = locateSection(document, 'CONCLUSION')

    expect(heading?.line).toBe(0)
  })

  it('ignores body lines that only mention the section', () => {
    const document = new LineOffsetIndex('The abstract is short.\nAbstract\nBody.')
    expect(locateSection(document, 'ABSTRACT')?.line).toBe(1)
  })

  it('uses a caller-supplied registry', () => {
    const registry = createHeadingRegistry([
      headingRule('RELATED_WORK', 'related-work', 'related\\s+work'),
    ])
    const document = new LineOffsetIndex('1 Introduction\nText.\n2 Related Work\nMore text.')
    const heading = locateSection(document, 'RELATED_WORK', registry)

    expect(heading?.tag).toBe('RELATED_WORK')
    expect(heading?.line).toBe(2)
    expect(heading?.rule.label).toBe('related-work')
  })
})
