import { describe, it, expect } from 'vitest'
import {
  DEFAULT_HEADING_REGISTRY,
  createHeadingRegistry,
  headingRule,
  matchHeading,
  register,
} from './heading-registry'

describe('headingRule', () => {
  const rule = headingRule('ABSTRACT', 'abstract', 'abstract')

  it('matches the bare heading in any case', () => {
    expect(rule.matches('ABSTRACT')).toBe(true)
    expect(rule.matches('Abstract')).toBe(true)
    expect(rule.matches('abstract')).toBe(true)
  })

  it('accepts a leading section number', () => {
    expect(rule.matches('1 Abstract')).toBe(true)
    expect(rule.matches('1. Abstract')).toBe(true)
    expect(rule.matches('1.Abstract')).toBe(true)
  })

  it('accepts a trailing colon or dash', () => {
    expect(rule.matches('Abstract:')).toBe(true)
    expect(rule.matches('ABSTRACT -')).toBe(true)
  })

  it('rejects lines with text after the heading', () => {
    expect(rule.matches('Abstract: We propose a method')).toBe(false)
    expect(rule.matches('Abstracts of talks')).toBe(false)
  })

  it('rejects decimal subsection numbers', () => {
    const experiments = headingRule('EXPERIMENTS', 'experiments', 'experiments?')
    expect(experiments.matches('4 Experiments')).toBe(true)
    expect(experiments.matches('4.1 Experiments')).toBe(false)
  })
})

describe('DEFAULT_HEADING_REGISTRY', () => {
  it('has rules for every heading tag', () => {
    expect([...DEFAULT_HEADING_REGISTRY.keys()]).toEqual([
      'ABSTRACT',
      'INTRODUCTION',
      'METHODS',
      'EXPERIMENTS',
      'CONCLUSION',
      'REFERENCES',
    ])
  })

  it.each([
    ['5 CONCLUSION', 'conclusion'],
    ['Conclusions', 'conclusion'],
    ['Concluding Remarks', 'concluding-remarks'],
    ['CONCLUSION AND FUTURE WORK', 'conclusion-future-work'],
    ['6. Conclusions & Future Work:', 'conclusion-future-work'],
    ['CONCLUSION &', 'conclusion-ampersand'],
    ['5 Conclusions&', 'conclusion-ampersand'],
  ])('matches %j as CONCLUSION via %s', (line, label) => {
    expect(matchHeading(DEFAULT_HEADING_REGISTRY, 'CONCLUSION', line)?.label).toBe(label)
  })

  it.each([
    ['METHODS', '2 Method', 'methods'],
    ['METHODS', '3. Methodology', 'methodology'],
    ['METHODS', 'Approach', 'approach'],
    ['EXPERIMENTS', '4 EXPERIMENTS', 'experiments'],
    ['EXPERIMENTS', 'Experimental Results', 'experimental-results'],
    ['REFERENCES', 'References', 'references'],
    ['REFERENCES', 'BIBLIOGRAPHY', 'bibliography'],
    ['INTRODUCTION', '1 INTRODUCTION', 'introduction'],
  ] as const)('matches %s heading %j via %s', (tag, line, label) => {
    expect(matchHeading(DEFAULT_HEADING_REGISTRY, tag, line)?.label).toBe(label)
  })

  it('trims the line before matching', () => {
    expect(matchHeading(DEFAULT_HEADING_REGISTRY, 'ABSTRACT', '   Abstract   ')?.label).toBe(
      'abstract'
    )
  })

  it('returns null when no rule of the tag matches', () => {
    expect(matchHeading(DEFAULT_HEADING_REGISTRY, 'METHODS', 'Introduction')).toBeNull()
    expect(matchHeading(DEFAULT_HEADING_REGISTRY, 'ABSTRACT', 'This is the abstract.')).toBeNull()
  })
})

describe('register', () => {
  const proposedMethod = headingRule('METHODS', 'proposed-method', 'proposed\\s+method')

  it('adds synonyms after the existing rules', () => {
    const registry = register(DEFAULT_HEADING_REGISTRY, proposedMethod)

    expect(matchHeading(registry, 'METHODS', '3 Proposed Method')?.label).toBe('proposed-method')
    expect(matchHeading(registry, 'METHODS', 'Methodology')?.label).toBe('methodology')
    expect(registry.get('METHODS')?.map((r) => r.label)).toEqual([
      'methods',
      'methodology',
      'approach',
      'proposed-method',
    ])
  })

  it('leaves the input registry untouched', () => {
    register(DEFAULT_HEADING_REGISTRY, proposedMethod)

    expect(matchHeading(DEFAULT_HEADING_REGISTRY, 'METHODS', '3 Proposed Method')).toBeNull()
    expect(DEFAULT_HEADING_REGISTRY.get('METHODS')).toHaveLength(3)
  })
})

describe('createHeadingRegistry', () => {
  it('supports tag sets other than the defaults', () => {
    const registry = createHeadingRegistry([
      headingRule('RELATED_WORK', 'related-work', 'related\\s+work'),
      headingRule('RELATED_WORK', 'prior-work', 'prior\\s+work'),
    ])

    expect(matchHeading(registry, 'RELATED_WORK', '2 Prior Work')?.label).toBe('prior-work')
    expect(registry.get('RELATED_WORK')).toHaveLength(2)
  })
})
