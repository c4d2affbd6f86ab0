/**
 * @fileoverview Heading Pattern Registry
 *
 * Per-tag, ordered recognition rules for section headings in plain-text
 * renderings of papers. A rule matches a whole trimmed line and tolerates:
 *
 * - an optional leading section number ("4", "4.", "4 ")
 * - any letter case ("ABSTRACT", "Abstract", "abstract")
 * - an optional trailing ":" or "-"
 *
 * Synonyms are separate rules so a match can report which one fired
 * ("CONCLUSION AND FUTURE WORK" vs "Concluding Remarks").
 *
 * The registry is a plain Map built once. Callers that need extra synonyms
 * (or a different tag set entirely) build their own with
 * `createHeadingRegistry` / `register`; the locator only ever reads it.
 *
 * @module lib/section-detection/heading-registry
 */

import type { HeadingRule, HeadingTag } from './types'

// ============================================================================
// Rule Construction
// ============================================================================

/**
 * Builds a case-insensitive whole-line rule around a synonym body.
 *
 * The body is a regex fragment, e.g. `experimental\s+results?`.
 */
export function headingRule<T extends string>(
  tag: T,
  label: string,
  body: string
): HeadingRule<T> {
  const pattern = new RegExp(`^\\s*(?:\\d+\\.?\\s*)?(?:${body})\\s*[:\\-]?\\s*$`, 'i')
  return {
    tag,
    label,
    matches: (line) => pattern.test(line),
  }
}

// ============================================================================
// Default Rules
// ============================================================================

/**
 * Built-in synonyms, most common first. Order matters only for which
 * label is reported when two rules of the same tag match one line.
 */
const DEFAULT_RULES: HeadingRule[] = [
  headingRule('ABSTRACT', 'abstract', 'abstract'),

  headingRule('INTRODUCTION', 'introduction', 'introduction'),

  headingRule('METHODS', 'methods', 'methods?'),
  headingRule('METHODS', 'methodology', 'methodology'),
  headingRule('METHODS', 'approach', 'approach'),

  headingRule('EXPERIMENTS', 'experiments', 'experiments?'),
  headingRule('EXPERIMENTS', 'experimental-results', 'experimental\\s+results?'),

  headingRule('CONCLUSION', 'conclusion', 'conclusions?'),
  headingRule('CONCLUSION', 'concluding-remarks', 'concluding\\s+remarks?'),
  // "CONCLUSION AND FUTURE WORK", "Conclusions & Future Work"
  headingRule('CONCLUSION', 'conclusion-future-work', 'conclusions?\\s*(?:&|and)\\s*future\\s+work'),
  // heading truncated after the ampersand
  headingRule('CONCLUSION', 'conclusion-ampersand', 'conclusions?\\s*&'),

  headingRule('REFERENCES', 'references', 'references?'),
  headingRule('REFERENCES', 'bibliography', 'bibliography'),
]

// ============================================================================
// Registry
// ============================================================================

export type HeadingRegistry<T extends string = HeadingTag> = ReadonlyMap<T, readonly HeadingRule<T>[]>

/**
 * Groups rules by tag, keeping their relative order.
 */
export function createHeadingRegistry<T extends string>(
  rules: readonly HeadingRule<T>[]
): HeadingRegistry<T> {
  const byTag = new Map<T, HeadingRule<T>[]>()
  for (const rule of rules) {
    const existing = byTag.get(rule.tag)
    if (existing) {
      existing.push(rule)
    } else {
      byTag.set(rule.tag, [rule])
    }
  }
  return byTag
}

/**
 * Returns a new registry with extra rules appended after the existing ones.
 * The input registry is left untouched.
 */
export function register<T extends string>(
  registry: HeadingRegistry<T>,
  ...rules: HeadingRule<T>[]
): HeadingRegistry<T> {
  const existing = Array.from(registry.values()).flat()
  return createHeadingRegistry([...existing, ...rules])
}

/** Process-wide default registry. */
export const DEFAULT_HEADING_REGISTRY: HeadingRegistry = createHeadingRegistry(DEFAULT_RULES)

/**
 * Returns the first rule of `tag` matching the trimmed line, or null.
 */
export function matchHeading<T extends string>(
  registry: HeadingRegistry<T>,
  tag: T,
  line: string
): HeadingRule<T> | null {
  const rules = registry.get(tag)
  if (!rules) return null

  const trimmed = line.trim()
  for (const rule of rules) {
    if (rule.matches(trimmed)) return rule
  }
  return null
}
