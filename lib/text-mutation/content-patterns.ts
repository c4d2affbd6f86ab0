/**
 * @fileoverview Content patterns for formula and figure removal.
 *
 * Formulas and figures are inline constructs scattered through a paper,
 * so they are removed by pattern substitution rather than line ranges.
 * Matches are lazy and may span lines.
 *
 * @module lib/text-mutation/content-patterns
 */

import type { ContentTag } from '@/lib/section-detection/types'
import type { ContentRemoval } from './types'

// ============================================================================
// Patterns
// ============================================================================

/**
 * LaTeX math: `$$...$$`, `$...$`, equation / align / eqnarray
 * environments (starred too) and `\[...\]` display math.
 */
const FORMULA_PATTERN =
  /\$\$.*?\$\$|\$.*?\$|\\begin\{(equation|align|eqnarray)(\*?)\}.*?\\end\{\1\2\}|\\\[.*?\\\]/gs

/**
 * Figures: LaTeX figure / tikzpicture environments, `\includegraphics`
 * up to its closing brace or the end of the line, Markdown images and
 * HTML `<img>` tags.
 */
const FIGURE_PATTERN =
  /\\begin\{figure(\*?)\}.*?\\end\{figure\1\}|\\includegraphics.*?(?:\}|\n)|\\begin\{tikzpicture\}.*?\\end\{tikzpicture\}|!\[.*?\]\(.*?\)|<img.*?>/gs

const CONTENT_RULES: Record<ContentTag, { pattern: RegExp; replacement: string }> = {
  // A space keeps surrounding words apart
  FORMULAS: { pattern: FORMULA_PATTERN, replacement: ' ' },
  // Figures are block-level; a newline keeps paragraphs apart
  FIGURES: { pattern: FIGURE_PATTERN, replacement: '\n' },
}

// ============================================================================
// Removal
// ============================================================================

/**
 * Replaces every formula or figure occurrence.
 *
 * Text is returned unchanged with `contentMatched: false` when nothing
 * matches.
 */
export function removeContent(text: string, tag: ContentTag): ContentRemoval {
  const { pattern, replacement } = CONTENT_RULES[tag]

  // Global patterns are stateful
  pattern.lastIndex = 0
  const contentMatched = pattern.test(text)
  pattern.lastIndex = 0

  if (!contentMatched) {
    return { mutatedText: text, contentMatched: false }
  }
  return { mutatedText: text.replace(pattern, replacement), contentMatched: true }
}
