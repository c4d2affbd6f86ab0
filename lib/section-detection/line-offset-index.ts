/**
 * @fileoverview Line/character offset mapping for a paper's text.
 *
 * A document is handled both as an ordered list of lines (for heading
 * search) and as one character buffer (for insertion). This index is
 * built once per document and translates between the two, so neither the
 * range resolver nor the position estimator re-derives cumulative line
 * lengths on its own.
 *
 * Splitting is lossless: `lines.join("\n") === text`.
 *
 * @module lib/section-detection/line-offset-index
 */

import { MalformedDocumentError } from '@/lib/errors'

export class LineOffsetIndex {
  readonly lines: readonly string[]
  /** Character offset where each line starts */
  private readonly lineStarts: readonly number[]

  constructor(readonly text: string) {
    this.lines = text.split('\n')

    const starts: number[] = []
    let offset = 0
    for (const line of this.lines) {
      starts.push(offset)
      offset += line.length + 1
    }
    this.lineStarts = starts
  }

  get lineCount(): number {
    return this.lines.length
  }

  get length(): number {
    return this.text.length
  }

  /**
   * Character offset where line `index` starts.
   *
   * `index === lineCount` maps to the end of the text, so the exclusive
   * end of a span can be passed straight through.
   */
  offsetOfLine(index: number): number {
    if (index <= 0) return 0
    if (index >= this.lineStarts.length) return this.text.length
    return this.lineStarts[index]
  }

  /**
   * Text with lines [start, end) removed, rejoined with "\n".
   */
  withoutLines(start: number, end: number): string {
    return [...this.lines.slice(0, start), ...this.lines.slice(end)].join('\n')
  }

  /**
   * Moves `offset` forward to the next newline when one lies fewer than
   * `window` characters ahead. Otherwise returns `offset` unchanged.
   * Keeps inserted text from splitting a sentence or word.
   */
  snapToNewline(offset: number, window: number): number {
    const clamped = Math.min(Math.max(0, offset), this.text.length)
    const newline = this.text.indexOf('\n', clamped)
    if (newline !== -1 && newline - clamped < window) {
      return newline
    }
    return clamped
  }
}

// ============================================================================
// Document Validation
// ============================================================================

/**
 * Validates raw paper text and builds its index.
 *
 * @throws {MalformedDocumentError} when the input is not a string, is
 *   empty or whitespace-only, or carries NUL characters (binary content)
 */
export function createDocument(text: unknown): LineOffsetIndex {
  if (typeof text !== 'string') {
    throw new MalformedDocumentError(`Document text must be a string, got ${typeof text}`)
  }
  if (text.trim().length === 0) {
    throw new MalformedDocumentError('Document text is empty')
  }
  if (text.includes('\u0000')) {
    throw new MalformedDocumentError('Document text contains NUL characters')
  }
  return new LineOffsetIndex(text)
}
