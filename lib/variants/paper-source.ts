/**
 * @fileoverview Paper source rows
 *
 * Input rows come from several exports with different shapes: plain
 * `text`, raw `latex`, chat-style `messages`, or a `sections` array. This
 * module validates a row with zod and pulls out the paper's full text.
 *
 * @module lib/variants/paper-source
 */

import { z } from 'zod'
import type { Paper } from './types'

const MessageSchema = z
  .object({
    role: z.string().optional(),
    content: z.string().nullish().transform((value) => value ?? ''),
  })
  .passthrough()

const SectionSchema = z.union([
  z.string(),
  z
    .object({
      text: z.string().optional(),
      content: z.string().optional(),
    })
    .passthrough(),
])

const IdSchema = z.union([z.string(), z.number()]).transform(String)

export const PaperSourceSchema = z
  .object({
    paper_id: IdSchema.nullish(),
    id: IdSchema.nullish(),
    title: z.string().nullish(),
    text: z.string().nullish(),
    latex: z.string().nullish(),
    messages: z.array(MessageSchema).nullish(),
    content: z.string().nullish(),
    paper_text: z.string().nullish(),
    full_text: z.string().nullish(),
    body: z.string().nullish(),
    sections: z.array(SectionSchema).nullish(),
    rates: z.unknown(),
    decision: z.unknown(),
  })
  .passthrough()

export type PaperSource = z.infer<typeof PaperSourceSchema>

/** Messages shorter than this are prompts or replies, not papers */
const MIN_MESSAGE_PAPER_LENGTH = 1000
/** How far into a message to look for the paper's opening headings */
const MESSAGE_HEAD_LENGTH = 500

/**
 * A chat message that looks like a full paper: long, and opening with
 * ABSTRACT / INTRODUCTION or a "Title:" line.
 */
function looksLikePaper(content: string): boolean {
  if (content.length <= MIN_MESSAGE_PAPER_LENGTH) return false
  const head = content.toUpperCase().slice(0, MESSAGE_HEAD_LENGTH)
  return (
    head.includes('ABSTRACT') ||
    head.includes('INTRODUCTION') ||
    content.trim().startsWith('Title:')
  )
}

function textFromMessages(messages: Array<{ content: string }>): string {
  const paper = messages.find((m) => looksLikePaper(m.content))
  if (paper) return paper.content

  let longest = ''
  for (const message of messages) {
    if (message.content.length > longest.length) longest = message.content
  }
  return longest
}

/**
 * Full text of a source row, or "" when none of the known fields has any.
 *
 * Field priority: text, latex, messages, content, paper_text, full_text,
 * body, sections.
 */
export function extractPaperText(source: PaperSource): string {
  if (source.text) return source.text
  if (source.latex) return source.latex

  if (source.messages && source.messages.length > 0) {
    const text = textFromMessages(source.messages)
    if (text) return text
  }

  for (const field of [source.content, source.paper_text, source.full_text, source.body]) {
    if (field) return field
  }

  if (source.sections && source.sections.length > 0) {
    return source.sections
      .map((section) =>
        typeof section === 'string' ? section : (section.text || section.content || '')
      )
      .join('\n\n')
  }

  return ''
}

/**
 * Builds a Paper from a validated row.
 *
 * @param lineNumber - 1-based line of the row, used for fallback titles
 * @param path - Source file, recorded as "<path>:<line>"
 */
export function toPaper(source: PaperSource, lineNumber: number, path?: string): Paper {
  const id = source.paper_id ?? source.id ?? null
  return {
    id,
    title: source.title || id || `paper_${lineNumber}`,
    text: extractPaperText(source),
    originalPath: path ? `${path}:${lineNumber}` : null,
    rates: source.rates ?? null,
    decision: source.decision ?? null,
  }
}
