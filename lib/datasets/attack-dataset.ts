/**
 * @fileoverview Attack dataset generation
 *
 * For each base paper: one unmodified control record plus one record per
 * (attack type × insertion position), i.e. 1 + 5 × 5 = 26 records. Every
 * attack record carries `section_found` so estimated insertions can be
 * excluded during analysis.
 *
 * Base papers are taken from an existing ablation dataset (its
 * `original` records), which guarantees the same papers are used across
 * both experiments.
 *
 * @module lib/datasets/attack-dataset
 */

import { z } from "zod"
import { MalformedDocumentError } from "@/lib/errors"
import { logger } from "@/lib/logger"
import type { MutationOptions } from "@/lib/section-detection/config"
import { INSERTION_POSITIONS, type InsertionPosition } from "@/lib/section-detection/types"
import { createDocument } from "@/lib/section-detection/line-offset-index"
import { insertPayload } from "@/lib/text-mutation/insert-payload"
import { ATTACK_PROMPTS } from "@/lib/variants/catalog"
import { PaperSourceSchema, toPaper } from "@/lib/variants/paper-source"
import {
  baseId,
  buildAttackControlRecord,
  buildAttackRecord,
} from "@/lib/variants/record-builder"
import {
  ATTACK_TYPES,
  type AttackControlRecord,
  type AttackRecord,
  type AttackType,
  type Paper,
} from "@/lib/variants/types"
import { createSeededRandom, sampleWithoutReplacement } from "./sampling"

export type AttackDatasetRecord = AttackControlRecord | AttackRecord

export interface GenerateAttacksOptions {
  /** Papers with shorter text are skipped */
  minTextLength?: number
  attackTypes?: readonly AttackType[]
  positions?: readonly InsertionPosition[]
  mutation?: MutationOptions
}

/**
 * Generate the control record and every attack variant for one paper.
 * Returns an empty list when the paper's text is too short or malformed.
 */
export function generateAttackVariants(
  paper: Paper,
  options: GenerateAttacksOptions = {}
): AttackDatasetRecord[] {
  const minTextLength = options.minTextLength ?? 500
  if (paper.text.length < minTextLength) {
    return []
  }

  try {
    createDocument(paper.text)
  } catch (error) {
    if (!(error instanceof MalformedDocumentError)) throw error
    logger.warn("Paper has empty or invalid text, skipping", {
      title: paper.title,
      error: error.message,
    })
    return []
  }

  const records: AttackDatasetRecord[] = [buildAttackControlRecord(paper)]

  for (const attackType of options.attackTypes ?? ATTACK_TYPES) {
    const payload = ATTACK_PROMPTS[attackType]
    for (const position of options.positions ?? INSERTION_POSITIONS) {
      const insertion = insertPayload(paper.text, position, payload, options.mutation)
      records.push(buildAttackRecord(paper, attackType, payload, insertion))
    }
  }

  return records
}

// ============================================================================
// Base paper selection
// ============================================================================

const VariantRowSchema = PaperSourceSchema.extend({
  variant_type: z.string().nullish(),
  original_id: z.union([z.string(), z.number()]).transform(String).nullish(),
  original_title: z.string().nullish(),
})

/**
 * Rebuild a Paper from an ablation dataset's `original` record, using the
 * source identity rather than the variant's own id and title.
 */
function paperFromOriginalRow(row: z.infer<typeof VariantRowSchema>, index: number): Paper {
  const paper = toPaper(row, index + 1)
  return {
    ...paper,
    id: row.original_id ?? paper.id,
    title: row.original_title || paper.title,
  }
}

function uniqueOriginals(rows: readonly unknown[]): Map<string, Paper> {
  const byId = new Map<string, Paper>()
  rows.forEach((raw, index) => {
    const parsed = VariantRowSchema.safeParse(raw)
    if (!parsed.success || parsed.data.variant_type !== "original") return

    const paper = paperFromOriginalRow(parsed.data, index)
    const id = baseId(paper)
    if (!byId.has(id)) byId.set(id, paper)
  })
  return byId
}

export interface BasePapers {
  train: Paper[]
  test: Paper[]
}

/**
 * Deduplicated `original` papers from the train and test ablation sets.
 *
 * When more than `total` are available, a seeded sample keeps the
 * train/test proportion.
 */
export function selectBasePapers(
  trainRows: readonly unknown[],
  testRows: readonly unknown[],
  total: number,
  seed: number
): BasePapers {
  const train = uniqueOriginals(trainRows)
  const test = uniqueOriginals(testRows)

  const found = train.size + test.size
  if (found <= total) {
    return { train: [...train.values()], test: [...test.values()] }
  }

  const trainSize = Math.floor(total * (train.size / found))
  const testSize = total - trainSize
  const random = createSeededRandom(seed)

  return {
    train: sampleWithoutReplacement([...train.values()], trainSize, random),
    test: sampleWithoutReplacement([...test.values()], testSize, random),
  }
}

// ============================================================================
// Statistics
// ============================================================================

export interface SectionMatchStats {
  found: number
  total: number
}

/**
 * How often each insertion position was located rather than estimated.
 */
export function summarizeSectionMatches(
  records: readonly AttackDatasetRecord[]
): Record<InsertionPosition, SectionMatchStats> {
  const stats: Record<InsertionPosition, SectionMatchStats> = {
    ABSTRACT: { found: 0, total: 0 },
    INTRODUCTION: { found: 0, total: 0 },
    METHODS: { found: 0, total: 0 },
    EXPERIMENTS: { found: 0, total: 0 },
    CONCLUSION: { found: 0, total: 0 },
  }

  for (const record of records) {
    if (record.attack_position === "none") continue
    const entry = stats[record.attack_position]
    entry.total++
    if (record.section_found) entry.found++
  }
  return stats
}
