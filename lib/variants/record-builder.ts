/**
 * @fileoverview Variant Record Builder
 *
 * Field assembly only: packages mutated text with the source paper's
 * identity so downstream evaluation can group variants by paper.
 *
 * @module lib/variants/record-builder
 */

import type { InsertionResult } from '@/lib/text-mutation/types'
import type {
  AttackControlRecord,
  AttackRecord,
  AttackType,
  Paper,
  VariantRecord,
} from './types'

/**
 * Identifier shared by every record derived from one paper.
 * Falls back to the start of the title, then to "paper".
 *
 * Ablation and attack records use this one scheme, so an untitled,
 * id-less paper yields `paper_<variant>` in both datasets.
 */
export function baseId(paper: Paper): string {
  if (paper.id) return paper.id
  if (paper.title) return paper.title.slice(0, 50)
  return 'paper'
}

export function buildVariantRecord(
  paper: Paper,
  variantType: string,
  text: string
): VariantRecord {
  return {
    id: `${baseId(paper)}_${variantType}`,
    title: `${paper.title} [${variantType}]`,
    original_title: paper.title,
    variant_type: variantType,
    text,
    original_id: paper.id,
    original_path: paper.originalPath,
    rates: paper.rates,
    decision: paper.decision,
  }
}

export function buildAttackControlRecord(paper: Paper): AttackControlRecord {
  return {
    ...buildVariantRecord(paper, 'original', paper.text),
    original_id: baseId(paper),
    variant_type: 'original',
    attack_type: 'none',
    attack_position: 'none',
  }
}

export function buildAttackRecord(
  paper: Paper,
  attackType: AttackType,
  payload: string,
  insertion: InsertionResult
): AttackRecord {
  const variantType = `attack_${attackType}_${insertion.tag.toLowerCase()}`
  return {
    ...buildVariantRecord(paper, variantType, insertion.mutatedText),
    original_id: baseId(paper),
    attack_type: attackType,
    attack_position: insertion.tag,
    attack_text: payload,
    section_found: insertion.sectionFound,
  }
}
