/**
 * @fileoverview Variant and attack record types
 *
 * Output records are written one JSON object per line and consumed by the
 * review-evaluation pipeline, so field names are snake_case to match that
 * wire format.
 *
 * @module lib/variants/types
 */

import type { InsertionPosition } from '@/lib/section-detection/types'

/**
 * A paper ready for mutation, after text extraction from its source row.
 */
export interface Paper {
  /** Source identifier, if the row had one */
  id: string | null
  title: string
  text: string
  /** "<file>:<line>" of the source row */
  originalPath: string | null
  rates: unknown
  decision: unknown
}

export const VARIANT_TYPES = [
  'original',
  'no_abstract',
  'no_introduction',
  'no_methods',
  'no_experiments',
  'no_conclusion',
  'no_references',
  'no_formulas',
  'no_figures',
] as const

export type VariantType = (typeof VARIANT_TYPES)[number]

export const ATTACK_TYPES = ['direct', 'polite', 'instruction', 'hidden', 'persuasive'] as const

export type AttackType = (typeof ATTACK_TYPES)[number]

export interface VariantRecord {
  /** "{base_id}_{variant_type}" */
  id: string
  /** "{original_title} [{variant_type}]" */
  title: string
  original_title: string
  variant_type: string
  text: string
  original_id: string | null
  original_path?: string | null
  rates: unknown
  decision: unknown
}

export interface AttackRecord extends VariantRecord {
  attack_type: AttackType
  attack_position: InsertionPosition
  attack_text: string
  /** False when the insertion offset was estimated */
  section_found: boolean
  dataset_split?: DatasetSplit
}

/** Unmodified paper emitted alongside its attacks as the control */
export interface AttackControlRecord extends VariantRecord {
  variant_type: 'original'
  attack_type: 'none'
  attack_position: 'none'
  dataset_split?: DatasetSplit
}

export type DatasetSplit = 'train' | 'test'
