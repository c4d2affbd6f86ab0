/**
 * @fileoverview Variant records barrel export
 * @module lib/variants
 */

export * from './types'
export { VARIANT_TARGETS, DEFAULT_VARIANT_TYPES, ATTACK_PROMPTS } from './catalog'
export {
  baseId,
  buildVariantRecord,
  buildAttackRecord,
  buildAttackControlRecord,
} from './record-builder'
export {
  PaperSourceSchema,
  extractPaperText,
  toPaper,
  type PaperSource,
} from './paper-source'
