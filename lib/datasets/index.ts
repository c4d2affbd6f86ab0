/**
 * @fileoverview Dataset generation barrel export
 * @module lib/datasets
 */

export { readJsonl, JsonlWriter, fileExists, type JsonlLine } from "./jsonl"
export { loadPapers, loadRecords } from "./paper-loader"
export {
  createSeededRandom,
  sampleWithoutReplacement,
  samplePapers,
  targetCount,
  type RandomSource,
} from "./sampling"
export {
  generateVariants,
  generateVariantsWithRetry,
  type GenerateVariantsOptions,
  type PaperVariants,
  type RetryOptions,
  type VariantDatasetResult,
  type VariantFailure,
} from "./variant-dataset"
export {
  generateAttackVariants,
  selectBasePapers,
  summarizeSectionMatches,
  type AttackDatasetRecord,
  type BasePapers,
  type GenerateAttacksOptions,
  type SectionMatchStats,
} from "./attack-dataset"
