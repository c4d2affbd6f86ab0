/**
 * @fileoverview Ablation dataset generation
 *
 * Runs every requested ablation variant for a paper. In strict mode a
 * single failed variant discards the whole paper so every paper in the
 * dataset has the full set of variants; replacement papers are then
 * drawn from the unused pool until the target count is reached or the
 * retry budget runs out.
 *
 * @module lib/datasets/variant-dataset
 */

import { MalformedDocumentError } from "@/lib/errors"
import { fmt, logger } from "@/lib/logger"
import type { MutationOptions } from "@/lib/section-detection/config"
import { createDocument } from "@/lib/section-detection/line-offset-index"
import { deleteSection } from "@/lib/text-mutation/delete-section"
import type { DeletionFailureReason } from "@/lib/text-mutation/types"
import { DEFAULT_VARIANT_TYPES, VARIANT_TARGETS } from "@/lib/variants/catalog"
import { buildVariantRecord } from "@/lib/variants/record-builder"
import type { Paper, VariantRecord, VariantType } from "@/lib/variants/types"
import { createSeededRandom } from "./sampling"

export interface VariantFailure {
  variantType: VariantType
  reason: DeletionFailureReason | "malformed_document"
  message: string
}

export interface PaperVariants {
  records: VariantRecord[]
  /** True when every requested variant succeeded */
  success: boolean
  failures: VariantFailure[]
}

export interface GenerateVariantsOptions {
  /** Discard all of a paper's records when any variant fails */
  strict?: boolean
  mutation?: MutationOptions
}

/**
 * Generate ablation variants for one paper.
 */
export function generateVariants(
  paper: Paper,
  variantTypes: readonly VariantType[] = DEFAULT_VARIANT_TYPES,
  options: GenerateVariantsOptions = {}
): PaperVariants {
  const strict = options.strict ?? true

  try {
    createDocument(paper.text)
  } catch (error) {
    if (!(error instanceof MalformedDocumentError)) throw error
    logger.warn("Paper has empty or invalid text, skipping", { title: paper.title })
    return {
      records: [],
      success: false,
      failures: [{ variantType: "original", reason: "malformed_document", message: error.message }],
    }
  }

  const records: VariantRecord[] = []
  const failures: VariantFailure[] = []

  for (const variantType of variantTypes) {
    const target = VARIANT_TARGETS[variantType]

    let text: string
    if (target === null) {
      text = paper.text
    } else {
      const result = deleteSection(paper.text, target, options.mutation)
      if (!result.ok) {
        logger.warn("Variant generation failed", {
          title: paper.title,
          variantType,
          reason: result.error.reason,
        })
        failures.push({ variantType, reason: result.error.reason, message: result.error.message })

        if (strict) {
          logger.info(fmt`Strict mode: paper ${paper.title} discarded at ${variantType}`)
          return { records: [], success: false, failures }
        }
        continue
      }
      text = result.value.mutatedText
    }

    records.push(buildVariantRecord(paper, variantType, text.trim()))
  }

  return { records, success: failures.length === 0, failures }
}

// ============================================================================
// Supplementary sampling
// ============================================================================

export interface RetryOptions extends GenerateVariantsOptions {
  /** Max replacement papers drawn from the unused pool */
  maxRetry?: number
}

export interface VariantDatasetResult {
  records: VariantRecord[]
  /** Papers that contributed records */
  successfulPapers: number
  /** Replacement papers drawn */
  retries: number
  /** Papers discarded by strict mode */
  discardedPapers: number
}

function paperKey(paper: Paper): string | null {
  return paper.id ?? paper.originalPath
}

/**
 * Generate variants for the sampled papers, replacing strict-mode
 * failures with unused papers from `allPapers` until `targetCount`
 * papers succeed.
 */
export function generateVariantsWithRetry(
  sampled: readonly Paper[],
  allPapers: readonly Paper[],
  variantTypes: readonly VariantType[],
  targetCount: number,
  seed: number,
  options: RetryOptions = {}
): VariantDatasetResult {
  const strict = options.strict ?? true
  const maxRetry = options.maxRetry ?? 100
  const random = createSeededRandom(seed)

  const used = new Set<string>()
  for (const paper of sampled) {
    const key = paperKey(paper)
    if (key) used.add(key)
  }
  const candidates = allPapers.filter((paper) => {
    const key = paperKey(paper)
    return key === null || !used.has(key)
  })

  const queue = [...sampled]
  const records: VariantRecord[] = []
  let successfulPapers = 0
  let retries = 0
  let discardedPapers = 0

  while (successfulPapers < targetCount) {
    let paper = queue.shift()
    if (!paper) {
      if (retries >= maxRetry) break
      if (candidates.length === 0) {
        logger.warn("Candidate pool empty, cannot supplement", { successfulPapers, targetCount })
        break
      }
      const [replacement] = candidates.splice(Math.floor(random() * candidates.length), 1)
      paper = replacement
      retries++
    }

    const result = generateVariants(paper, variantTypes, { strict, mutation: options.mutation })
    if (strict && !result.success) {
      discardedPapers++
      continue
    }

    if (result.records.length > 0) {
      records.push(...result.records)
      successfulPapers++
    }
  }

  if (successfulPapers < targetCount) {
    logger.warn("Generated fewer papers than targeted", { successfulPapers, targetCount })
  }

  return { records, successfulPapers, retries, discardedPapers }
}
