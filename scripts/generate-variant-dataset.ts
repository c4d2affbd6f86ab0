#!/usr/bin/env npx tsx
/**
 * Ablation Dataset Generator
 *
 * Samples papers from the train/test exports, removes one section per
 * variant and writes every variant record to JSONL.
 *
 * Usage: npm run generate:variants
 */

import "../instrument"

import { loadDatasetConfig, type DatasetConfig } from "@/lib/config"
import { isAppError, toAppError } from "@/lib/errors"
import {
  JsonlWriter,
  generateVariantsWithRetry,
  loadPapers,
  samplePapers,
  targetCount,
} from "@/lib/datasets"
import { DEFAULT_VARIANT_TYPES } from "@/lib/variants"
import type { Paper } from "@/lib/variants"

interface SplitSummary {
  split: string
  available: number
  target: number
  successful: number
  discarded: number
  retries: number
  records: number
}

async function generateSplit(
  split: string,
  papers: Paper[],
  outputPath: string,
  seed: number,
  settings: DatasetConfig
): Promise<SplitSummary> {
  const target = targetCount(papers.length, settings.SAMPLE_RATIO)
  const sampled = samplePapers(papers, settings.SAMPLE_RATIO, seed)

  console.log(`   ${split}: ${papers.length} papers, target ${target}`)

  const result = generateVariantsWithRetry(sampled, papers, DEFAULT_VARIANT_TYPES, target, seed, {
    strict: settings.STRICT_MODE,
    maxRetry: settings.MAX_RETRY_ATTEMPTS,
  })

  const writer = await JsonlWriter.open(outputPath)
  try {
    await writer.writeAll(result.records)
  } finally {
    await writer.close()
  }
  console.log(`   ✅ Saved ${writer.written} records to ${outputPath}`)

  return {
    split,
    available: papers.length,
    target,
    successful: result.successfulPapers,
    discarded: result.discardedPapers,
    retries: result.retries,
    records: result.records.length,
  }
}

async function main() {
  console.log("🧪 Ablation Dataset Generator\n")

  const settings = loadDatasetConfig()
  console.log(`   seed=${settings.DATASET_SEED} ratio=${settings.SAMPLE_RATIO} strict=${settings.STRICT_MODE}`)
  console.log(`   variants: ${DEFAULT_VARIANT_TYPES.join(", ")}\n`)

  console.log("Loading papers...")
  const train = await loadPapers(settings.SOURCE_TRAIN_JSONL)
  const test = await loadPapers(settings.SOURCE_TEST_JSONL)

  if (train.length === 0 && test.length === 0) {
    console.error("❌ No papers loaded. Check SOURCE_TRAIN_JSONL / SOURCE_TEST_JSONL.")
    process.exit(1)
  }

  console.log("\nGenerating variants...")
  const summaries = [
    await generateSplit("train", train, settings.VARIANT_TRAIN_JSONL, settings.DATASET_SEED, settings),
    await generateSplit("test", test, settings.VARIANT_TEST_JSONL, settings.DATASET_SEED + 1, settings),
  ]

  console.log("\n" + "=".repeat(60))
  console.log("SUMMARY")
  console.log("=".repeat(60))
  for (const s of summaries) {
    console.log(`\n${s.split}:`)
    console.log(`   Target papers:     ${s.target} of ${s.available}`)
    console.log(`   Successful papers: ${s.successful}`)
    console.log(`   Discarded papers:  ${s.discarded}`)
    console.log(`   Replacement draws: ${s.retries}`)
    console.log(`   Records:           ${s.records}`)
  }
}

main().catch((error: unknown) => {
  console.error("❌ Generation failed:", toAppError(error).toJSON())
  if (!isAppError(error)) console.error(error)
  process.exit(1)
})
