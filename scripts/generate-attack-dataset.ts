#!/usr/bin/env npx tsx
/**
 * Attack Dataset Generator
 *
 * Takes the base papers of an existing ablation dataset and inserts each
 * canned reviewer-manipulation prompt at each section position.
 *
 * Usage: npm run generate:attacks
 */

import "../instrument"

import { loadDatasetConfig } from "@/lib/config"
import { isAppError, toAppError } from "@/lib/errors"
import {
  JsonlWriter,
  generateAttackVariants,
  loadRecords,
  selectBasePapers,
  summarizeSectionMatches,
  type AttackDatasetRecord,
} from "@/lib/datasets"
import { logger } from "@/lib/logger"
import { INSERTION_POSITIONS } from "@/lib/section-detection"
import { ATTACK_PROMPTS, ATTACK_TYPES, type DatasetSplit, type Paper } from "@/lib/variants"

function generateSplit(split: DatasetSplit, papers: Paper[], minTextLength: number) {
  const records: AttackDatasetRecord[] = []
  let skipped = 0

  for (const paper of papers) {
    const variants = generateAttackVariants(paper, { minTextLength })
    if (variants.length === 0) {
      skipped++
      logger.warn("Paper skipped: text too short or malformed", {
        title: paper.title,
        length: paper.text.length,
      })
      continue
    }
    for (const record of variants) {
      records.push({ ...record, dataset_split: split })
    }
  }

  console.log(`   ${split}: ${records.length} records (skipped ${skipped} papers)`)
  return records
}

async function writeRecords(path: string, records: AttackDatasetRecord[]) {
  const writer = await JsonlWriter.open(path)
  try {
    await writer.writeAll(records)
  } finally {
    await writer.close()
  }
  console.log(`   ✅ Saved ${writer.written} records to ${path}`)
}

async function main() {
  console.log("🎯 Attack Dataset Generator\n")

  const settings = loadDatasetConfig()
  const perPaper = 1 + ATTACK_TYPES.length * INSERTION_POSITIONS.length
  console.log(`   seed=${settings.ATTACK_SEED} base papers=${settings.ATTACK_SAMPLE_SIZE}`)
  console.log(`   attacks: ${ATTACK_TYPES.join(", ")}`)
  console.log(`   positions: ${INSERTION_POSITIONS.join(", ")}`)
  console.log(`   records per paper: ${perPaper}\n`)
  for (const type of ATTACK_TYPES) {
    console.log(`   ${type}: ${ATTACK_PROMPTS[type].slice(0, 60)}...`)
  }

  console.log("\nLoading ablation datasets...")
  const trainRows = await loadRecords(settings.VARIANT_TRAIN_JSONL)
  const testRows = await loadRecords(settings.VARIANT_TEST_JSONL)
  if (trainRows.length === 0 && testRows.length === 0) {
    console.error("❌ No variant records found. Run generate:variants first.")
    process.exit(1)
  }

  const base = selectBasePapers(trainRows, testRows, settings.ATTACK_SAMPLE_SIZE, settings.ATTACK_SEED)
  console.log(`   Base papers: ${base.train.length} train + ${base.test.length} test`)

  console.log("\nGenerating attack variants...")
  const train = generateSplit("train", base.train, settings.MIN_ATTACK_TEXT_LENGTH)
  const test = generateSplit("test", base.test, settings.MIN_ATTACK_TEXT_LENGTH)

  console.log("\nSection matching rate:")
  const stats = summarizeSectionMatches([...train, ...test])
  for (const position of INSERTION_POSITIONS) {
    const { found, total } = stats[position]
    const rate = total > 0 ? ((found / total) * 100).toFixed(1) : "0.0"
    console.log(`   ${position.padEnd(14)} ${found}/${total} (${rate}%)`)
  }

  console.log("\nSaving datasets...")
  await writeRecords(settings.ATTACK_TRAIN_JSONL, train)
  await writeRecords(settings.ATTACK_TEST_JSONL, test)
}

main().catch((error: unknown) => {
  console.error("❌ Generation failed:", toAppError(error).toJSON())
  if (!isAppError(error)) console.error(error)
  process.exit(1)
})
