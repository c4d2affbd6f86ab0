#!/usr/bin/env npx tsx
/**
 * Section Audit Script
 *
 * Reports how often each section can be located in a paper export and
 * which heading rule matched, so heading coverage can be checked before
 * generating datasets.
 *
 * Usage: npm run audit:sections -- [path/to/papers.jsonl] [limit]
 */

import "../instrument"

import { loadDatasetConfig } from "@/lib/config"
import { MalformedDocumentError, isAppError, toAppError } from "@/lib/errors"
import { loadPapers } from "@/lib/datasets"
import {
  SECTION_TAGS,
  createDocument,
  isContentTag,
  locateSection,
  resolveSectionSpan,
  type LineOffsetIndex,
  type SectionTag,
} from "@/lib/section-detection"
import { removeContent } from "@/lib/text-mutation"

interface TagAudit {
  found: number
  /** Located sections whose span is only the heading line */
  emptySpans: number
  rules: Map<string, number>
}

async function main() {
  console.log("🔍 Section Audit\n")

  const settings = loadDatasetConfig()
  const path = process.argv[2] ?? settings.SOURCE_TRAIN_JSONL
  const limit = process.argv[3] ? Number(process.argv[3]) : Infinity

  const papers = (await loadPapers(path)).slice(0, limit)
  console.log(`   File: ${path}`)
  console.log(`   Papers: ${papers.length}\n`)
  if (papers.length === 0) {
    console.error("❌ No papers to audit")
    process.exit(1)
  }

  const audits = new Map<SectionTag, TagAudit>(
    SECTION_TAGS.map((tag): [SectionTag, TagAudit] => [
      tag,
      { found: 0, emptySpans: 0, rules: new Map<string, number>() },
    ])
  )
  let malformed = 0

  for (const paper of papers) {
    let document: LineOffsetIndex
    try {
      document = createDocument(paper.text)
    } catch (error) {
      if (!(error instanceof MalformedDocumentError)) throw error
      malformed++
      continue
    }

    for (const tag of SECTION_TAGS) {
      const audit = audits.get(tag)
      if (!audit) continue

      if (isContentTag(tag)) {
        if (removeContent(document.text, tag).contentMatched) audit.found++
        continue
      }

      const heading = locateSection(document, tag)
      if (!heading) continue

      audit.found++
      audit.rules.set(heading.rule.label, (audit.rules.get(heading.rule.label) ?? 0) + 1)
      const span = resolveSectionSpan(document, heading)
      if (span.endLine - span.startLine === 1) audit.emptySpans++
    }
  }

  const usable = papers.length - malformed
  console.log("Tag            Found        Empty  Rules")
  console.log("-".repeat(70))
  for (const [tag, audit] of audits) {
    const rate = usable > 0 ? ((audit.found / usable) * 100).toFixed(1) : "0.0"
    const rules = [...audit.rules.entries()]
      .sort((a, b) => b[1] - a[1])
      .map(([label, count]) => `${label}=${count}`)
      .join(", ")
    console.log(
      `${tag.padEnd(14)} ${`${audit.found}/${usable}`.padEnd(7)} ${`${rate}%`.padStart(6)} ${String(audit.emptySpans).padStart(5)}  ${rules}`
    )
  }
  if (malformed > 0) {
    console.log(`\n⚠️  ${malformed} papers had no usable text`)
  }
}

main().catch((error: unknown) => {
  console.error("❌ Audit failed:", toAppError(error).toJSON())
  if (!isAppError(error)) console.error(error)
  process.exit(1)
})
