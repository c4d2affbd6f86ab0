/**
 * @fileoverview Paper Loader
 *
 * Loads source papers from a JSONL export. Rows that fail schema
 * validation are skipped with a warning; a missing file yields no papers.
 *
 * @module lib/datasets/paper-loader
 */

import { DatasetLoadError } from "@/lib/errors"
import { logger } from "@/lib/logger"
import { PaperSourceSchema, toPaper } from "@/lib/variants/paper-source"
import type { Paper } from "@/lib/variants/types"
import { fileExists, readJsonl } from "./jsonl"

/**
 * Read every paper row from `path`.
 *
 * @throws {DatasetLoadError} when the file exists but cannot be read
 */
export async function loadPapers(path: string): Promise<Paper[]> {
  if (!(await fileExists(path))) {
    logger.warn("Paper file does not exist", { path })
    return []
  }

  const papers: Paper[] = []
  try {
    for await (const { lineNumber, value } of readJsonl(path)) {
      const parsed = PaperSourceSchema.safeParse(value)
      if (!parsed.success) {
        logger.warn("Skipping invalid paper row", {
          path,
          lineNumber,
          issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "),
        })
        continue
      }
      papers.push(toPaper(parsed.data, lineNumber, path))
    }
  } catch (error) {
    throw new DatasetLoadError(`Failed to load ${path}`, [
      { field: "path", message: error instanceof Error ? error.message : String(error) },
    ])
  }

  return papers
}

/**
 * Read raw rows without paper extraction. Used for datasets that are
 * already variant records.
 */
export async function loadRecords(path: string): Promise<Record<string, unknown>[]> {
  if (!(await fileExists(path))) {
    logger.warn("Record file does not exist", { path })
    return []
  }

  const records: Record<string, unknown>[] = []
  try {
    for await (const { value } of readJsonl(path)) {
      if (isPlainObject(value)) records.push(value)
    }
  } catch (error) {
    throw new DatasetLoadError(`Failed to load ${path}`, [
      { field: "path", message: error instanceof Error ? error.message : String(error) },
    ])
  }
  return records
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}
