/**
 * @fileoverview JSONL reading and writing
 *
 * Reading streams line by line and skips blank or unparsable lines with a
 * warning. Writing goes through one `JsonlWriter` per output file: records
 * produced in parallel must be funnelled through that single writer so
 * lines never interleave.
 *
 * @module lib/datasets/jsonl
 */

import { once } from "events"
import { createReadStream, createWriteStream, type WriteStream } from "fs"
import { access, mkdir } from "fs/promises"
import { dirname } from "path"
import { createInterface } from "readline"
import { finished } from "stream/promises"
import { logger } from "@/lib/logger"

export interface JsonlLine {
  /** 1-based line number in the file */
  lineNumber: number
  value: unknown
}

/**
 * Check if a file exists
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch {
    return false
  }
}

/**
 * Yield parsed JSON values from a JSONL file.
 */
export async function* readJsonl(path: string): AsyncGenerator<JsonlLine> {
  const lines = createInterface({
    input: createReadStream(path, { encoding: "utf-8" }),
    crlfDelay: Infinity,
  })

  let lineNumber = 0
  for await (const raw of lines) {
    lineNumber++
    const line = raw.trim()
    if (!line) continue

    let value: unknown
    try {
      value = JSON.parse(line)
    } catch (error) {
      logger.warn("Skipping unparsable JSONL line", {
        path,
        lineNumber,
        error: error instanceof Error ? error.message : String(error),
      })
      continue
    }
    yield { lineNumber, value }
  }
}

/**
 * Append-only JSONL writer. One instance owns one output file.
 *
 * The first stream error (a path that cannot be opened, a full disk) is
 * kept and rethrown by every later `write` and by `close`, so a failed
 * file is never reported as saved.
 */
export class JsonlWriter {
  private stream: WriteStream | null = null
  private failure: Error | null = null
  private count = 0

  private constructor(readonly path: string) {}

  /**
   * Create the parent directory and open (truncate) the file.
   */
  static async open(path: string): Promise<JsonlWriter> {
    await mkdir(dirname(path), { recursive: true })
    const writer = new JsonlWriter(path)
    const stream = createWriteStream(path, { encoding: "utf-8", flags: "w" })
    stream.on("error", (error) => {
      if (!writer.failure) writer.failure = error
    })
    writer.stream = stream
    return writer
  }

  /** Records accepted so far; only final once `close` has resolved */
  get written(): number {
    return this.count
  }

  async write(record: unknown): Promise<void> {
    if (this.failure) throw this.failure
    const stream = this.stream
    if (!stream) {
      throw new Error(`JsonlWriter for ${this.path} is closed`)
    }

    const line = JSON.stringify(record) + "\n"
    if (!stream.write(line)) {
      await once(stream, "drain")
    }
    this.count++
  }

  async writeAll(records: Iterable<unknown>): Promise<void> {
    for (const record of records) {
      await this.write(record)
    }
  }

  /**
   * Flush and close the file.
   *
   * @throws the stream's error when anything failed to open or write
   */
  async close(): Promise<void> {
    const stream = this.stream
    this.stream = null
    if (this.failure) throw this.failure
    if (!stream) return

    stream.end()
    try {
      await finished(stream)
    } catch (error) {
      throw this.failure ?? error
    }
  }
}
