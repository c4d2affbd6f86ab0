import { describe, it, expect, beforeAll, afterAll } from "vitest"
import { mkdtemp, readFile, rm, writeFile } from "fs/promises"
import { tmpdir } from "os"
import { join } from "path"
import { JsonlWriter, fileExists, readJsonl, type JsonlLine } from "./jsonl"

let testDir: string

beforeAll(async () => {
  testDir = await mkdtemp(join(tmpdir(), "paper-probe-jsonl-"))
})

afterAll(async () => {
  await rm(testDir, { recursive: true, force: true })
})

async function collect(path: string): Promise<JsonlLine[]> {
  const lines: JsonlLine[] = []
  for await (const line of readJsonl(path)) {
    lines.push(line)
  }
  return lines
}

describe("fileExists", () => {
  it("detects present and missing files", async () => {
    const path = join(testDir, "present.jsonl")
    await writeFile(path, "")

    expect(await fileExists(path)).toBe(true)
    expect(await fileExists(join(testDir, "missing.jsonl"))).toBe(false)
  })
})

describe("readJsonl", () => {
  it("yields parsed values with their line numbers", async () => {
    const path = join(testDir, "mixed.jsonl")
    await writeFile(path, '{"a":1}\n\nnot json\n  {"b":[2,3]}  \n')

    expect(await collect(path)).toEqual([
      { lineNumber: 1, value: { a: 1 } },
      { lineNumber: 4, value: { b: [2, 3] } },
    ])
  })

  it("handles CRLF line endings", async () => {
    const path = join(testDir, "crlf.jsonl")
    await writeFile(path, '{"a":1}\r\n{"a":2}\r\n')

    expect((await collect(path)).map((l) => l.value)).toEqual([{ a: 1 }, { a: 2 }])
  })
})

describe("JsonlWriter", () => {
  it("creates parent directories and writes one record per line", async () => {
    const path = join(testDir, "nested", "out.jsonl")
    const writer = await JsonlWriter.open(path)
    await writer.writeAll([{ x: 1 }, { y: "z\nw" }])
    await writer.close()

    expect(writer.written).toBe(2)
    expect(await readFile(path, "utf-8")).toBe('{"x":1}\n{"y":"z\\nw"}\n')
  })

  it("truncates an existing file", async () => {
    const path = join(testDir, "truncate.jsonl")
    await writeFile(path, '{"old":true}\n')

    const writer = await JsonlWriter.open(path)
    await writer.write({ fresh: true })
    await writer.close()

    expect(await readFile(path, "utf-8")).toBe('{"fresh":true}\n')
  })

  it("rejects writes after close", async () => {
    const path = join(testDir, "closed.jsonl")
    const writer = await JsonlWriter.open(path)
    await writer.close()

    await expect(writer.write({ late: true })).rejects.toThrow(`JsonlWriter for ${path} is closed`)
  })

  it("rejects close when the file cannot be opened", async () => {
    const writer = await JsonlWriter.open(testDir)
    await writer.write({ a: 1 })

    await expect(writer.close()).rejects.toThrow(/EISDIR/)
  })

  it("rejects writes after the stream has failed", async () => {
    const writer = await JsonlWriter.open(testDir)
    await expect(writer.close()).rejects.toThrow(/EISDIR/)

    await expect(writer.write({ b: 2 })).rejects.toThrow(/EISDIR/)
  })

  it("round-trips through readJsonl", async () => {
    const path = join(testDir, "roundtrip.jsonl")
    const records = [{ id: "p1", text: "Line one\nLine two" }, { id: "p2", rates: [5, 6] }]
    const writer = await JsonlWriter.open(path)
    await writer.writeAll(records)
    await writer.close()

    expect((await collect(path)).map((l) => l.value)).toEqual(records)
  })
})
