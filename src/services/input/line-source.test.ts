import { PassThrough, Readable } from "node:stream"
import { describe, expect, it } from "vitest"
import { readSourceLines, type SourceLine, splitTerminator } from "./line-source.js"

async function collect(lines: AsyncIterable<SourceLine>): Promise<SourceLine[]> {
  const out: SourceLine[] = []
  for await (const line of lines) out.push(line)
  return out
}

describe("splitTerminator", () => {
  it("separates the line ending from the text", () => {
    expect(splitTerminator("a\n")).toEqual({ text: "a", eol: "\n" })
    expect(splitTerminator("a\r\n")).toEqual({ text: "a", eol: "\r\n" })
    expect(splitTerminator("a")).toEqual({ text: "a", eol: "" })
    expect(splitTerminator("\n")).toEqual({ text: "", eol: "\n" })
  })
})

describe("readSourceLines", () => {
  it("keeps each line's own terminator", async () => {
    const lines = await collect(readSourceLines(Readable.from([Buffer.from("a\nb\r\nc")])))
    expect(lines).toEqual([
      { text: "a", eol: "\n" },
      { text: "b", eol: "\r\n" },
      { text: "c", eol: "" }
    ])
  })

  it("joins lines split across chunks", async () => {
    const lines = await collect(readSourceLines(Readable.from(["I/Fo", "o(1): x\nnext", "\n"])))
    expect(lines).toEqual([
      { text: "I/Foo(1): x", eol: "\n" },
      { text: "next", eol: "\n" }
    ])
  })

  it("decodes characters split across buffers", async () => {
    const lines = await collect(readSourceLines(Readable.from([Buffer.from([0x63, 0xc3]), Buffer.from([0xa9, 0x0a])])))
    expect(lines).toEqual([{ text: "cé", eol: "\n" }])
  })

  it("keeps blank lines", async () => {
    const lines = await collect(readSourceLines(Readable.from(["a\n\nb\n"])))
    expect(lines.map((line) => line.text)).toEqual(["a", "", "b"])
  })

  it("yields nothing for empty input", async () => {
    expect(await collect(readSourceLines(Readable.from([])))).toEqual([])
  })

  it("throws an AbortError once the signal fires", async () => {
    const controller = new AbortController()
    const stream = new PassThrough()
    stream.write("a\n")
    const lines = readSourceLines(stream, controller.signal)

    expect(await lines.next()).toEqual({ done: false, value: { text: "a", eol: "\n" } })
    controller.abort()
    await expect(lines.next()).rejects.toMatchObject({ name: "AbortError" })
  })
})
