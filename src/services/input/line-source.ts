/**
 * Line splitting for the logcat input stream
 */

import { StringDecoder } from "node:string_decoder"
import { addAbortSignal, type Readable } from "node:stream"

/**
 * One input line and the terminator it arrived with ("\n", "\r\n", or ""
 * for a last line without one)
 */
export interface SourceLine {
  text: string
  eol: string
}

export function splitTerminator(raw: string): SourceLine {
  if (raw.endsWith("\r\n")) return { text: raw.slice(0, -2), eol: "\r\n" }
  if (raw.endsWith("\n")) return { text: raw.slice(0, -1), eol: "\n" }
  return { text: raw, eol: "" }
}

/**
 * Read `stream` line by line. Aborting `signal` destroys the stream, which
 * makes the iteration throw an AbortError.
 */
export async function* readSourceLines(stream: Readable, signal?: AbortSignal): AsyncGenerator<SourceLine> {
  if (signal) {
    addAbortSignal(signal, stream)
  }

  const decoder = new StringDecoder("utf8")
  let pending = ""

  for await (const chunk of stream) {
    pending += typeof chunk === "string" ? chunk : decoder.write(chunk)

    let newline = pending.indexOf("\n")
    while (newline !== -1) {
      yield splitTerminator(pending.slice(0, newline + 1))
      pending = pending.slice(newline + 1)
      newline = pending.indexOf("\n")
    }
  }

  pending += decoder.end()
  if (pending.length > 0) {
    yield splitTerminator(pending)
  }
}
