import { once } from "node:events"
import type { Writable } from "node:stream"

/**
 * Writer for the formatted stream. When `stream` buffers past its high
 * water mark the returned promise holds the caller until "drain"; aborting
 * `signal` rejects it with an AbortError.
 */
export function createOutputWriter(stream: Writable, signal?: AbortSignal): (text: string) => void | Promise<void> {
  return (text) => {
    if (stream.write(text)) return
    return once(stream, "drain", { signal }).then(() => undefined)
  }
}
