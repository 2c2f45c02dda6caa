/**
 * The read -> parse -> color -> layout -> write loop
 *
 * Lines that fit neither logcat shape are written back unchanged. A record
 * whose severity letter is not one of V/D/I/W/E ends the run under the
 * "stop" policy, which is what the classic colored logcat script does;
 * "passthrough" writes such a record back raw and keeps going.
 */

import { defaultLogger, type Logger } from "../utils/logger.js"
import type { ColorAllocator } from "./colors/color-allocator.js"
import type { SourceLine } from "./input/line-source.js"
import type { LogcatLayout } from "./layout/index.js"
import type { LineParser } from "./parsers/index.js"

export type UnknownSeverityPolicy = "stop" | "passthrough"

export type TerminationReason = "end-of-stream" | "interrupted" | "unrecognized-severity"

export interface DriverOutcome {
  reason: TerminationReason
  linesRendered: number
  linesPassedThrough: number
}

export interface StreamDriverOptions {
  parser: LineParser
  colors: ColorAllocator
  layout: LogcatLayout
  // May return a promise to hold the next line until the output drains
  write: (text: string) => void | Promise<void>
  columns: () => number
  unknownSeverity?: UnknownSeverityPolicy
  logger?: Logger
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError"
}

export class StreamDriver {
  private nextLineNumber = 1
  private readonly unknownSeverity: UnknownSeverityPolicy
  private readonly logger: Logger

  constructor(private options: StreamDriverOptions) {
    this.unknownSeverity = options.unknownSeverity ?? "stop"
    this.logger = options.logger ?? defaultLogger.child("driver")
  }

  async run(lines: AsyncIterable<SourceLine> | Iterable<SourceLine>): Promise<DriverOutcome> {
    let linesRendered = 0
    let linesPassedThrough = 0
    const finish = (reason: TerminationReason): DriverOutcome => {
      this.logger.debug(`Stopped (${reason}) after ${linesRendered} records, ${linesPassedThrough} raw lines`)
      return { reason, linesRendered, linesPassedThrough }
    }

    try {
      for await (const line of lines) {
        const handled = await this.handle(line)
        if (handled === "stop") {
          return finish("unrecognized-severity")
        }
        if (handled === "rendered") {
          linesRendered++
        } else {
          linesPassedThrough++
        }
      }
    } catch (error) {
      if (isAbortError(error)) {
        return finish("interrupted")
      }
      throw error
    }

    return finish("end-of-stream")
  }

  private async handle(line: SourceLine): Promise<"rendered" | "passed-through" | "stop"> {
    const { parser, colors, layout, write, columns } = this.options
    const record = parser.parse(line.text)
    if (!record) {
      await write(line.text + line.eol)
      return "passed-through"
    }

    // Matched lines always consume a number, even if rendering then fails
    const lineNumber = this.nextLineNumber++
    const color = colors.colorFor(record.tag.trim())
    const result = layout.render(record, color, lineNumber, columns())

    if (result.kind === "rendered") {
      await write(result.text + line.eol)
      return "rendered"
    }

    if (this.unknownSeverity === "passthrough") {
      this.logger.trace(`Unrecognized severity "${result.severityCode}" on record ${lineNumber}, writing it raw`)
      await write(line.text + line.eol)
      return "passed-through"
    }

    this.logger.debug(`Unrecognized severity "${result.severityCode}" on record ${lineNumber}`)
    return "stop"
  }
}
