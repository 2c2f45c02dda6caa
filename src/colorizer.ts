/**
 * Wires the parser, color allocator and layout into a stream driver
 * over a readable source
 */

import type { Readable } from "node:stream"
import type { ChalkInstance } from "chalk"
import type { LayoutWidths } from "./constants/log-colors.js"
import { ColorAllocator } from "./services/colors/color-allocator.js"
import { readSourceLines } from "./services/input/line-source.js"
import { LogcatLayout } from "./services/layout/index.js"
import { type FormatState, LogcatLineParser } from "./services/parsers/index.js"
import { type DriverOutcome, StreamDriver, type UnknownSeverityPolicy } from "./services/stream-driver.js"
import type { Logger } from "./utils/logger.js"

export interface ColorizeOptions {
  input: Readable
  write: (text: string) => void | Promise<void>
  columns: () => number
  painter: ChalkInstance
  initialState?: FormatState
  widths?: Partial<LayoutWidths>
  unknownSeverity?: UnknownSeverityPolicy
  signal?: AbortSignal
  logger?: Logger
}

export function colorize(options: ColorizeOptions): Promise<DriverOutcome> {
  const driver = new StreamDriver({
    parser: new LogcatLineParser(options.initialState),
    colors: new ColorAllocator(),
    layout: new LogcatLayout({ painter: options.painter, widths: options.widths }),
    write: options.write,
    columns: options.columns,
    unknownSeverity: options.unknownSeverity,
    logger: options.logger
  })
  return driver.run(readSourceLines(options.input, options.signal))
}
