/**
 * Renders parsed logcat records as fixed-column rows:
 *
 *   <line no> <pid> <tag> <severity> [<time>] <message...>
 *                                            <message continued>
 */

import type { ChalkInstance } from "chalk"
import {
  type ColorId,
  DEFAULT_WIDTHS,
  isSeverity,
  type LayoutWidths,
  PROCESS_STYLE,
  SEVERITY_STYLES
} from "../../constants/log-colors.js"
import type { LogRecord } from "../parsers/index.js"
import { paint } from "./ansi.js"
import { center, indentWrap, tail } from "./text.js"

export type RenderResult =
  | { kind: "rendered"; text: string }
  | { kind: "unrecognized-severity"; severityCode: string }

export interface LayoutOptions {
  painter: ChalkInstance
  widths?: Partial<LayoutWidths>
}

export class LogcatLayout {
  private painter: ChalkInstance
  readonly widths: Readonly<LayoutWidths>

  constructor(options: LayoutOptions) {
    this.painter = options.painter
    this.widths = { ...DEFAULT_WIDTHS, ...options.widths }
  }

  /**
   * Width of everything before the message, including the timestamp
   * column when the record carries a timestamp
   */
  headerWidth(timestamped: boolean): number {
    const { number, process, tag, badge, time } = this.widths
    let width = 1 + number + tag + 1 + badge + 1
    if (process > 0) width += process + 1
    if (timestamped) width += time
    return width
  }

  render(record: LogRecord, color: ColorId, lineNumber: number, columns: number): RenderResult {
    if (!isSeverity(record.severityCode)) {
      return { kind: "unrecognized-severity", severityCode: record.severityCode }
    }
    const severity = record.severityCode
    const { number, process, tag, badge, time } = this.widths
    const parts: string[] = []

    parts.push(` ${String(lineNumber).padEnd(number)}`)

    if (process > 0) {
      parts.push(`${paint(this.painter, PROCESS_STYLE, center(record.processId.trim(), process))} `)
    }

    parts.push(paint(this.painter, { fg: color }, `${tail(record.tag.trim(), tag)} `))

    parts.push(`${paint(this.painter, SEVERITY_STYLES[severity], center(severity, badge))} `)

    const timestamped = record.timestamp !== undefined
    if (timestamped) {
      parts.push(`[${record.timestamp}] `.padEnd(time))
    }

    parts.push(indentWrap(record.message, this.headerWidth(timestamped), columns))

    return { kind: "rendered", text: parts.join("") }
  }
}
