/**
 * Base interfaces and types for logcat line parsers
 */

/**
 * One logcat record split into its fields
 */
export interface LogRecord {
  severityCode: string // single uppercase letter, validated by the layout
  tag: string
  processId: string
  timestamp?: string // only for records in the timestamped shape
  message: string
}

/**
 * Which record shape the parser currently accepts.
 * The only transition is detecting-brief -> locked-timestamped.
 */
export type FormatState = "detecting-brief" | "locked-timestamped"

export interface LineParser {
  /**
   * Parse one line (without its terminator)
   * @returns the record, or null when the line fits neither shape
   */
  parse(line: string): LogRecord | null

  readonly state: FormatState
}
