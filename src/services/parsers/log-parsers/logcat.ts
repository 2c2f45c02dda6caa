/**
 * Parser for `adb logcat -v brief` and `adb logcat -v time` lines
 *
 *   brief:  I/ActivityManager(  123): Starting activity
 *   time:   01-02 03:04:05.678 I/ActivityManager(  123): Starting activity
 */

import type { FormatState, LineParser, LogRecord } from "./base.js"

const BRIEF_PATTERN = /^([A-Z])\/([^(]+)\(([^)]+)\): (.*)$/
const TIMESTAMPED_PATTERN = /^([-:. 0-9]+) ([A-Z])\/([^(]+)\(([^)]+)\): (.*)$/

export class LogcatLineParser implements LineParser {
  private formatState: FormatState

  constructor(initialState: FormatState = "detecting-brief") {
    this.formatState = initialState
  }

  get state(): FormatState {
    return this.formatState
  }

  parse(line: string): LogRecord | null {
    if (this.formatState === "locked-timestamped") {
      return matchTimestamped(line)
    }

    const brief = matchBrief(line)
    if (brief) {
      return brief
    }

    // adb switches to the time format when its output goes to a pipe
    const timestamped = matchTimestamped(line)
    if (timestamped) {
      this.formatState = "locked-timestamped"
    }
    return timestamped
  }
}

function matchBrief(line: string): LogRecord | null {
  const match = BRIEF_PATTERN.exec(line)
  if (!match) return null

  const [, severityCode, tag, processId, message] = match
  return { severityCode, tag, processId, message }
}

function matchTimestamped(line: string): LogRecord | null {
  const match = TIMESTAMPED_PATTERN.exec(line)
  if (!match) return null

  const [, timestamp, severityCode, tag, processId, message] = match
  return { severityCode, tag, processId, timestamp, message }
}
