/**
 * Log format parsers module exports
 */

export type { FormatState, LineParser, LogRecord } from "./base.js"
export { LogcatLineParser } from "./logcat.js"
