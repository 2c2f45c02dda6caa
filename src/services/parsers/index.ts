/**
 * Public API for the log parsers module
 * Only exposes what external consumers need
 */

export type { FormatState, LineParser, LogRecord } from "./log-parsers/index.js"
export { LogcatLineParser } from "./log-parsers/index.js"
