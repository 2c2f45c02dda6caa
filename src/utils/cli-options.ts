import { InvalidArgumentError } from "commander"
import { DEFAULT_COLUMNS } from "../constants/log-colors.js"
import type { LogcatFormat } from "../services/input/adb.js"
import type { ColorMode } from "../services/layout/index.js"
import type { FormatState } from "../services/parsers/index.js"
import type { TerminationReason, UnknownSeverityPolicy } from "../services/stream-driver.js"
import type { UserConfig } from "./user-config.js"

export interface CliOptions {
  brief?: boolean
  unknownSeverity?: UnknownSeverityPolicy
  color: ColorMode
  width?: number
  debug?: boolean
}

export interface RunSettings {
  // Spawn adb with this format, or undefined to read the piped stdin
  spawnFormat?: LogcatFormat
  initialState: FormatState
  unknownSeverity: UnknownSeverityPolicy
}

export function parseColumns(value: string): number {
  const columns = Number(value)
  if (!/^\d+$/.test(value.trim()) || !Number.isInteger(columns) || columns <= 0) {
    throw new InvalidArgumentError("Expected a positive whole number of columns.")
  }
  return columns
}

export function parseColorMode(value: string): ColorMode {
  if (value === "auto" || value === "always" || value === "never") {
    return value
  }
  throw new InvalidArgumentError("Expected one of: auto, always, never.")
}

export function parseUnknownSeverity(value: string): UnknownSeverityPolicy {
  if (value === "stop" || value === "passthrough") {
    return value
  }
  throw new InvalidArgumentError("Expected one of: stop, passthrough.")
}

/**
 * Combine flags, the config file and whether stdin is a terminal.
 * Flags win over the config file. Only a spawned `-v time` stream is
 * known to carry timestamps from the first line.
 */
export function resolveRunSettings(options: CliOptions, userConfig: UserConfig, stdinIsTTY: boolean): RunSettings {
  const unknownSeverity = options.unknownSeverity ?? userConfig.unknownSeverity ?? "stop"
  if (!stdinIsTTY) {
    return { initialState: "detecting-brief", unknownSeverity }
  }

  const spawnFormat = options.brief ? "brief" : (userConfig.format ?? "time")
  return {
    spawnFormat,
    initialState: spawnFormat === "time" ? "locked-timestamped" : "detecting-brief",
    unknownSeverity
  }
}

/**
 * Exit status to report once the run is over. adb's own status only
 * matters when its stream ran to the end; otherwise we stopped it.
 */
export function exitCodeFor(reason: TerminationReason, adbExitCode: number | undefined): number | undefined {
  if (reason !== "end-of-stream" || adbExitCode === undefined || adbExitCode === 0) {
    return undefined
  }
  return adbExitCode
}

/**
 * Terminal width: explicit flag, then the tty, then $COLUMNS, then 80
 */
export function resolveColumns(explicit: number | undefined, ttyColumns: number | undefined, envColumns?: string): number {
  if (explicit !== undefined) return explicit
  if (ttyColumns !== undefined && ttyColumns > 0) return ttyColumns

  const fromEnv = Number(envColumns)
  if (envColumns && Number.isInteger(fromEnv) && fromEnv > 0) return fromEnv

  return DEFAULT_COLUMNS
}
