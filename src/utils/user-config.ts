import { existsSync, readFileSync } from "fs"
import { homedir } from "os"
import { join } from "path"
import type { LayoutWidths } from "../constants/log-colors.js"
import type { LogcatFormat } from "../services/input/adb.js"
import type { UnknownSeverityPolicy } from "../services/stream-driver.js"
import { defaultLogger, type Logger } from "./logger.js"

export interface UserConfig {
  widths?: Partial<LayoutWidths>
  format?: LogcatFormat
  unknownSeverity?: UnknownSeverityPolicy
}

const WIDTH_KEYS: readonly (keyof LayoutWidths)[] = ["number", "badge", "tag", "process", "time"]

export function getUserConfigPath(): string {
  const configHome = process.env.XDG_CONFIG_HOME || join(homedir(), ".config")
  return join(configHome, "colored-logcat", "config.json")
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function normalizeWidths(value: unknown): Partial<LayoutWidths> | undefined {
  if (!isRecord(value)) return undefined

  const widths: Partial<LayoutWidths> = {}
  for (const key of WIDTH_KEYS) {
    const width = value[key]
    // Only the process column may be switched off with a non-positive width
    if (typeof width === "number" && Number.isInteger(width) && (width > 0 || key === "process")) {
      widths[key] = width
    }
  }
  return Object.keys(widths).length > 0 ? widths : undefined
}

export function normalizeUserConfig(parsed: unknown): UserConfig {
  if (!isRecord(parsed)) return {}

  const config: UserConfig = {}
  const widths = normalizeWidths(parsed.widths)
  if (widths) config.widths = widths
  if (parsed.format === "brief" || parsed.format === "time") config.format = parsed.format
  if (parsed.unknownSeverity === "stop" || parsed.unknownSeverity === "passthrough") {
    config.unknownSeverity = parsed.unknownSeverity
  }
  return config
}

export function loadUserConfig(logger: Logger = defaultLogger): UserConfig {
  const configPath = getUserConfigPath()

  if (!existsSync(configPath)) {
    return {}
  }

  try {
    return normalizeUserConfig(JSON.parse(readFileSync(configPath, "utf-8")))
  } catch (error) {
    logger.warn(`Ignoring unreadable config ${configPath}: ${error instanceof Error ? error.message : String(error)}`)
    return {}
  }
}
