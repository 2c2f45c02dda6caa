#!/usr/bin/env node

import { readFileSync } from "fs"
import { dirname, join } from "path"
import { fileURLToPath } from "url"
import chalk from "chalk"
import { Command } from "commander"
import { colorize } from "./colorizer.js"
import {
  buildLogcatCommand,
  type LogcatProcess,
  spawnLogcat,
  splitAdbArgs,
  superviseLogcat
} from "./services/input/adb.js"
import { createPainter } from "./services/layout/index.js"
import {
  type CliOptions,
  exitCodeFor,
  parseColorMode,
  parseColumns,
  parseUnknownSeverity,
  resolveColumns,
  resolveRunSettings
} from "./utils/cli-options.js"
import { defaultLogger, LogLevel } from "./utils/logger.js"
import { createOutputWriter } from "./utils/output.js"
import { loadUserConfig } from "./utils/user-config.js"

function getVersion(): string {
  try {
    const currentFile = fileURLToPath(import.meta.url)
    const packageRoot = dirname(dirname(currentFile)) // Go up from dist/ to package root
    const packageJson: unknown = JSON.parse(readFileSync(join(packageRoot, "package.json"), "utf8"))
    if (typeof packageJson === "object" && packageJson !== null && "version" in packageJson) {
      return String(packageJson.version)
    }
  } catch (error) {
    defaultLogger.debug(`Could not read package version: ${error instanceof Error ? error.message : String(error)}`)
  }
  return "0.0.0"
}

function waitForExit(child: LogcatProcess): Promise<number> {
  return new Promise((resolve) => {
    child.once("exit", (code) => resolve(code ?? 0))
    child.once("error", (error: NodeJS.ErrnoException) => {
      if (error.code === "ENOENT") {
        defaultLogger.error("adb was not found on PATH. Install the Android platform tools or pipe logcat output in.")
      } else {
        defaultLogger.error(`adb failed: ${error.message}`)
      }
      resolve(1)
    })
  })
}

const program = new Command()

program
  .name("colored-logcat")
  .description("Column-aligned, color-highlighted adb logcat viewer")
  .version(getVersion())
  .argument("[adb-args...]", "device selector (-d, -e, -s <serial>) and logcat filters, forwarded to adb")
  .option("--brief", "spawn adb logcat with -v brief instead of -v time")
  .option(
    "--unknown-severity <policy>",
    "on a severity letter other than V/D/I/W/E: stop (end the stream) or passthrough (write the line unchanged)",
    parseUnknownSeverity
  )
  .option("--color <when>", "colorize output: auto, always or never", parseColorMode, "auto")
  .option("--width <columns>", "wrap messages at this width instead of the terminal's", parseColumns)
  .option("--debug", "log diagnostics to stderr")
  .allowUnknownOption()
  .action(async (adbArgs: string[], options: CliOptions) => {
    const logger = defaultLogger
    if (options.debug) {
      logger.setLevel(LogLevel.DEBUG)
    }

    const userConfig = loadUserConfig(logger)
    const settings = resolveRunSettings(options, userConfig, process.stdin.isTTY === true)
    const abort = new AbortController()
    process.once("SIGINT", () => abort.abort())
    process.stdout.on("error", (error: NodeJS.ErrnoException) => {
      // Reader went away (e.g. `| head`)
      if (error.code !== "EPIPE") {
        logger.error(`Cannot write output: ${error.message}`)
        process.exitCode = 1
      }
      abort.abort()
    })

    let child: LogcatProcess | undefined
    let childExit: Promise<number> | undefined

    if (settings.spawnFormat) {
      const command = buildLogcatCommand(splitAdbArgs(adbArgs), settings.spawnFormat)
      logger.debug(`Spawning: ${command.join(" ")}`)
      child = spawnLogcat(command)
      childExit = waitForExit(child)
    } else if (adbArgs.length > 0) {
      logger.warn(`Reading from a pipe, ignoring adb arguments: ${adbArgs.join(" ")}`)
    }

    const formatting = () =>
      colorize({
        input: child ? child.stdout : process.stdin,
        write: createOutputWriter(process.stdout, abort.signal),
        columns: () => resolveColumns(options.width, process.stdout.columns, process.env.COLUMNS),
        painter: createPainter(options.color, chalk.level),
        initialState: settings.initialState,
        widths: userConfig.widths,
        unknownSeverity: settings.unknownSeverity,
        signal: abort.signal,
        logger: logger.child("driver")
      })

    if (!child || !childExit) {
      await formatting()
      return
    }

    const { outcome, adbExitCode } = await superviseLogcat(child, childExit, formatting)
    const code = exitCodeFor(outcome.reason, adbExitCode)
    if (code !== undefined && process.exitCode === undefined) {
      process.exitCode = code
    }
  })

program.parseAsync().catch((error: unknown) => {
  defaultLogger.error(error instanceof Error ? error.message : String(error))
  process.exitCode = 1
})
