/**
 * Spawning `adb logcat` when nothing is piped in
 */

import { type ChildProcessByStdio, spawn } from "node:child_process"
import type { Readable } from "node:stream"
import type { DriverOutcome } from "../stream-driver.js"

export type LogcatFormat = "brief" | "time"

export interface AdbArgs {
  device: string[] // e.g. ["-d"], ["-e"], ["-s", "emulator-5554"], or []
  filters: string[] // forwarded to logcat untouched
}

/**
 * Pull a leading device selector off the free-form arguments.
 * Everything after it is a logcat filter expression.
 */
export function splitAdbArgs(args: readonly string[]): AdbArgs {
  const [first, second] = args
  if (first === "-d" || first === "-e") {
    return { device: [first], filters: args.slice(1) }
  }
  if (first === "-s" && second !== undefined) {
    return { device: [first, second], filters: args.slice(2) }
  }
  return { device: [], filters: [...args] }
}

export function buildLogcatCommand(args: AdbArgs, format: LogcatFormat): string[] {
  return ["adb", ...args.device, "logcat", "-v", format, ...args.filters]
}

export type LogcatProcess = ChildProcessByStdio<null, Readable, null>

export function spawnLogcat(command: readonly string[]): LogcatProcess {
  const [binary, ...rest] = command
  return spawn(binary, rest, { stdio: ["ignore", "pipe", "inherit"] })
}

export interface SupervisedRun {
  outcome: DriverOutcome
  adbExitCode: number
}

/**
 * Format the child's output with `formatting`, then make sure adb is gone.
 * The child is killed unless its stream ran to the end, and its exit is
 * awaited before returning, including when formatting throws.
 */
export async function superviseLogcat(
  child: Pick<LogcatProcess, "kill">,
  exit: Promise<number>,
  formatting: () => Promise<DriverOutcome>
): Promise<SupervisedRun> {
  let outcome: DriverOutcome
  try {
    outcome = await formatting()
  } catch (error) {
    child.kill()
    await exit
    throw error
  }

  if (outcome.reason !== "end-of-stream") {
    child.kill()
  }
  return { outcome, adbExitCode: await exit }
}
