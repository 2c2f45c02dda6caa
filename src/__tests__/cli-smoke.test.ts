/**
 * Smoke tests for the CLI entry point, loaded from source through tsx
 */

import { execFileSync, spawnSync } from "child_process"
import { mkdtempSync, rmSync } from "fs"
import { tmpdir } from "os"
import { join } from "path"
import { afterAll, beforeAll, describe, expect, test } from "vitest"

describe("CLI Smoke Tests", () => {
  const cliPath = join(process.cwd(), "src", "cli.ts")
  let configHome = ""

  beforeAll(() => {
    // Empty config home so a developer's own config file does not leak in
    configHome = mkdtempSync(join(tmpdir(), "colored-logcat-smoke-"))
  })

  afterAll(() => {
    rmSync(configHome, { recursive: true, force: true })
  })

  const run = (args: string[], input = "") =>
    execFileSync(process.execPath, ["--import", "tsx", cliPath, ...args], {
      encoding: "utf8",
      input,
      timeout: 20000,
      env: { ...process.env, XDG_CONFIG_HOME: configHome, COLORED_LOGCAT_LOG_LEVEL: "ERROR" }
    })

  test("CLI displays help", () => {
    const output = run(["--help"])

    expect(output).toContain("Column-aligned, color-highlighted adb logcat viewer")
    expect(output).toContain("--unknown-severity <policy>")
    expect(output).toContain("--color <when>")
    expect(output).toContain("--width <columns>")
  }, 30000)

  test("CLI displays version", () => {
    expect(run(["--version"]).trim()).toBe("0.1.0")
  }, 30000)

  test("CLI formats a piped logcat line", () => {
    const output = run(["--color", "never", "--width", "120"], "I/Foo(1): hello\n")

    expect(output).toBe(` 1        1     ${"Foo".padStart(25)}  I  hello\n`)
  }, 30000)

  test("CLI writes unknown severities back raw under passthrough", () => {
    const output = run(
      ["--color", "never", "--width", "120", "--unknown-severity", "passthrough"],
      "Z/Foo(1): raw\nI/Foo(1): after\n"
    )

    expect(output).toBe(`Z/Foo(1): raw\n 2        1     ${"Foo".padStart(25)}  I  after\n`)
  }, 30000)

  test("CLI rejects an unknown severity policy", () => {
    const result = spawnSync(process.execPath, ["--import", "tsx", cliPath, "--unknown-severity", "maybe"], {
      encoding: "utf8",
      input: "",
      timeout: 20000,
      env: { ...process.env, XDG_CONFIG_HOME: configHome }
    })

    expect(result.status).toBe(1)
    expect(result.stderr).toContain("Expected one of: stop, passthrough.")
  }, 30000)
})
