import { InvalidArgumentError } from "commander"
import { describe, expect, it } from "vitest"
import {
  type CliOptions,
  exitCodeFor,
  parseColorMode,
  parseColumns,
  parseUnknownSeverity,
  resolveColumns,
  resolveRunSettings
} from "./cli-options.js"

describe("parseColumns", () => {
  it("accepts positive whole numbers", () => {
    expect(parseColumns("100")).toBe(100)
  })

  it("rejects anything else", () => {
    for (const value of ["0", "-5", "12.5", "wide", ""]) {
      expect(() => parseColumns(value)).toThrow(InvalidArgumentError)
    }
  })
})

describe("parseColorMode", () => {
  it("accepts auto, always and never", () => {
    expect(parseColorMode("always")).toBe("always")
    expect(() => parseColorMode("sometimes")).toThrow("Expected one of: auto, always, never.")
  })
})

describe("resolveColumns", () => {
  it("prefers an explicit width", () => {
    expect(resolveColumns(90, 132, "100")).toBe(90)
  })

  it("uses the terminal width next", () => {
    expect(resolveColumns(undefined, 132, "100")).toBe(132)
  })

  it("falls back to $COLUMNS when stdout is not a terminal", () => {
    expect(resolveColumns(undefined, undefined, "100")).toBe(100)
  })

  it("defaults to 80 columns", () => {
    expect(resolveColumns(undefined, undefined, undefined)).toBe(80)
    expect(resolveColumns(undefined, 0, "narrow")).toBe(80)
  })
})

describe("parseUnknownSeverity", () => {
  it("accepts stop and passthrough", () => {
    expect(parseUnknownSeverity("stop")).toBe("stop")
    expect(parseUnknownSeverity("passthrough")).toBe("passthrough")
    expect(() => parseUnknownSeverity("skip")).toThrow("Expected one of: stop, passthrough.")
  })
})

describe("resolveRunSettings", () => {
  const defaults: CliOptions = { color: "auto" }

  it("reads piped input from the start in detection mode", () => {
    expect(resolveRunSettings(defaults, { format: "time" }, false)).toEqual({
      initialState: "detecting-brief",
      unknownSeverity: "stop"
    })
  })

  it("spawns adb with -v time and locks onto timestamps on a terminal", () => {
    expect(resolveRunSettings(defaults, {}, true)).toEqual({
      spawnFormat: "time",
      initialState: "locked-timestamped",
      unknownSeverity: "stop"
    })
  })

  it("spawns the brief format when asked by flag or config file", () => {
    const fromFlag = resolveRunSettings({ ...defaults, brief: true }, { format: "time" }, true)
    const fromConfig = resolveRunSettings(defaults, { format: "brief" }, true)

    for (const settings of [fromFlag, fromConfig]) {
      expect(settings.spawnFormat).toBe("brief")
      expect(settings.initialState).toBe("detecting-brief")
    }
  })

  it("lets the flag override the config file's unknown-severity policy", () => {
    expect(resolveRunSettings(defaults, { unknownSeverity: "passthrough" }, false).unknownSeverity).toBe(
      "passthrough"
    )
    expect(
      resolveRunSettings({ ...defaults, unknownSeverity: "stop" }, { unknownSeverity: "passthrough" }, false)
        .unknownSeverity
    ).toBe("stop")
  })
})

describe("exitCodeFor", () => {
  it("reports adb's failure when its stream ended by itself", () => {
    expect(exitCodeFor("end-of-stream", 255)).toBe(255)
  })

  it("stays quiet for a clean exit or a run we stopped", () => {
    expect(exitCodeFor("end-of-stream", 0)).toBeUndefined()
    expect(exitCodeFor("interrupted", 130)).toBeUndefined()
    expect(exitCodeFor("unrecognized-severity", 143)).toBeUndefined()
    expect(exitCodeFor("end-of-stream", undefined)).toBeUndefined()
  })
})
