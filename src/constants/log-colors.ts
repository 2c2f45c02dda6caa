/**
 * Shared color and column constants for rendered logcat rows
 * Used by the color allocator and the layout engine so both agree on the palette
 */

// The eight terminal colors, in ANSI order
export const COLOR_IDS = ["black", "red", "green", "yellow", "blue", "magenta", "cyan", "white"] as const

export type ColorId = (typeof COLOR_IDS)[number]

// Every color except black, least-recently-used first, as the ring starts out
export const ROTATING_COLORS: readonly ColorId[] = ["red", "green", "yellow", "blue", "magenta", "cyan", "white"]

// Well-known tags that always render in the same color
export const PINNED_TAG_COLORS: Readonly<Record<string, ColorId>> = {
  dalvikvm: "blue",
  Process: "blue",
  ActivityManager: "cyan",
  ActivityThread: "cyan"
}

export const SEVERITY_CODES = ["V", "D", "I", "W", "E"] as const

export type Severity = (typeof SEVERITY_CODES)[number]

export function isSeverity(code: string): code is Severity {
  return (SEVERITY_CODES as readonly string[]).includes(code)
}

/**
 * Style of a single styled cell. `brightBackground` selects the high-intensity
 * variant of `bg`.
 */
export interface CellStyle {
  fg?: ColorId
  bg?: ColorId
  brightBackground?: boolean
}

export const SEVERITY_STYLES: Record<Severity, CellStyle> = {
  V: { fg: "white", bg: "black" },
  D: { fg: "black", bg: "blue" },
  I: { fg: "black", bg: "green" },
  W: { fg: "black", bg: "yellow" },
  E: { fg: "black", bg: "red" }
}

// Process id cell: black on bright black (grey)
export const PROCESS_STYLE: CellStyle = { fg: "black", bg: "black", brightBackground: true }

export interface LayoutWidths {
  number: number
  badge: number
  tag: number
  // Zero or negative hides the process id column
  process: number
  time: number
}

export const DEFAULT_WIDTHS: Readonly<LayoutWidths> = {
  number: 6,
  badge: 3,
  tag: 25,
  process: 8,
  time: 21
}

export const DEFAULT_COLUMNS = 80
