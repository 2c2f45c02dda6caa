import { Chalk, type BackgroundColorName, type ChalkInstance, type ColorSupportLevel } from "chalk"
import type { CellStyle, ColorId } from "../../constants/log-colors.js"

export type ColorMode = "auto" | "always" | "never"

const BACKGROUNDS: Record<ColorId, BackgroundColorName> = {
  black: "bgBlack",
  red: "bgRed",
  green: "bgGreen",
  yellow: "bgYellow",
  blue: "bgBlue",
  magenta: "bgMagenta",
  cyan: "bgCyan",
  white: "bgWhite"
}

const BRIGHT_BACKGROUNDS: Record<ColorId, BackgroundColorName> = {
  black: "bgBlackBright",
  red: "bgRedBright",
  green: "bgGreenBright",
  yellow: "bgYellowBright",
  blue: "bgBlueBright",
  magenta: "bgMagentaBright",
  cyan: "bgCyanBright",
  white: "bgWhiteBright"
}

/**
 * Create the chalk instance used for rendering.
 * "auto" follows chalk's own detection on stdout.
 */
export function createPainter(mode: ColorMode, detected: ColorSupportLevel): ChalkInstance {
  switch (mode) {
    case "always":
      return new Chalk({ level: detected > 0 ? detected : 1 })
    case "never":
      return new Chalk({ level: 0 })
    default:
      return new Chalk({ level: detected })
  }
}

/**
 * Wrap text in the codes for `style`. Every attribute is closed at the end
 * of the text, so nothing leaks into the following cell.
 */
export function paint(painter: ChalkInstance, style: CellStyle, text: string): string {
  let styled = painter
  if (style.fg) {
    styled = styled[style.fg]
  }
  if (style.bg) {
    styled = styled[style.brightBackground ? BRIGHT_BACKGROUNDS[style.bg] : BACKGROUNDS[style.bg]]
  }
  return styled(text)
}
