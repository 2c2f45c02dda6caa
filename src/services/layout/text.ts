/**
 * Column helpers for fixed-width terminal rows
 *
 * Widths count code points, so a character outside the BMP (most emoji)
 * is never split into two halves of a surrogate pair.
 */

export function center(text: string, width: number): string {
  const padding = width - Array.from(text).length
  if (padding <= 0) return text
  const left = Math.floor(padding / 2)
  return " ".repeat(left) + text + " ".repeat(padding - left)
}

/**
 * Keep the last `width` characters, then right-justify to `width`.
 * The end of a long tag is usually the part that tells tags apart.
 */
export function tail(text: string, width: number): string {
  if (width <= 0) return ""
  const kept = Array.from(text).slice(-width)
  return " ".repeat(width - kept.length) + kept.join("")
}

/**
 * Hard-wrap `message` to `width` columns, indenting continuation lines by
 * `indent` spaces. Chunks are exactly `width - indent` characters.
 */
export function indentWrap(message: string, indent: number, width: number): string {
  const wrapArea = width - indent
  if (wrapArea <= 0) return message

  const characters = Array.from(message)
  const chunks: string[] = []
  for (let current = 0; current < characters.length; current += wrapArea) {
    chunks.push(characters.slice(current, current + wrapArea).join(""))
  }
  return chunks.join(`\n${" ".repeat(indent)}`)
}
