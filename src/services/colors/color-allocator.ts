/**
 * Stable per-tag colors drawn from a small palette
 *
 * New tags take the least-recently-used color. Looking up any tag, new or
 * known, moves its color to the most-recently-used end, so colors of chatty
 * tags are the last to be handed out again.
 */

import { type ColorId, PINNED_TAG_COLORS, ROTATING_COLORS } from "../../constants/log-colors.js"

export interface ColorAllocatorOptions {
  pinnedTags?: Readonly<Record<string, ColorId>>
  colors?: readonly ColorId[]
}

export class ColorAllocator {
  private knownTags: Map<string, ColorId>
  // Least-recently-used first
  private recency: ColorId[]

  constructor(options: ColorAllocatorOptions = {}) {
    const colors = options.colors ?? ROTATING_COLORS
    if (colors.length === 0) {
      throw new Error("ColorAllocator needs at least one color")
    }
    this.recency = [...new Set(colors)]
    this.knownTags = new Map(Object.entries(options.pinnedTags ?? PINNED_TAG_COLORS))
  }

  colorFor(tag: string): ColorId {
    let color = this.knownTags.get(tag)
    if (color === undefined) {
      color = this.recency[0]
      this.knownTags.set(tag, color)
    }
    this.touch(color)
    return color
  }

  recencyOrder(): readonly ColorId[] {
    return [...this.recency]
  }

  get knownTagCount(): number {
    return this.knownTags.size
  }

  private touch(color: ColorId): void {
    const index = this.recency.indexOf(color)
    // Pinned colors outside the ring keep no recency
    if (index === -1) return
    this.recency.splice(index, 1)
    this.recency.push(color)
  }
}
