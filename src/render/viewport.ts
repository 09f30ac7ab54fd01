/**
 * viewport.ts — maps layout positions onto a drawing surface.
 *
 * The layout is fitted into the surface with one uniform scale (aspect ratio
 * kept), inset by `padding` on every side, with the y axis flipped so larger
 * y is drawn higher.
 */

import type { Position } from '../search/types.js'

export interface ViewportOptions {
  readonly width: number
  readonly height: number
  readonly padding: number
}

export interface Viewport {
  readonly minX: number
  readonly minY: number
  /** Surface units per layout unit. */
  readonly baseScale: number
  toCanvas(position: Position): readonly [number, number]
}

/** Smallest span used for scaling, so a single point or a flat line still fits. */
const MIN_SPAN = 1e-6

/** Returns null when there is nothing to fit. */
export function fitViewport(positions: Iterable<Position>, options: ViewportOptions): Viewport | null {
  let minX = Infinity
  let maxX = -Infinity
  let minY = Infinity
  let maxY = -Infinity
  for (const [x, y] of positions) {
    minX = Math.min(minX, x)
    maxX = Math.max(maxX, x)
    minY = Math.min(minY, y)
    maxY = Math.max(maxY, y)
  }
  if (minX === Infinity) return null

  const { width, height, padding } = options
  const innerWidth = Math.max(1, width - padding * 2)
  const innerHeight = Math.max(1, height - padding * 2)
  const spanX = Math.max(MIN_SPAN, maxX - minX)
  const spanY = Math.max(MIN_SPAN, maxY - minY)
  const baseScale = Math.min(innerWidth / spanX, innerHeight / spanY)

  return {
    minX,
    minY,
    baseScale,
    toCanvas([x, y]) {
      return [padding + (x - minX) * baseScale, height - (padding + (y - minY) * baseScale)]
    },
  }
}
