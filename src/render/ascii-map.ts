/**
 * ascii-map.ts — character-grid picture of a graph and a search overlay.
 *
 * Nodes without a position are not drawn. Later marks win over earlier ones:
 * edges, then path edges, then nodes (plain, visited, path, start, goal).
 */

import type { Adjacency, NodeId, PositionLookup, Position } from '../search/types.js'
import { nodeKey } from '../node-id.js'
import { fitViewport } from './viewport.js'

export const MAP_GLYPHS = {
  edge: '.',
  pathEdge: '#',
  node: 'o',
  visited: '+',
  path: '*',
  start: 'S',
  goal: 'G',
} as const

export const MAP_LEGEND = 'S start  G goal  * path  + visited  o node  # route'

export interface MapOverlay {
  readonly start?: NodeId
  readonly goal?: NodeId
  readonly path?: readonly NodeId[]
  readonly visited?: readonly NodeId[]
}

export interface AsciiMapOptions {
  readonly width: number
  readonly height: number
  readonly padding: number
  readonly showVisited: boolean
}

type Cell = readonly [col: number, row: number]

class CharGrid {
  private readonly rows: string[][]
  private readonly width: number

  constructor(width: number, height: number) {
    this.width = width
    this.rows = Array.from({ length: height }, () => Array.from({ length: width }, () => ' '))
  }

  set([col, row]: Cell, glyph: string): void {
    const line = this.rows[row]
    if (line === undefined || col < 0 || col >= this.width) return
    line[col] = glyph
  }

  /** Marks the interior cells of the segment a→b (endpoints excluded). */
  line(a: Cell, b: Cell, glyph: string): void {
    const steps = Math.max(Math.abs(b[0] - a[0]), Math.abs(b[1] - a[1]))
    for (let i = 1; i < steps; i++) {
      const t = i / steps
      this.set([Math.round(a[0] + (b[0] - a[0]) * t), Math.round(a[1] + (b[1] - a[1]) * t)], glyph)
    }
  }

  lines(): string[] {
    return this.rows.map((row) => row.join('').trimEnd())
  }
}

export function renderAsciiMap(
  graph: Adjacency & { readonly positions: PositionLookup },
  overlay: MapOverlay,
  options: AsciiMapOptions
): string[] {
  const placed = new Map<string, { node: NodeId; position: Position }>()
  for (const node of graph.nodes()) {
    const position = graph.positions.get(node)
    if (position !== undefined) placed.set(nodeKey(node), { node, position })
  }

  const viewport = fitViewport(
    [...placed.values()].map((p) => p.position),
    { width: options.width - 1, height: options.height - 1, padding: options.padding }
  )
  if (viewport === null) return []

  const grid = new CharGrid(options.width, options.height)
  const cellOf = (position: Position): Cell => {
    const [x, y] = viewport.toCanvas(position)
    return [Math.round(x), Math.round(y)]
  }

  for (const { node, position } of placed.values()) {
    for (const neighbor of graph.neighbors(node)) {
      const target = placed.get(nodeKey(neighbor))
      if (target !== undefined) grid.line(cellOf(position), cellOf(target.position), MAP_GLYPHS.edge)
    }
  }

  const path = overlay.path ?? []
  for (let i = 0; i + 1 < path.length; i++) {
    const from = path[i]
    const to = path[i + 1]
    const a = from === undefined ? undefined : placed.get(nodeKey(from))
    const b = to === undefined ? undefined : placed.get(nodeKey(to))
    if (a !== undefined && b !== undefined) {
      grid.line(cellOf(a.position), cellOf(b.position), MAP_GLYPHS.pathEdge)
    }
  }

  const glyphs = new Map<string, string>()
  for (const key of placed.keys()) glyphs.set(key, MAP_GLYPHS.node)
  if (options.showVisited) {
    for (const node of overlay.visited ?? []) glyphs.set(nodeKey(node), MAP_GLYPHS.visited)
  }
  for (const node of path) glyphs.set(nodeKey(node), MAP_GLYPHS.path)
  if (overlay.start !== undefined) glyphs.set(nodeKey(overlay.start), MAP_GLYPHS.start)
  if (overlay.goal !== undefined) glyphs.set(nodeKey(overlay.goal), MAP_GLYPHS.goal)

  for (const [key, glyph] of glyphs) {
    const entry = placed.get(key)
    if (entry !== undefined) grid.set(cellOf(entry.position), glyph)
  }

  return grid.lines()
}
