/**
 * reference-graphs.ts — the five built-in topologies.
 *
 * Every edge is undirected. Node insertion order follows edge insertion, which
 * is what `--list` prints and what the searches use to break ties.
 */

import type { GridPoint, NodeId, Position } from '../search/types.js'
import { Graph, GraphBuilder } from './graph.js'

// ---------------------------------------------------------------------------
// UrbanGrid-6x6
// ---------------------------------------------------------------------------

const GRID_SIZE = 6

/** Streets closed in the grid. */
const BLOCKED_STREETS: readonly (readonly [GridPoint, GridPoint])[] = [
  [[1, 1], [1, 2]],
  [[2, 3], [3, 3]],
]

/** Diagonal shortcut added after the blocks. */
const SHORTCUTS: readonly (readonly [GridPoint, GridPoint])[] = [
  [[0, 0], [2, 2]],
]

/**
 * 6×6 street grid of `[row, col]` nodes positioned at `(col, row)`, with two
 * closed streets and one diagonal shortcut.
 */
export function urbanGrid6x6(): Graph {
  const builder = new GraphBuilder()
  for (let r = 0; r < GRID_SIZE; r++) {
    for (let c = 0; c < GRID_SIZE; c++) {
      builder.setPosition([r, c], [c, r])
    }
  }
  for (let r = 0; r < GRID_SIZE; r++) {
    for (let c = 0; c < GRID_SIZE; c++) {
      if (r + 1 < GRID_SIZE) builder.addUndirectedEdge([r, c], [r + 1, c])
      if (c + 1 < GRID_SIZE) builder.addUndirectedEdge([r, c], [r, c + 1])
    }
  }
  for (const [a, b] of BLOCKED_STREETS) builder.removeUndirectedEdge(a, b)
  for (const [a, b] of SHORTCUTS) builder.addUndirectedEdge(a, b)
  return builder.build()
}

// ---------------------------------------------------------------------------
// Ladder-10
// ---------------------------------------------------------------------------

const LADDER_RUNGS = 5

/** Two rails `L0..L4` (x = 0) and `R0..R4` (x = 2) joined by a rung at every level. */
export function ladder10(): Graph {
  const builder = new GraphBuilder()
  for (let i = 0; i < LADDER_RUNGS; i++) {
    const left = `L${i}`
    const right = `R${i}`
    builder.setPosition(left, [0, i]).setPosition(right, [2, i])
    if (i > 0) {
      builder.addUndirectedEdge(`L${i - 1}`, left)
      builder.addUndirectedEdge(`R${i - 1}`, right)
    }
    builder.addUndirectedEdge(left, right)
  }
  return builder.build()
}

// ---------------------------------------------------------------------------
// BinaryTree-15
// ---------------------------------------------------------------------------

const TREE_SIZE = 15
const TREE_WIDTH = 10
const TREE_LEVEL_GAP = 2

/**
 * Complete binary tree on 1..15 in heap order (children of i are 2i and 2i+1).
 * Each level is spread evenly across x ∈ (0, 10) and stacked downwards.
 */
export function binaryTree15(): Graph {
  const builder = new GraphBuilder()
  for (let i = 1; i <= TREE_SIZE; i++) {
    const level = Math.floor(Math.log2(i))
    const nodesInLevel = 2 ** level
    const indexInLevel = i - nodesInLevel
    const x = ((indexInLevel + 1) / (nodesInLevel + 1)) * TREE_WIDTH
    builder.setPosition(i, [x, 0 - level * TREE_LEVEL_GAP])

    for (const child of [2 * i, 2 * i + 1]) {
      if (child <= TREE_SIZE) builder.addUndirectedEdge(i, child)
    }
  }
  return builder.build()
}

// ---------------------------------------------------------------------------
// HexRing-12
// ---------------------------------------------------------------------------

const HEX_SIDES = 6
const OUTER_RADIUS = 6
const INNER_RADIUS = 3.5
/** Outer index → inner index chords. */
const HEX_CHORDS: readonly (readonly [number, number])[] = [
  [0, 3],
  [4, 1],
]

function onCircle(radius: number, step: number): Position {
  const angle = (2 * Math.PI * step) / HEX_SIDES
  return [Math.cos(angle) * radius, Math.sin(angle) * radius]
}

/**
 * Outer hexagon `O0..O5` and inner hexagon `I0..I5` (rotated half a step),
 * joined by spokes `Oi–Ii` and two chords.
 */
export function hexRing12(): Graph {
  const builder = new GraphBuilder()
  const outer = Array.from({ length: HEX_SIDES }, (_, i) => `O${i}`)
  const inner = Array.from({ length: HEX_SIDES }, (_, i) => `I${i}`)

  outer.forEach((name, i) => builder.setPosition(name, onCircle(OUTER_RADIUS, i)))
  inner.forEach((name, i) => builder.setPosition(name, onCircle(INNER_RADIUS, i + 0.5)))

  for (let i = 0; i < HEX_SIDES; i++) {
    const next = (i + 1) % HEX_SIDES
    builder.addUndirectedEdge(ringAt(outer, i), ringAt(outer, next))
    builder.addUndirectedEdge(ringAt(inner, i), ringAt(inner, next))
  }
  for (let i = 0; i < HEX_SIDES; i++) {
    builder.addUndirectedEdge(ringAt(outer, i), ringAt(inner, i))
  }
  for (const [o, inn] of HEX_CHORDS) {
    builder.addUndirectedEdge(ringAt(outer, o), ringAt(inner, inn))
  }
  return builder.build()
}

function ringAt(ring: readonly string[], index: number): string {
  const name = ring[index]
  if (name === undefined) throw new RangeError(`ring index ${index} out of range`)
  return name
}

// ---------------------------------------------------------------------------
// CampusMap
// ---------------------------------------------------------------------------

const CAMPUS_PLACES: readonly (readonly [string, Position])[] = [
  ['Gate', [-5.0, -1.0]],
  ['Parking', [-6.0, -3.0]],
  ['Admin', [-2.0, 0.0]],
  ['Library', [0.0, 2.5]],
  ['Cafeteria', [1.0, -1.5]],
  ['LabA', [3.0, 1.5]],
  ['LabB', [4.5, -0.5]],
  ['Sports', [6.0, -2.5]],
  ['Auditorium', [2.0, 3.5]],
  ['Hostel', [5.5, 2.5]],
]

const CAMPUS_PATHS: readonly (readonly [NodeId, NodeId])[] = [
  ['Gate', 'Admin'],
  ['Gate', 'Parking'],
  ['Admin', 'Library'],
  ['Admin', 'Cafeteria'],
  ['Library', 'Auditorium'],
  ['Library', 'LabA'],
  ['Cafeteria', 'LabB'],
  ['LabA', 'LabB'],
  ['LabB', 'Sports'],
  ['Auditorium', 'Hostel'],
  ['LabA', 'Hostel'],
]

/** Named campus places joined by footpaths. */
export function campusMap(): Graph {
  const builder = new GraphBuilder()
  for (const [place, position] of CAMPUS_PLACES) builder.setPosition(place, position)
  for (const [a, b] of CAMPUS_PATHS) builder.addUndirectedEdge(a, b)
  return builder.build()
}
