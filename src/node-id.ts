import type { GridPoint, NodeId } from './search/types.js'

/**
 * Canonical map key for a node. Strings, numbers and grid points never
 * collide: `"1"` → `"\"1\""`, `1` → `"1"`, `[0, 1]` → `"[0,1]"`.
 */
export function nodeKey(node: NodeId): string {
  return JSON.stringify(node)
}

function compareCodePoints(a: string, b: string): number {
  const left = [...a]
  const right = [...b]
  const shared = Math.min(left.length, right.length)
  for (let i = 0; i < shared; i++) {
    const diff = (left[i]?.codePointAt(0) ?? 0) - (right[i]?.codePointAt(0) ?? 0)
    if (diff !== 0) return diff
  }
  return left.length - right.length
}

/**
 * Natural order of two nodes of the same kind: numbers numerically, strings
 * by code point, grid points row first then column. Nodes of different kinds
 * have no order and compare as 0.
 */
export function compareNodes(a: NodeId, b: NodeId): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b
  if (typeof a === 'string' && typeof b === 'string') return compareCodePoints(a, b)
  if (isGridPoint(a) && isGridPoint(b)) return a[0] - b[0] || a[1] - b[1]
  return 0
}

export function isGridPoint(node: NodeId): node is GridPoint {
  return Array.isArray(node)
}

/**
 * Display form used by the command line and the map labels.
 *   "Gate" → "Gate", 7 → "7", [2, 3] → "(2, 3)"
 */
export function formatNodeId(node: NodeId): string {
  if (isGridPoint(node)) return `(${node[0]}, ${node[1]})`
  return String(node)
}

// ---------------------------------------------------------------------------
// Parsing user text
// ---------------------------------------------------------------------------

const NUMBER_SRC = '[+-]?(?:\\d+(?:\\.\\d*)?|\\.\\d+)(?:[eE][+-]?\\d+)?'
const NUMBER_RE = new RegExp(`^${NUMBER_SRC}$`)
const PAIR_RE = new RegExp(`^[([]\\s*(${NUMBER_SRC})\\s*,\\s*(${NUMBER_SRC})\\s*[)\\]]$`)
const QUOTED_RE = /^(['"])(.*)\1$/

/**
 * Recovers a node identifier from command-line or form text.
 *
 * Tried in order:
 *   1. a number                       "12", "-3", "1.5"   → number
 *   2. a pair in () or []             "(0, 0)", "[2,3]"   → GridPoint
 *   3. a single- or double-quoted     "'A'", "\"7\""      → the inner string
 *   4. anything else                  "Gate", "L0"        → the trimmed text
 *
 * Only these literal shapes are recognised; nothing is evaluated.
 */
export function parseNodeId(text: string): NodeId {
  const trimmed = text.trim()

  if (NUMBER_RE.test(trimmed)) return Number(trimmed)

  const pair = PAIR_RE.exec(trimmed)
  if (pair !== null) {
    const [, first, second] = pair
    if (first !== undefined && second !== undefined) {
      return [Number(first), Number(second)] as const
    }
  }

  const quoted = QUOTED_RE.exec(trimmed)
  if (quoted !== null && quoted[2] !== undefined) return quoted[2]

  return trimmed
}
