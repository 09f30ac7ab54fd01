import type { NodeId } from './types.js'
import { nodeKey } from '../node-id.js'

/**
 * Predecessor record built during one search: node key → the node that
 * discovered it (`null` for the start node).
 */
export type CameFrom = Map<string, NodeId | null>

/**
 * Walks `cameFrom` back from `goal`, reverses, and checks the chain really
 * begins at `start`. Returns `[]` when the goal was never discovered or the
 * chain does not lead back to `start`.
 */
export function reconstructPath(cameFrom: CameFrom, start: NodeId, goal: NodeId): NodeId[] {
  const startKey = nodeKey(start)
  const path: NodeId[] = []
  const seen = new Set<string>()
  let current: NodeId | null = goal

  while (current !== null) {
    const key = nodeKey(current)
    if (!cameFrom.has(key) || seen.has(key)) return []
    seen.add(key)
    path.push(current)
    current = cameFrom.get(key) ?? null
  }

  path.reverse()
  const first = path[0]
  if (first === undefined || nodeKey(first) !== startKey) return []
  return path
}

/** Edge count of a path: `max(0, length - 1)`. */
export function pathDistance(path: readonly NodeId[]): number {
  return Math.max(0, path.length - 1)
}
