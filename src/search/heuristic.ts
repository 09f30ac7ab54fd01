import type { NodeId, Position, PositionLookup } from './types.js'

export function euclidean(a: Position, b: Position): number {
  const dx = a[0] - b[0]
  const dy = a[1] - b[1]
  return Math.sqrt(dx * dx + dy * dy)
}

/**
 * Straight-line distance to `goal`. Contributes 0 for any node when either
 * that node or the goal has no position.
 */
export function euclideanHeuristic(
  positions: PositionLookup | undefined,
  goal: NodeId
): (node: NodeId) => number {
  const goalPosition = positions?.get(goal)
  if (positions === undefined || goalPosition === undefined) return () => 0

  return (node) => {
    const position = positions.get(node)
    return position === undefined ? 0 : euclidean(position, goalPosition)
  }
}
