/**
 * algorithms.ts — uninformed and heuristic path search over an `Adjacency`.
 *
 * All three searches share the same contract:
 * - `start` and `goal` must be keys of the adjacency (`InvalidNodeError` otherwise).
 * - The search stops as soon as the goal is popped from the frontier; the
 *   goal's own neighbors are never expanded.
 * - Every pop is recorded in `visitedOrder`, the goal included.
 * - Working state lives only for the duration of the call.
 */

import type { Adjacency, NodeId, PositionLookup, SearchAlgorithm, SearchResult } from './types.js'
import { InvalidNodeError } from './errors.js'
import { euclideanHeuristic } from './heuristic.js'
import { pathDistance, reconstructPath } from './path.js'
import type { CameFrom } from './path.js'
import { PriorityQueue } from './priority-queue.js'
import { compareNodes, nodeKey } from '../node-id.js'

/** Every edge costs the same in these graphs. */
const EDGE_COST = 1

// ---------------------------------------------------------------------------
// Breadth-first search
// ---------------------------------------------------------------------------

/**
 * FIFO search. Each node is enqueued at most once (first discovery wins), so
 * the returned path has the fewest possible edges.
 *
 * @throws {InvalidNodeError} if `start` or `goal` is not in `adjacency`.
 */
export function bfs(adjacency: Adjacency, start: NodeId, goal: NodeId): SearchResult {
  assertEndpoints(adjacency, start, goal)

  const goalKey = nodeKey(goal)
  const frontier: NodeId[] = [start]
  let head = 0
  const cameFrom: CameFrom = new Map([[nodeKey(start), null]])
  const visitedOrder: NodeId[] = []

  while (head < frontier.length) {
    const current = frontier[head++]
    if (current === undefined) break
    visitedOrder.push(current)
    if (nodeKey(current) === goalKey) break

    for (const neighbor of adjacency.neighbors(current)) {
      const key = nodeKey(neighbor)
      if (cameFrom.has(key)) continue
      cameFrom.set(key, current)
      frontier.push(neighbor)
    }
  }

  return buildResult('bfs', reconstructPath(cameFrom, start, goal), visitedOrder)
}

// ---------------------------------------------------------------------------
// Depth-first search
// ---------------------------------------------------------------------------

/**
 * LIFO search. Nodes are marked discovered when pushed; neighbors are pushed
 * in stored order and therefore explored in reverse. The path is whichever
 * one the stack reaches first, not necessarily the shortest.
 *
 * @throws {InvalidNodeError} if `start` or `goal` is not in `adjacency`.
 */
export function dfs(adjacency: Adjacency, start: NodeId, goal: NodeId): SearchResult {
  assertEndpoints(adjacency, start, goal)

  const goalKey = nodeKey(goal)
  const stack: NodeId[] = [start]
  const cameFrom: CameFrom = new Map([[nodeKey(start), null]])
  const visitedOrder: NodeId[] = []

  while (stack.length > 0) {
    const current = stack.pop()
    if (current === undefined) break
    visitedOrder.push(current)
    if (nodeKey(current) === goalKey) break

    for (const neighbor of adjacency.neighbors(current)) {
      const key = nodeKey(neighbor)
      if (cameFrom.has(key)) continue
      cameFrom.set(key, current)
      stack.push(neighbor)
    }
  }

  return buildResult('dfs', reconstructPath(cameFrom, start, goal), visitedOrder)
}

// ---------------------------------------------------------------------------
// A*
// ---------------------------------------------------------------------------

/**
 * Best-first search on `f = g + h` with unit edge costs and a Euclidean `h`.
 *
 * There is no closed set. A node pushed more than once is popped (and
 * recorded) again; its stale entry changes nothing because a neighbor is only
 * relaxed when its tentative g strictly improves. Equal f values pop in
 * natural node order (see `compareNodes`). The result is optimal when
 * the positions make `h` admissible; with missing positions `h` is 0 and the
 * search behaves like uniform-cost search.
 *
 * @throws {InvalidNodeError} if `start` or `goal` is not in `adjacency`.
 */
export function astar(
  adjacency: Adjacency,
  positions: PositionLookup | undefined,
  start: NodeId,
  goal: NodeId
): SearchResult {
  assertEndpoints(adjacency, start, goal)

  const goalKey = nodeKey(goal)
  const heuristic = euclideanHeuristic(positions, goal)
  const frontier = new PriorityQueue<NodeId>(compareNodes)
  const cameFrom: CameFrom = new Map([[nodeKey(start), null]])
  const gScore = new Map<string, number>([[nodeKey(start), 0]])
  const visitedOrder: NodeId[] = []

  frontier.push(start, 0)

  while (!frontier.isEmpty()) {
    const current = frontier.pop()
    if (current === undefined) break
    visitedOrder.push(current)

    const currentKey = nodeKey(current)
    if (currentKey === goalKey) {
      return buildResult('astar', reconstructPath(cameFrom, start, goal), visitedOrder)
    }

    const currentG = gScore.get(currentKey) ?? 0
    for (const neighbor of adjacency.neighbors(current)) {
      const key = nodeKey(neighbor)
      const tentativeG = currentG + EDGE_COST
      const knownG = gScore.get(key)
      if (knownG !== undefined && tentativeG >= knownG) continue

      cameFrom.set(key, current)
      gScore.set(key, tentativeG)
      frontier.push(neighbor, tentativeG + heuristic(neighbor))
    }
  }

  return buildResult('astar', [], visitedOrder)
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/**
 * Fail-fast membership check shared by every entry point. Start is checked
 * before goal.
 */
export function assertEndpoints(adjacency: Adjacency, start: NodeId, goal: NodeId): void {
  if (!adjacency.has(start)) throw new InvalidNodeError('start', start)
  if (!adjacency.has(goal)) throw new InvalidNodeError('goal', goal)
}

function buildResult(
  algorithm: SearchAlgorithm,
  path: readonly NodeId[],
  visitedOrder: readonly NodeId[]
): SearchResult {
  return Object.freeze({
    algorithm,
    path: Object.freeze([...path]),
    distance: pathDistance(path),
    visitedCount: visitedOrder.length,
    visitedOrder: Object.freeze([...visitedOrder]),
  })
}
