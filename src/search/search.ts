/**
 * search.ts — the single entry point collaborators call.
 *
 * The presentation layer picks an algorithm by name and hands over an
 * adjacency (and optionally positions); the core returns a frozen
 * `SearchResult`. Nothing here performs I/O.
 */

import type {
  Adjacency,
  NodeId,
  PositionLookup,
  SearchAlgorithm,
  SearchResult,
} from './types.js'
import { SEARCH_ALGORITHM_KINDS } from './types.js'
import { assertEndpoints, astar, bfs, dfs } from './algorithms.js'

/** Uniform signature over the three strategies; `positions` is read by A* only. */
export type SearchFn = (
  adjacency: Adjacency,
  positions: PositionLookup | undefined,
  start: NodeId,
  goal: NodeId
) => SearchResult

export const SEARCH_ALGORITHMS: Readonly<Record<SearchAlgorithm, SearchFn>> = {
  bfs: (adjacency, _positions, start, goal) => bfs(adjacency, start, goal),
  dfs: (adjacency, _positions, start, goal) => dfs(adjacency, start, goal),
  astar,
}

export function isSearchAlgorithm(value: string): value is SearchAlgorithm {
  return SEARCH_ALGORITHM_KINDS.some((kind) => kind === value)
}

/**
 * Runs one search.
 *
 * `positions` may be partial or absent; A* then falls back to a zero
 * heuristic for the affected nodes.
 *
 * @throws {InvalidNodeError} if `start` or `goal` is not in `adjacency`.
 */
export function search(
  kind: SearchAlgorithm,
  adjacency: Adjacency,
  positions: PositionLookup | undefined,
  start: NodeId,
  goal: NodeId
): SearchResult {
  return SEARCH_ALGORITHMS[kind](adjacency, positions, start, goal)
}

/** A graph that carries its own positions, as catalog graphs do. */
export interface SearchableGraph extends Adjacency {
  readonly positions: PositionLookup
}

/**
 * Runs every algorithm on the same query, in `SEARCH_ALGORITHM_KINDS` order.
 * Endpoints are validated once up front.
 *
 * @throws {InvalidNodeError} if `start` or `goal` is not in `graph`.
 */
export function compareAlgorithms(
  graph: SearchableGraph,
  start: NodeId,
  goal: NodeId
): readonly SearchResult[] {
  assertEndpoints(graph, start, goal)
  return SEARCH_ALGORITHM_KINDS.map((kind) => search(kind, graph, graph.positions, start, goal))
}
