/**
 * Types shared by the search core and its collaborators (graph catalog,
 * command line, playback).
 *
 * The core only ever reads a graph through `Adjacency` and `PositionLookup`,
 * so any structure that can answer those questions can be searched.
 */

// ---------------------------------------------------------------------------
// Node identity
// ---------------------------------------------------------------------------

/** A `[row, col]` style coordinate pair used as a node identifier. */
export type GridPoint = readonly [number, number]

/**
 * Opaque node identifier. Compared structurally through `nodeKey`, so two
 * distinct `[0, 0]` arrays name the same node.
 */
export type NodeId = string | number | GridPoint

/** 2D layout coordinate `[x, y]`. */
export type Position = readonly [x: number, y: number]

// ---------------------------------------------------------------------------
// Graph views
// ---------------------------------------------------------------------------

/** Read-only adjacency relation. May be directed; only listed neighbors are successors. */
export interface Adjacency {
  /** True when `node` is a key of the mapping (it may have zero neighbors). */
  has(node: NodeId): boolean
  /** Neighbors in stored order. Duplicates are allowed. Unknown node → empty. */
  neighbors(node: NodeId): readonly NodeId[]
  /** All keys in insertion order. */
  nodes(): readonly NodeId[]
}

/** Possibly partial node → position mapping. */
export interface PositionLookup {
  get(node: NodeId): Position | undefined
}

// ---------------------------------------------------------------------------
// Search results
// ---------------------------------------------------------------------------

export const SEARCH_ALGORITHM_KINDS = ['bfs', 'dfs', 'astar'] as const

export type SearchAlgorithm = (typeof SEARCH_ALGORITHM_KINDS)[number]

/** Outcome of one search call. Frozen on return. */
export interface SearchResult {
  readonly algorithm: SearchAlgorithm
  /** Start → goal inclusive; empty when no path was found. */
  readonly path: readonly NodeId[]
  /** Edge count along `path`; 0 when the path is empty or trivial. */
  readonly distance: number
  /** Number of frontier pops. Always equals `visitedOrder.length`. */
  readonly visitedCount: number
  /** Nodes in the order they were popped from the frontier. */
  readonly visitedOrder: readonly NodeId[]
}
