/**
 * graph.ts — immutable adjacency + layout container and its builder.
 *
 * Node identity goes through `nodeKey`, so grid points built in separate
 * expressions still land on the same vertex. Neighbor lists keep insertion
 * order and duplicates; the searches rely on that order for tie-breaking.
 */

import type { Adjacency, NodeId, Position, PositionLookup } from '../search/types.js'
import { nodeKey } from '../node-id.js'

interface Vertex {
  readonly node: NodeId
  readonly neighbors: readonly NodeId[]
}

/** Positions keyed structurally; frozen once the owning graph is built. */
class PositionTable implements PositionLookup {
  private readonly byKey: ReadonlyMap<string, Position>

  constructor(entries: ReadonlyMap<string, Position>) {
    this.byKey = entries
  }

  get(node: NodeId): Position | undefined {
    return this.byKey.get(nodeKey(node))
  }
}

export class Graph implements Adjacency {
  readonly positions: PositionLookup
  private readonly vertices: ReadonlyMap<string, Vertex>
  private readonly order: readonly NodeId[]

  /** Prefer `GraphBuilder` or `createGraph`; the maps passed here are taken as-is. */
  constructor(vertices: ReadonlyMap<string, Vertex>, positions: ReadonlyMap<string, Position>) {
    this.vertices = vertices
    this.order = Object.freeze([...vertices.values()].map((v) => v.node))
    this.positions = new PositionTable(positions)
    Object.freeze(this)
  }

  has(node: NodeId): boolean {
    return this.vertices.has(nodeKey(node))
  }

  neighbors(node: NodeId): readonly NodeId[] {
    return this.vertices.get(nodeKey(node))?.neighbors ?? []
  }

  nodes(): readonly NodeId[] {
    return this.order
  }

  /** Number of adjacency keys. */
  get size(): number {
    return this.vertices.size
  }
}

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

export class GraphBuilder {
  private readonly adjacency = new Map<string, { node: NodeId; neighbors: NodeId[] }>()
  private readonly positions = new Map<string, Position>()

  /** Ensures `node` is a key of the adjacency, with no neighbors if new. */
  addNode(node: NodeId, position?: Position): this {
    this.entry(node)
    if (position !== undefined) this.setPosition(node, position)
    return this
  }

  setPosition(node: NodeId, position: Position): this {
    this.positions.set(nodeKey(node), [position[0], position[1]])
    return this
  }

  /** Appends `to` to the neighbors of `from`. `to` is not made a key. */
  addArc(from: NodeId, to: NodeId): this {
    this.entry(from).neighbors.push(to)
    return this
  }

  /** Appends each endpoint to the other's neighbor list, creating keys as needed. */
  addUndirectedEdge(a: NodeId, b: NodeId): this {
    this.entry(a).neighbors.push(b)
    this.entry(b).neighbors.push(a)
    return this
  }

  /** Removes the first occurrence of each direction of the edge, if present. */
  removeUndirectedEdge(a: NodeId, b: NodeId): this {
    this.removeArc(a, b)
    this.removeArc(b, a)
    return this
  }

  build(): Graph {
    const vertices = new Map<string, Vertex>()
    for (const [key, { node, neighbors }] of this.adjacency) {
      vertices.set(key, Object.freeze({ node, neighbors: Object.freeze([...neighbors]) }))
    }
    return new Graph(vertices, new Map(this.positions))
  }

  private entry(node: NodeId): { node: NodeId; neighbors: NodeId[] } {
    const key = nodeKey(node)
    let existing = this.adjacency.get(key)
    if (existing === undefined) {
      existing = { node, neighbors: [] }
      this.adjacency.set(key, existing)
    }
    return existing
  }

  private removeArc(from: NodeId, to: NodeId): void {
    const existing = this.adjacency.get(nodeKey(from))
    if (existing === undefined) return
    const toKey = nodeKey(to)
    const index = existing.neighbors.findIndex((n) => nodeKey(n) === toKey)
    if (index !== -1) existing.neighbors.splice(index, 1)
  }
}

// ---------------------------------------------------------------------------
// Literal construction
// ---------------------------------------------------------------------------

export interface GraphInit {
  /** Node → neighbors, taken as directed arcs in the given order. */
  readonly adjacency: Iterable<readonly [NodeId, Iterable<NodeId>]>
  readonly positions?: Iterable<readonly [NodeId, Position]>
}

/**
 * Builds a graph from an explicit adjacency listing. Arcs are taken as given
 * (no reverse arc is added), matching a mapping of node → neighbor sequence.
 */
export function createGraph(init: GraphInit): Graph {
  const builder = new GraphBuilder()
  for (const [node, neighbors] of init.adjacency) {
    builder.addNode(node)
    for (const neighbor of neighbors) builder.addArc(node, neighbor)
  }
  for (const [node, position] of init.positions ?? []) {
    builder.setPosition(node, position)
  }
  return builder.build()
}
