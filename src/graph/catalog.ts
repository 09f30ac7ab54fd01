/**
 * catalog.ts — named collection of immutable graphs.
 *
 * Built once at startup and passed explicitly to whoever needs it (the CLI,
 * tests). There is no module-level registry.
 */

import type { Graph } from './graph.js'
import { binaryTree15, campusMap, hexRing12, ladder10, urbanGrid6x6 } from './reference-graphs.js'

export class UnknownGraphError extends Error {
  readonly graphName: string
  readonly available: readonly string[]

  constructor(graphName: string, available: readonly string[]) {
    super(`Unknown graph "${graphName}". Available: ${available.join(', ')}`)
    this.name = 'UnknownGraphError'
    this.graphName = graphName
    this.available = available
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

export class GraphCatalog {
  private readonly graphs: ReadonlyMap<string, Graph>

  constructor(entries: Iterable<readonly [string, Graph]>) {
    const graphs = new Map<string, Graph>()
    for (const [name, graph] of entries) {
      if (graphs.has(name)) throw new Error(`Duplicate graph name in catalog: ${name}`)
      graphs.set(name, graph)
    }
    this.graphs = graphs
  }

  /** Graph names in registration order. */
  names(): readonly string[] {
    return [...this.graphs.keys()]
  }

  has(name: string): boolean {
    return this.graphs.has(name)
  }

  /** @throws {UnknownGraphError} if no graph is registered under `name`. */
  get(name: string): Graph {
    const graph = this.graphs.get(name)
    if (graph === undefined) throw new UnknownGraphError(name, this.names())
    return graph
  }

  entries(): readonly (readonly [string, Graph])[] {
    return [...this.graphs.entries()]
  }
}

/** The five built-in graphs, in display order. */
export function createReferenceCatalog(): GraphCatalog {
  return new GraphCatalog([
    ['UrbanGrid-6x6', urbanGrid6x6()],
    ['Ladder-10', ladder10()],
    ['BinaryTree-15', binaryTree15()],
    ['HexRing-12', hexRing12()],
    ['CampusMap', campusMap()],
  ])
}
