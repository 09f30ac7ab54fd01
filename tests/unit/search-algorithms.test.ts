import { describe, it, expect } from 'vitest'
import { bfs, dfs, astar } from '../../src/search/algorithms.js'
import { InvalidNodeError } from '../../src/search/errors.js'
import { createGraph, GraphBuilder } from '../../src/graph/graph.js'
import type { Graph } from '../../src/graph/graph.js'
import type { NodeId } from '../../src/search/types.js'

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

/** A – B – C, no A–C edge. */
function pathGraph(): Graph {
  return createGraph({
    adjacency: [
      ['A', ['B']],
      ['B', ['A', 'C']],
      ['C', ['B']],
    ],
  })
}

/** Triangles {A,B,C} and {D,E,F} with no edge between them. */
function twoTriangles(): Graph {
  return createGraph({
    adjacency: [
      ['A', ['B', 'C']],
      ['B', ['A', 'C']],
      ['C', ['A', 'B']],
      ['D', ['E', 'F']],
      ['E', ['D', 'F']],
      ['F', ['D', 'E']],
    ],
  })
}

/**
 *     B
 *   /   \
 *  A     D
 *   \   /
 *     C
 */
function diamond(): Graph {
  return createGraph({
    adjacency: [
      ['A', ['B', 'C']],
      ['B', ['A', 'D']],
      ['C', ['A', 'D']],
      ['D', ['B', 'C']],
    ],
  })
}

/** Open size×size grid of [r, c] nodes at (c, r), edges inserted down-then-right per cell. */
function openGrid(size: number): Graph {
  const builder = new GraphBuilder()
  for (let r = 0; r < size; r++) {
    for (let c = 0; c < size; c++) builder.setPosition([r, c], [c, r])
  }
  for (let r = 0; r < size; r++) {
    for (let c = 0; c < size; c++) {
      if (r + 1 < size) builder.addUndirectedEdge([r, c], [r + 1, c])
      if (c + 1 < size) builder.addUndirectedEdge([r, c], [r, c + 1])
    }
  }
  return builder.build()
}

// ---------------------------------------------------------------------------
// bfs
// ---------------------------------------------------------------------------

describe('bfs', () => {
  it('A–B–C: path [A, B, C], distance 2, three nodes visited', () => {
    const result = bfs(pathGraph(), 'A', 'C')
    expect(result.path).toEqual(['A', 'B', 'C'])
    expect(result.distance).toBe(2)
    expect(result.visitedCount).toBe(3)
    expect(result.visitedOrder).toEqual(['A', 'B', 'C'])
    expect(result.algorithm).toBe('bfs')
  })

  it('expands neighbors in stored order and stops when the goal is dequeued', () => {
    const result = bfs(diamond(), 'A', 'D')
    expect(result.visitedOrder).toEqual(['A', 'B', 'C', 'D'])
    expect(result.path).toEqual(['A', 'B', 'D'])
    expect(result.distance).toBe(2)
  })

  it('does not expand the goal: its neighbors are never dequeued', () => {
    // Goal B is found before C would be reached through it.
    const graph = createGraph({
      adjacency: [
        ['A', ['B']],
        ['B', ['A', 'C']],
        ['C', ['B']],
      ],
    })
    const result = bfs(graph, 'A', 'B')
    expect(result.visitedOrder).toEqual(['A', 'B'])
  })

  it('disconnected goal → empty path, distance 0, whole component visited', () => {
    const result = bfs(twoTriangles(), 'A', 'D')
    expect(result.path).toEqual([])
    expect(result.distance).toBe(0)
    expect(result.visitedCount).toBe(3)
    expect(result.visitedOrder).toEqual(['A', 'B', 'C'])
  })

  it('repeated neighbor entries are enqueued once', () => {
    const graph = createGraph({
      adjacency: [
        ['A', ['B', 'B', 'C']],
        ['B', ['A']],
        ['C', ['A']],
      ],
    })
    const result = bfs(graph, 'A', 'C')
    expect(result.visitedOrder).toEqual(['A', 'B', 'C'])
    expect(result.path).toEqual(['A', 'C'])
  })

  it('follows arcs only in their listed direction', () => {
    const graph = createGraph({
      adjacency: [
        ['A', ['B']],
        ['B', []],
      ],
    })
    expect(bfs(graph, 'A', 'B').path).toEqual(['A', 'B'])

    const reverse = bfs(graph, 'B', 'A')
    expect(reverse.path).toEqual([])
    expect(reverse.visitedOrder).toEqual(['B'])
  })

  it('grid point nodes compare structurally', () => {
    const result = bfs(openGrid(3), [0, 0], [0, 2])
    expect(result.path).toEqual([[0, 0], [0, 1], [0, 2]])
    expect(result.distance).toBe(2)
  })
})

// ---------------------------------------------------------------------------
// dfs
// ---------------------------------------------------------------------------

describe('dfs', () => {
  it('A–B–C: path [A, B, C], distance 2', () => {
    const result = dfs(pathGraph(), 'A', 'C')
    expect(result.path).toEqual(['A', 'B', 'C'])
    expect(result.distance).toBe(2)
    expect(result.visitedOrder).toEqual(['A', 'B', 'C'])
    expect(result.algorithm).toBe('dfs')
  })

  it('explores neighbors in reverse of stored order', () => {
    const result = dfs(diamond(), 'A', 'D')
    expect(result.visitedOrder).toEqual(['A', 'C', 'D'])
    expect(result.path).toEqual(['A', 'C', 'D'])
  })

  it('marks nodes discovered when pushed, so each is popped at most once', () => {
    const result = dfs(twoTriangles(), 'A', 'D')
    expect(result.visitedOrder).toEqual(['A', 'C', 'B'])
    expect(result.path).toEqual([])
    expect(result.distance).toBe(0)
  })

  it('keeps the first discovering edge even when the goal is popped last', () => {
    // A's neighbors: G (direct) and X (the long way round).
    const graph = createGraph({
      adjacency: [
        ['A', ['G', 'X']],
        ['X', ['A', 'Y']],
        ['Y', ['X', 'G']],
        ['G', ['A', 'Y']],
      ],
    })
    const result = dfs(graph, 'A', 'G')
    // X is popped first; Y is discovered from X; G was already discovered from A.
    expect(result.visitedOrder).toEqual(['A', 'X', 'Y', 'G'])
    expect(result.path).toEqual(['A', 'G'])
  })
})

// ---------------------------------------------------------------------------
// astar
// ---------------------------------------------------------------------------

describe('astar', () => {
  it('A–B–C without positions: uniform-cost behavior', () => {
    const result = astar(pathGraph(), undefined, 'A', 'C')
    expect(result.path).toEqual(['A', 'B', 'C'])
    expect(result.distance).toBe(2)
    expect(result.visitedOrder).toEqual(['A', 'B', 'C'])
    expect(result.algorithm).toBe('astar')
  })

  it('heads straight for the goal on an open grid', () => {
    const grid = openGrid(6)
    const result = astar(grid, grid.positions, [0, 0], [0, 5])
    expect(result.visitedOrder).toEqual([[0, 0], [0, 1], [0, 2], [0, 3], [0, 4], [0, 5]])
    expect(result.path).toEqual([[0, 0], [0, 1], [0, 2], [0, 3], [0, 4], [0, 5]])
    expect(result.distance).toBe(5)
    expect(result.visitedCount).toBeLessThan(bfs(grid, [0, 0], [0, 5]).visitedCount)
  })

  it('empty frontier → empty path with visits recorded', () => {
    const result = astar(twoTriangles(), undefined, 'A', 'D')
    expect(result.path).toEqual([])
    expect(result.distance).toBe(0)
    expect(result.visitedOrder).toEqual(['A', 'B', 'C'])
  })

  it('re-expands a node whose g improved after it was first popped', () => {
    //   S → P → A → G      (P looks far from G, so it is expanded late)
    //   S → Q → R → A
    const graph = createGraph({
      adjacency: [
        ['S', ['P', 'Q']],
        ['P', ['S', 'A']],
        ['Q', ['S', 'R']],
        ['R', ['Q', 'A']],
        ['A', ['P', 'R', 'G']],
        ['G', ['A']],
      ],
      positions: [
        ['G', [0, 0]],
        ['P', [2.8, 0]],
        ['Q', [1, 0]],
        ['R', [0, 1]],
        ['A', [0.5, 0]],
      ],
    })
    const result = astar(graph, graph.positions, 'S', 'G')
    expect(result.visitedOrder).toEqual(['S', 'Q', 'R', 'A', 'P', 'A', 'G'])
    expect(result.visitedCount).toBe(7)
    expect(result.path).toEqual(['S', 'P', 'A', 'G'])
    expect(result.distance).toBe(3)
  })

  it('pops equal-f entries in node order, not insertion order', () => {
    // C is listed before B, but B sorts first.
    const graph = createGraph({
      adjacency: [
        ['A', ['C', 'B']],
        ['B', ['A', 'D']],
        ['C', ['A', 'D']],
        ['D', ['B', 'C']],
      ],
    })
    const result = astar(graph, undefined, 'A', 'D')
    expect(result.visitedOrder).toEqual(['A', 'B', 'C', 'D'])
    expect(result.path).toEqual(['A', 'B', 'D'])
    expect(bfs(graph, 'A', 'D').path).toEqual(['A', 'C', 'D'])
  })

  it('orders grid-point ties by row, then column', () => {
    const grid = openGrid(3)
    // (0, 1) and (1, 0) tie on f; row 0 goes first.
    const result = astar(grid, grid.positions, [0, 0], [1, 1])
    expect(result.visitedOrder).toEqual([[0, 0], [0, 1], [1, 0], [1, 1]])
    expect(result.path).toEqual([[0, 0], [0, 1], [1, 1]])
  })

  it('orders integer ties numerically', () => {
    const graph = createGraph({
      adjacency: [
        [1, [10, 9]],
        [9, [1, 100]],
        [10, [1, 100]],
        [100, [9, 10]],
      ],
    })
    const result = astar(graph, undefined, 1, 100)
    expect(result.visitedOrder).toEqual([1, 9, 10, 100])
    expect(result.path).toEqual([1, 9, 100])
  })

  it('treats a missing node position as zero heuristic', () => {
    const graph = createGraph({
      adjacency: [
        ['A', ['B', 'C']],
        ['B', ['A', 'D']],
        ['C', ['A', 'D']],
        ['D', ['B', 'C']],
      ],
      positions: [
        ['B', [10, 10]],
        ['D', [0, 0]],
      ],
    })
    // h(B) ≈ 14.1, h(C) = 0 → C is expanded before B.
    const result = astar(graph, graph.positions, 'A', 'D')
    expect(result.visitedOrder).toEqual(['A', 'C', 'D'])
    expect(result.path).toEqual(['A', 'C', 'D'])
  })
})

// ---------------------------------------------------------------------------
// Shared contract
// ---------------------------------------------------------------------------

describe('trivial and invalid queries', () => {
  const runs: readonly [string, (g: Graph, s: NodeId, t: NodeId) => ReturnType<typeof bfs>][] = [
    ['bfs', (g, s, t) => bfs(g, s, t)],
    ['dfs', (g, s, t) => dfs(g, s, t)],
    ['astar', (g, s, t) => astar(g, g.positions, s, t)],
  ]

  for (const [name, run] of runs) {
    it(`${name}: start === goal → [start], distance 0, one visit`, () => {
      const result = run(pathGraph(), 'B', 'B')
      expect(result.path).toEqual(['B'])
      expect(result.distance).toBe(0)
      expect(result.visitedOrder).toEqual(['B'])
    })

    it(`${name}: node with no neighbors searching for itself`, () => {
      const graph = createGraph({ adjacency: [['Solo', []]] })
      expect(run(graph, 'Solo', 'Solo').path).toEqual(['Solo'])
    })

    it(`${name}: missing start → InvalidNodeError(role "start")`, () => {
      let caught: unknown
      try {
        run(pathGraph(), 'Z', 'A')
      } catch (err) {
        caught = err
      }
      expect(caught).toBeInstanceOf(InvalidNodeError)
      if (caught instanceof InvalidNodeError) {
        expect(caught.role).toBe('start')
        expect(caught.node).toBe('Z')
      }
    })

    it(`${name}: missing goal → InvalidNodeError(role "goal")`, () => {
      expect(() => run(pathGraph(), 'A', 'Z')).toThrow('Goal node Z is not in the graph')
    })

    it(`${name}: both missing → start reported first`, () => {
      expect(() => run(pathGraph(), 'Y', 'Z')).toThrow('Start node Y is not in the graph')
    })

    it(`${name}: a goal that only appears as a neighbor is not a valid endpoint`, () => {
      const graph = createGraph({ adjacency: [['A', ['Dangling']]] })
      expect(() => run(graph, 'A', 'Dangling')).toThrow(InvalidNodeError)
    })
  }

  it('results are frozen', () => {
    const result = bfs(pathGraph(), 'A', 'C')
    expect(Object.isFrozen(result)).toBe(true)
    expect(Object.isFrozen(result.path)).toBe(true)
    expect(Object.isFrozen(result.visitedOrder)).toBe(true)
  })
})
