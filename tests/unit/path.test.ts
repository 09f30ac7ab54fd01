import { describe, it, expect } from 'vitest'
import { pathDistance, reconstructPath } from '../../src/search/path.js'
import type { CameFrom } from '../../src/search/path.js'
import type { NodeId } from '../../src/search/types.js'
import { nodeKey } from '../../src/node-id.js'

function cameFromOf(entries: readonly [NodeId, NodeId | null][]): CameFrom {
  return new Map(entries.map(([node, parent]) => [nodeKey(node), parent]))
}

describe('reconstructPath', () => {
  it('walks predecessors back to the start', () => {
    const cameFrom = cameFromOf([
      ['A', null],
      ['B', 'A'],
      ['C', 'B'],
    ])
    expect(reconstructPath(cameFrom, 'A', 'C')).toEqual(['A', 'B', 'C'])
  })

  it('start === goal → [start]', () => {
    expect(reconstructPath(cameFromOf([['A', null]]), 'A', 'A')).toEqual(['A'])
  })

  it('goal never discovered → []', () => {
    expect(reconstructPath(cameFromOf([['A', null]]), 'A', 'Z')).toEqual([])
  })

  it('chain that does not end at start → []', () => {
    const cameFrom = cameFromOf([
      ['X', null],
      ['B', 'X'],
    ])
    expect(reconstructPath(cameFrom, 'A', 'B')).toEqual([])
  })

  it('predecessor cycle → []', () => {
    const cameFrom = cameFromOf([
      ['A', 'B'],
      ['B', 'A'],
    ])
    expect(reconstructPath(cameFrom, 'A', 'B')).toEqual([])
  })

  it('grid points resolve structurally', () => {
    const cameFrom = cameFromOf([
      [[0, 0], null],
      [[0, 1], [0, 0]],
    ])
    expect(reconstructPath(cameFrom, [0, 0], [0, 1])).toEqual([[0, 0], [0, 1]])
  })
})

describe('pathDistance', () => {
  it('is the edge count, 0 for empty and single-node paths', () => {
    expect(pathDistance([])).toBe(0)
    expect(pathDistance(['A'])).toBe(0)
    expect(pathDistance(['A', 'B', 'C'])).toBe(2)
  })
})
