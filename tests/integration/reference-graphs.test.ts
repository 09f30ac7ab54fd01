import { describe, it, expect } from 'vitest'
import { createReferenceCatalog } from '../../src/graph/catalog.js'
import { compareAlgorithms, search } from '../../src/search/search.js'
import { SEARCH_ALGORITHM_KINDS } from '../../src/search/types.js'
import { formatComparison } from '../../src/render/report.js'
import { createPlayback, describeFrame } from '../../src/playback/playback.js'

const catalog = createReferenceCatalog()

describe('reference graphs end to end', () => {
  it('CampusMap Gate → Hostel', () => {
    const campus = catalog.get('CampusMap')
    const [viaBfs, viaDfs, viaAstar] = compareAlgorithms(campus, 'Gate', 'Hostel')

    expect(viaBfs?.path).toEqual(['Gate', 'Admin', 'Library', 'Auditorium', 'Hostel'])
    expect(viaBfs?.visitedOrder).toEqual([
      'Gate',
      'Admin',
      'Parking',
      'Library',
      'Cafeteria',
      'Auditorium',
      'LabA',
      'LabB',
      'Hostel',
    ])

    expect(viaDfs?.path).toEqual(['Gate', 'Admin', 'Cafeteria', 'LabB', 'LabA', 'Hostel'])
    expect(viaDfs?.distance).toBe(5)
    expect(viaDfs?.visitedOrder).toEqual([
      'Gate',
      'Parking',
      'Admin',
      'Cafeteria',
      'LabB',
      'Sports',
      'LabA',
      'Hostel',
    ])

    expect(viaAstar?.path).toEqual(['Gate', 'Admin', 'Library', 'LabA', 'Hostel'])
    expect(viaAstar?.visitedOrder).toEqual(['Gate', 'Admin', 'Library', 'LabA', 'Hostel'])
  })

  it('UrbanGrid-6x6 corner to corner takes the shortcut', () => {
    const grid = catalog.get('UrbanGrid-6x6')
    const viaBfs = search('bfs', grid, grid.positions, [0, 0], [5, 5])
    expect(viaBfs.distance).toBe(7)
    expect(viaBfs.visitedCount).toBe(36)
    expect(viaBfs.path).toEqual([[0, 0], [2, 2], [3, 2], [4, 2], [5, 2], [5, 3], [5, 4], [5, 5]])

    const viaAstar = search('astar', grid, grid.positions, [0, 0], [5, 5])
    expect(viaAstar.distance).toBe(7)
    expect(viaAstar.visitedCount).toBe(19)
    expect(viaAstar.path).toEqual([[0, 0], [2, 2], [3, 2], [3, 3], [3, 4], [4, 4], [4, 5], [5, 5]])
    expect(viaAstar.visitedOrder.slice(0, 10)).toEqual([
      [0, 0],
      [2, 2],
      [2, 3],
      [3, 2],
      [3, 3],
      [2, 4],
      [4, 2],
      [3, 4],
      [4, 3],
      [4, 4],
    ])
  })

  it('UrbanGrid-6x6 routes around a closed street', () => {
    const grid = catalog.get('UrbanGrid-6x6')
    const viaBfs = search('bfs', grid, grid.positions, [1, 1], [1, 2])
    expect(viaBfs.path).toEqual([[1, 1], [0, 1], [0, 2], [1, 2]])
    expect(viaBfs.visitedOrder).toEqual([
      [1, 1],
      [0, 1],
      [1, 0],
      [2, 1],
      [0, 0],
      [0, 2],
      [2, 0],
      [3, 1],
      [2, 2],
      [1, 2],
    ])

    const viaAstar = search('astar', grid, grid.positions, [1, 1], [1, 2])
    expect(viaAstar.distance).toBe(3)
    expect(viaAstar.visitedOrder).toEqual([[1, 1], [0, 1], [2, 1], [0, 2], [1, 0], [1, 2]])
    expect(viaAstar.path).toEqual([[1, 1], [0, 1], [0, 2], [1, 2]])
  })

  it('UrbanGrid-6x6 A* ties on f go to the lower row', () => {
    const grid = catalog.get('UrbanGrid-6x6')
    const viaAstar = search('astar', grid, grid.positions, [0, 0], [1, 1])
    expect(viaAstar.path).toEqual([[0, 0], [0, 1], [1, 1]])
    expect(viaAstar.visitedOrder).toEqual([[0, 0], [0, 1], [1, 0], [1, 1]])
  })

  it('Ladder-10 L0 → R4', () => {
    const ladder = catalog.get('Ladder-10')
    const viaDfs = search('dfs', ladder, ladder.positions, 'L0', 'R4')
    expect(viaDfs.path).toEqual(['L0', 'L1', 'L2', 'L3', 'L4', 'R4'])
    expect(viaDfs.visitedCount).toBe(6)

    const viaAstar = search('astar', ladder, ladder.positions, 'L0', 'R4')
    expect(viaAstar.path).toEqual(['L0', 'L1', 'L2', 'R2', 'R3', 'R4'])
    expect(viaAstar.visitedOrder).toEqual(['L0', 'L1', 'L2', 'R0', 'R1', 'R2', 'R3', 'R4'])
  })

  it('BinaryTree-15 leaf to leaf goes through the root', () => {
    const tree = catalog.get('BinaryTree-15')
    for (const kind of SEARCH_ALGORITHM_KINDS) {
      expect(search(kind, tree, tree.positions, 8, 15).path).toEqual([8, 4, 2, 1, 3, 7, 15])
    }
    expect(search('bfs', tree, tree.positions, 8, 15).visitedCount).toBe(15)
    expect(search('dfs', tree, tree.positions, 8, 15).visitedOrder).toEqual([8, 4, 9, 2, 5, 11, 10, 1, 3, 7, 15])
  })

  it('HexRing-12 crosses through a chord', () => {
    const hex = catalog.get('HexRing-12')
    const viaBfs = search('bfs', hex, hex.positions, 'O0', 'O3')
    expect(viaBfs.path).toEqual(['O0', 'I3', 'O3'])
    expect(viaBfs.visitedCount).toBe(12)
    expect(search('dfs', hex, hex.positions, 'O0', 'O3').visitedOrder).toEqual(['O0', 'I3', 'O3'])
  })

  it('comparison table and playback for one query', () => {
    const ladder = catalog.get('Ladder-10')
    expect(formatComparison(compareAlgorithms(ladder, 'L0', 'R4'))).toEqual([
      'Algorithm  Distance  Visited  Path',
      'BFS        5         10       L0 -> R0 -> R1 -> R2 -> R3 -> R4',
      'DFS        5         6        L0 -> L1 -> L2 -> L3 -> L4 -> R4',
      'A*         5         8        L0 -> L1 -> L2 -> R2 -> R3 -> R4',
    ])

    const playback = createPlayback(search('dfs', ladder, ladder.positions, 'L0', 'R4'))
    const lines: string[] = []
    for (let frame = playback.step(); frame.phase !== 'done'; frame = playback.step()) {
      lines.push(describeFrame(frame))
    }
    expect(lines).toHaveLength(11)
    expect(lines[0]).toBe('visit 1/6: L0')
    expect(lines[6]).toBe('path 1/5: L0 -> L1')
    expect(lines[10]).toBe('path 5/5: L4 -> R4')
  })
})
