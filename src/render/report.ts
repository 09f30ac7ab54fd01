/**
 * Plain-text summaries printed by the command line.
 */

import type { Adjacency, NodeId, SearchAlgorithm, SearchResult } from '../search/types.js'
import type { GraphCatalog } from '../graph/catalog.js'
import { formatNodeId } from '../node-id.js'

export const ALGORITHM_LABELS: Readonly<Record<SearchAlgorithm, string>> = {
  bfs: 'BFS',
  dfs: 'DFS',
  astar: 'A*',
}

export function formatPath(path: readonly NodeId[]): string {
  return path.map(formatNodeId).join(' -> ')
}

/**
 *   Algorithm: BFS
 *   Graph: Ladder-10
 *   Visited nodes: 4
 *   Path length (edges): 2
 *   Path: L0 -> R0 -> R1
 *
 * The last two lines become `No path found` when the path is empty.
 */
export function formatSearchReport(graphName: string, result: SearchResult): string[] {
  const lines = [
    `Algorithm: ${ALGORITHM_LABELS[result.algorithm]}`,
    `Graph: ${graphName}`,
    `Visited nodes: ${result.visitedCount}`,
  ]
  if (result.path.length === 0) {
    lines.push('No path found')
  } else {
    lines.push(`Path length (edges): ${result.distance}`, `Path: ${formatPath(result.path)}`)
  }
  return lines
}

/**
 * Side-by-side table for `--compare`. Columns are left-aligned and padded to
 * the widest cell; an empty path shows as `-` with distance `-`.
 */
export function formatComparison(results: readonly SearchResult[]): string[] {
  const header = ['Algorithm', 'Distance', 'Visited', 'Path']
  const rows = results.map((r) => [
    ALGORITHM_LABELS[r.algorithm],
    r.path.length === 0 ? '-' : String(r.distance),
    String(r.visitedCount),
    r.path.length === 0 ? '-' : formatPath(r.path),
  ])

  const widths = header.map((cell, col) =>
    Math.max(cell.length, ...rows.map((row) => (row[col] ?? '').length))
  )
  const render = (cells: readonly string[]): string =>
    cells
      .map((cell, col) => (col === cells.length - 1 ? cell : cell.padEnd(widths[col] ?? 0)))
      .join('  ')

  return [render(header), ...rows.map(render)]
}

export function formatGraphList(catalog: GraphCatalog): string[] {
  return [
    'Available graphs:',
    ...catalog.entries().map(([name, graph]) => `- ${name}: ${graph.size} nodes`),
  ]
}

export function formatNodeList(adjacency: Adjacency): string[] {
  return ['Nodes:', adjacency.nodes().map(formatNodeId).join(', ')]
}
