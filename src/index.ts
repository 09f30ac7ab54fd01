export type {
  GridPoint,
  NodeId,
  Position,
  Adjacency,
  PositionLookup,
  SearchAlgorithm,
  SearchResult,
} from './search/types.js'
export { SEARCH_ALGORITHM_KINDS } from './search/types.js'

export { bfs, dfs, astar } from './search/algorithms.js'
export { search, compareAlgorithms, isSearchAlgorithm, SEARCH_ALGORITHMS } from './search/search.js'
export type { SearchFn, SearchableGraph } from './search/search.js'
export { InvalidNodeError } from './search/errors.js'
export type { EndpointRole } from './search/errors.js'
export { reconstructPath, pathDistance } from './search/path.js'
export type { CameFrom } from './search/path.js'
export { euclidean, euclideanHeuristic } from './search/heuristic.js'
export { PriorityQueue } from './search/priority-queue.js'

export { nodeKey, compareNodes, isGridPoint, formatNodeId, parseNodeId } from './node-id.js'

export { Graph, GraphBuilder, createGraph } from './graph/graph.js'
export type { GraphInit } from './graph/graph.js'
export { GraphCatalog, UnknownGraphError, createReferenceCatalog } from './graph/catalog.js'
export { urbanGrid6x6, ladder10, binaryTree15, hexRing12, campusMap } from './graph/reference-graphs.js'

export {
  parseConfig,
  loadConfigFile,
  visitIntervalMs,
  pathfinderConfigSchema,
  ConfigValidationError,
  ConfigFileError,
} from './config.js'
export type { PathfinderConfig, ParseConfigOptions, LoadConfigFileOptions } from './config.js'

export { createPlayback, buildFrames, describeFrame, play } from './playback/playback.js'
export type { Playback, PlaybackFrame, PlayOptions } from './playback/playback.js'

export { fitViewport } from './render/viewport.js'
export type { Viewport, ViewportOptions } from './render/viewport.js'
export { renderAsciiMap, MAP_GLYPHS, MAP_LEGEND } from './render/ascii-map.js'
export type { MapOverlay, AsciiMapOptions } from './render/ascii-map.js'
export {
  formatSearchReport,
  formatComparison,
  formatGraphList,
  formatNodeList,
  formatPath,
  ALGORITHM_LABELS,
} from './render/report.js'

export { runCli, CliUsageError, USAGE, DEFAULT_CONFIG_FILE } from './cli/cli.js'
export type { CliDeps, CliIo } from './cli/cli.js'
