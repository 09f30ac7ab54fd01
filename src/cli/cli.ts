/**
 * cli.ts — command-line front end over the search core.
 *
 *   pathfinder <graph> <start> <goal> [algorithm] [--compare] [--map] [--animate]
 *              [--speed <ms>] [--config <file>]
 *   pathfinder --list [graph]
 *
 * Everything the command needs is passed in through `CliDeps` (catalog,
 * output sinks, config loader, abort signal), so tests drive it in process.
 *
 * Exit codes: 0 success, 1 runtime failure (bad node, bad config file),
 * 2 usage error, 130 playback interrupted.
 */

import { parseArgs } from 'node:util'
import type { GraphCatalog } from '../graph/catalog.js'
import type { Graph } from '../graph/graph.js'
import type { NodeId, SearchAlgorithm } from '../search/types.js'
import { SEARCH_ALGORITHM_KINDS } from '../search/types.js'
import { compareAlgorithms, isSearchAlgorithm, search } from '../search/search.js'
import { ConfigValidationError, loadConfigFile, parseConfig, visitIntervalMs } from '../config.js'
import type { LoadConfigFileOptions, PathfinderConfig } from '../config.js'
import { describeError } from '../error-utils.js'
import { parseNodeId } from '../node-id.js'
import { createPlayback, describeFrame, play } from '../playback/playback.js'
import { MAP_LEGEND, renderAsciiMap } from '../render/ascii-map.js'
import {
  formatComparison,
  formatGraphList,
  formatNodeList,
  formatSearchReport,
} from '../render/report.js'

export const DEFAULT_CONFIG_FILE = 'pathfinder.yaml'

export const USAGE = [
  'Usage: pathfinder <graph> <start> <goal> [algorithm] [options]',
  '       pathfinder --list [graph]',
  '',
  `Algorithms: ${SEARCH_ALGORITHM_KINDS.join(' | ')}`,
  'Nodes: plain names (Gate), integers (7), or pairs ("(0, 0)")',
  '',
  'Options:',
  '  --list            list graphs and the nodes of one graph',
  '  --compare         run every algorithm on the same query',
  '  --map             draw the graph and the result as text',
  '  --animate         replay the visitation order and path step by step',
  '  --speed <ms>      playback speed (50-800)',
  `  --config <file>   YAML config file (default: ./${DEFAULT_CONFIG_FILE} if present)`,
  '  -h, --help        show this message',
].join('\n')

export interface CliIo {
  stdout(line: string): void
  stderr(line: string): void
}

export interface CliDeps {
  readonly catalog: GraphCatalog
  readonly io: CliIo
  readonly loadConfig?: (filePath: string, options: LoadConfigFileOptions) => Promise<PathfinderConfig>
  /** Aborts `--animate` playback. */
  readonly signal?: AbortSignal
}

/** Bad command line; printed with the usage text, exit code 2. */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CliUsageError'
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

interface ParsedArgs {
  readonly positionals: readonly string[]
  readonly list: boolean
  readonly compare: boolean
  readonly map: boolean
  readonly animate: boolean
  readonly help: boolean
  readonly speed?: string
  readonly config?: string
}

function parseCommandLine(argv: readonly string[]): ParsedArgs {
  try {
    const { values, positionals } = parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        list: { type: 'boolean', default: false },
        compare: { type: 'boolean', default: false },
        map: { type: 'boolean', default: false },
        animate: { type: 'boolean', default: false },
        help: { type: 'boolean', short: 'h', default: false },
        speed: { type: 'string' },
        config: { type: 'string' },
      },
    })
    return {
      positionals,
      list: values.list === true,
      compare: values.compare === true,
      map: values.map === true,
      animate: values.animate === true,
      help: values.help === true,
      speed: values.speed,
      config: values.config,
    }
  } catch (err) {
    throw new CliUsageError(describeError(err))
  }
}

async function resolveConfig(args: ParsedArgs, deps: CliDeps): Promise<PathfinderConfig> {
  const load = deps.loadConfig ?? loadConfigFile
  const config = await load(args.config ?? DEFAULT_CONFIG_FILE, {
    required: args.config !== undefined,
    onUnknownKeys: (keys) => console.warn(`[pathfinder] config: ignoring unknown keys: ${keys.join(', ')}`),
  })
  if (args.speed === undefined) return config

  const speedMs = Number(args.speed)
  if (!Number.isInteger(speedMs)) throw new CliUsageError(`--speed must be an integer, got "${args.speed}"`)
  try {
    return parseConfig({ ...config, animation: { ...config.animation, speedMs } })
  } catch (err) {
    if (err instanceof ConfigValidationError) throw new CliUsageError(err.message)
    throw err
  }
}

function lookupGraph(catalog: GraphCatalog, name: string): Graph {
  if (!catalog.has(name)) {
    throw new CliUsageError(`Unknown graph "${name}". Available: ${catalog.names().join(', ')}`)
  }
  return catalog.get(name)
}

function resolveAlgorithm(text: string | undefined, config: PathfinderConfig): SearchAlgorithm {
  if (text === undefined) return config.defaults.algorithm
  const normalized = text.toLowerCase()
  if (!isSearchAlgorithm(normalized)) {
    throw new CliUsageError(`Unknown algorithm "${text}". Expected one of: ${SEARCH_ALGORITHM_KINDS.join(', ')}`)
  }
  return normalized
}

/** Parses `text` and checks membership; prints and returns null on a miss. */
function resolveNode(
  graph: Graph,
  graphName: string,
  role: 'Start' | 'Goal',
  text: string,
  io: CliIo
): NodeId | null {
  const node = parseNodeId(text)
  if (graph.has(node)) return node
  io.stderr(`${role} node ${text} not in graph ${graphName}`)
  return null
}

/** Parses the command line and loads config; returns an exit code when done early. */
async function prepare(
  argv: readonly string[],
  deps: CliDeps
): Promise<{ args: ParsedArgs; config: PathfinderConfig } | number> {
  const { io } = deps
  try {
    const args = parseCommandLine(argv)
    if (args.help) {
      io.stdout(USAGE)
      return 0
    }
    return { args, config: await resolveConfig(args, deps) }
  } catch (err) {
    if (err instanceof CliUsageError) {
      io.stderr(`Error: ${err.message}`)
      io.stderr(USAGE)
      return 2
    }
    io.stderr(`Error: ${describeError(err)}`)
    return 1
  }
}

/**
 * Runs one CLI invocation and resolves with its exit code. Never throws for
 * user errors; unexpected failures propagate.
 */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  const { catalog, io } = deps

  const prepared = await prepare(argv, deps)
  if (typeof prepared === 'number') return prepared
  const { args, config } = prepared

  try {
    if (args.list) {
      const graphName = args.positionals[0] ?? config.defaults.graph
      const graph = lookupGraph(catalog, graphName)
      for (const line of formatGraphList(catalog)) io.stdout(line)
      for (const line of formatNodeList(graph)) io.stdout(line)
      return 0
    }

    const [graphName, startText, goalText, algorithmText, ...extra] = args.positionals
    if (graphName === undefined || startText === undefined || goalText === undefined) {
      throw new CliUsageError('expected <graph> <start> <goal> [algorithm]')
    }
    if (extra.length > 0) throw new CliUsageError(`unexpected arguments: ${extra.join(' ')}`)

    const graph = lookupGraph(catalog, graphName)
    const algorithm = resolveAlgorithm(algorithmText, config)

    const start = resolveNode(graph, graphName, 'Start', startText, io)
    if (start === null) return 1
    const goal = resolveNode(graph, graphName, 'Goal', goalText, io)
    if (goal === null) return 1

    if (args.compare) {
      for (const line of formatComparison(compareAlgorithms(graph, start, goal))) io.stdout(line)
      return 0
    }

    const result = search(algorithm, graph, graph.positions, start, goal)
    for (const line of formatSearchReport(graphName, result)) io.stdout(line)

    if (args.map) {
      const overlay = { start, goal, path: result.path, visited: result.visitedOrder }
      const lines = renderAsciiMap(graph, overlay, config.render)
      if (lines.length === 0) {
        io.stderr(`Graph ${graphName} has no layout to draw`)
      } else {
        for (const line of lines) io.stdout(line)
        io.stdout(MAP_LEGEND)
      }
    }

    if (args.animate) {
      await play(createPlayback(result), {
        visitIntervalMs: visitIntervalMs(config),
        pathIntervalMs: config.animation.speedMs,
        onFrame: (frame) => io.stdout(describeFrame(frame)),
        signal: deps.signal,
      })
    }
    return 0
  } catch (err) {
    if (err instanceof CliUsageError) {
      io.stderr(`Error: ${err.message}`)
      io.stderr(USAGE)
      return 2
    }
    if (deps.signal?.aborted === true) {
      io.stderr('Playback interrupted')
      return 130
    }
    throw err
  }
}
