import { readFile } from 'node:fs/promises'
import { parse as yamlParse } from 'yaml'
import { z } from 'zod'
import { describeError, formatZodErrors } from './error-utils.js'
import { SEARCH_ALGORITHM_KINDS } from './search/types.js'

// ---------------------------------------------------------------------------
// Sub-schemas
// ---------------------------------------------------------------------------

/** What the CLI runs when the command line leaves a choice open. */
const defaultsSchema = z
  .object({
    /** Catalog graph used by `--list` when no graph is named. */
    graph: z.string().min(1, 'defaults.graph must not be empty').default('UrbanGrid-6x6'),
    algorithm: z.enum(SEARCH_ALGORITHM_KINDS).default('bfs'),
  })
  .strip()

/**
 * Playback pacing. `speedMs` is the delay between path edges; visited nodes
 * step at half that speed unless `visitIntervalMs` overrides it.
 */
const animationSchema = z
  .object({
    speedMs: z
      .number()
      .int()
      .min(50, 'speedMs must be at least 50')
      .max(800, 'speedMs must be at most 800')
      .default(200),
    /** Explicit delay between visited-node frames. null = derive from speedMs. */
    visitIntervalMs: z.number().int().min(0, 'visitIntervalMs must be >= 0').nullable().default(null),
  })
  .strip()

/** ASCII map layout. Sizes are in character cells. */
const renderSchema = z
  .object({
    width: z.number().int().min(20).max(200).default(60),
    height: z.number().int().min(10).max(80).default(24),
    padding: z.number().int().min(0).max(10).default(2),
    /** Mark visited-but-not-on-path nodes with `+`. */
    showVisited: z.boolean().default(true),
  })
  .strip()

// ---------------------------------------------------------------------------
// Root config schema
// ---------------------------------------------------------------------------

/**
 * Zod schema for the full pathfinder configuration. Unknown keys are
 * stripped; an empty object `{}` produces a fully-valid config.
 */
export const pathfinderConfigSchema = z
  .object({
    defaults: defaultsSchema.default({}),
    animation: animationSchema.default({}),
    render: renderSchema.default({}),
  })
  .strip()

const SUB_SCHEMA_SHAPES: Record<string, ReadonlySet<string>> = {
  defaults: new Set(Object.keys(defaultsSchema.shape)),
  animation: new Set(Object.keys(animationSchema.shape)),
  render: new Set(Object.keys(renderSchema.shape)),
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/** Unknown key paths at the top level and one level deep (e.g. `"render.colour"`). */
function collectUnknownConfigKeys(raw: Record<string, unknown>): readonly string[] {
  const topLevelKnown = new Set(Object.keys(pathfinderConfigSchema.shape))
  const result: string[] = []
  for (const key of Object.keys(raw)) {
    if (!topLevelKnown.has(key)) {
      result.push(key)
      continue
    }
    const subShape = SUB_SCHEMA_SHAPES[key]
    const nested = raw[key]
    if (subShape === undefined || !isPlainObject(nested)) continue
    for (const subKey of Object.keys(nested)) {
      if (!subShape.has(subKey)) result.push(`${key}.${subKey}`)
    }
  }
  return result
}

// ---------------------------------------------------------------------------
// Exported types
// ---------------------------------------------------------------------------

/** Options accepted by {@link parseConfig} and {@link loadConfigFile}. */
export interface ParseConfigOptions {
  /**
   * Called with every unknown key path when the input has keys the schema
   * does not recognise. Nothing is reported when omitted.
   */
  onUnknownKeys?: (keys: readonly string[]) => void
}

type DeepReadonly<T> =
  T extends (infer U)[]
    ? ReadonlyArray<DeepReadonly<U>>
    : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T

/** Fully-resolved configuration with all defaults applied. Immutable. */
export type PathfinderConfig = DeepReadonly<z.infer<typeof pathfinderConfigSchema>>

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/**
 * Thrown by `parseConfig` when the input contains invalid values. The message
 * lists one `path: message` line per issue; the `ZodError` is kept as `cause`.
 */
export class ConfigValidationError extends Error {
  readonly issues: readonly z.ZodIssue[]

  constructor(zodError: z.ZodError) {
    super(`Pathfinder configuration is invalid:\n${formatZodErrors(zodError.errors)}`, { cause: zodError })
    this.name = 'ConfigValidationError'
    this.issues = zodError.errors
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/** Thrown by `loadConfigFile` when the file cannot be read or is not valid YAML. */
export class ConfigFileError extends Error {
  readonly filePath: string

  constructor(filePath: string, message: string, cause?: unknown) {
    super(`Cannot load config file ${filePath}: ${message}`, { cause })
    this.name = 'ConfigFileError'
    this.filePath = filePath
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Validates raw config input and applies defaults.
 *
 * @throws {ConfigValidationError} with a field-by-field breakdown.
 */
export function parseConfig(raw: unknown, options: ParseConfigOptions = {}): PathfinderConfig {
  const result = pathfinderConfigSchema.safeParse(raw ?? {})
  if (!result.success) {
    throw new ConfigValidationError(result.error)
  }

  if (isPlainObject(raw) && options.onUnknownKeys !== undefined) {
    const unknownKeys = collectUnknownConfigKeys(raw)
    if (unknownKeys.length > 0) options.onUnknownKeys(unknownKeys)
  }

  return result.data
}

export interface LoadConfigFileOptions extends ParseConfigOptions {
  /** Throw when the file is missing instead of falling back to defaults. */
  required?: boolean
}

function isEnoent(err: unknown): boolean {
  return isPlainObject(err) && err['code'] === 'ENOENT'
}

/**
 * Reads a YAML config file and parses it with {@link parseConfig}. An empty
 * file yields the defaults, and so does a missing one unless `required` is set.
 *
 * @throws {ConfigFileError} if the file is unreadable, missing while
 *   required, or not valid YAML.
 * @throws {ConfigValidationError} if the YAML holds invalid values.
 */
export async function loadConfigFile(
  filePath: string,
  options: LoadConfigFileOptions = {}
): Promise<PathfinderConfig> {
  let text: string
  try {
    text = await readFile(filePath, 'utf-8')
  } catch (err) {
    if (isEnoent(err) && options.required !== true) return parseConfig({}, options)
    throw new ConfigFileError(filePath, describeError(err), err)
  }

  let raw: unknown
  try {
    raw = yamlParse(text)
  } catch (err) {
    throw new ConfigFileError(filePath, `invalid YAML: ${describeError(err)}`, err)
  }
  return parseConfig(raw ?? {}, options)
}

/** Delay between visited-node playback frames. */
export function visitIntervalMs(config: PathfinderConfig): number {
  return config.animation.visitIntervalMs ?? Math.max(50, Math.floor(config.animation.speedMs / 2))
}
