import type { z } from 'zod'

/**
 * Config key path of a validation issue: `render.width`, `defaults.graph`.
 * An empty path means the file as a whole (e.g. a YAML scalar instead of a
 * mapping) and prints as `(config)`.
 */
export function formatConfigPath(path: readonly (string | number)[]): string {
  let text = ''
  for (const segment of path) {
    if (typeof segment === 'number') text += `[${segment}]`
    else text += text === '' ? segment : `.${segment}`
  }
  return text === '' ? '(config)' : text
}

/** One indented `path: message` line per issue. */
export function formatZodErrors(issues: readonly z.ZodIssue[]): string {
  return issues.map((issue) => `  ${formatConfigPath(issue.path)}: ${issue.message}`).join('\n')
}

/** Message of an unknown thrown value, for one-line CLI diagnostics. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}
