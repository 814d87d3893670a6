import { z } from 'zod'

/**
 * Formats a Zod issue path as a human-readable dot/bracket string.
 *
 * Examples:
 *   []                                  → "(root)"
 *   ["selection", "minDpm"]             → "selection.minDpm"
 *   ["filter", "excludeSuffixes", 0]    → "filter.excludeSuffixes[0]"
 */
export function formatZodPath(path: readonly (string | number)[]): string {
  if (path.length === 0) return '(root)'
  return path
    .map((seg, i) => (typeof seg === 'number' ? `[${seg}]` : i === 0 ? seg : `.${seg}`))
    .join('')
}

/**
 * Formats a list of Zod issues into a multi-line indented string, one line
 * per issue with its field path and message.
 */
export function formatZodErrors(errors: readonly z.ZodIssue[]): string {
  return errors
    .map((issue) => `  ${formatZodPath(issue.path)}: ${issue.message}`)
    .join('\n')
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
