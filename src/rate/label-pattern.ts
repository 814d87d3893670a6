/**
 * Label patterns used by the result selector: `key=value` (exact) and
 * `key=~regex` (fully anchored, like a PromQL matcher).
 */

export type LabelPattern =
  | { readonly kind: 'equals'; readonly key: string; readonly value: string }
  | { readonly kind: 'regex'; readonly key: string; readonly regex: RegExp }

export class LabelPatternError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'LabelPatternError'
  }
}

const LABEL_KEY_RE = /^[a-zA-Z_][a-zA-Z0-9_]*$/

/**
 * @throws {LabelPatternError} when the expression has no `=`, the key is not a
 *   valid label name, or the regex does not compile.
 */
export function parseLabelPattern(expression: string): LabelPattern {
  const trimmed = expression.trim()
  const eq = trimmed.indexOf('=')
  if (eq <= 0) {
    throw new LabelPatternError(`label filter "${expression}" must look like key=value or key=~regex`)
  }

  const key = trimmed.slice(0, eq).trim()
  if (!LABEL_KEY_RE.test(key)) {
    throw new LabelPatternError(`label filter "${expression}" has an invalid label name "${key}"`)
  }

  const rest = trimmed.slice(eq + 1)
  if (!rest.startsWith('~')) {
    return { kind: 'equals', key, value: rest }
  }

  const source = rest.slice(1)
  try {
    return { kind: 'regex', key, regex: new RegExp(`^(?:${source})$`) }
  } catch (err) {
    throw new LabelPatternError(
      `label filter "${expression}" has an invalid regex: ${err instanceof Error ? err.message : String(err)}`,
    )
  }
}

/** A missing label is treated as the empty string, as PromQL matchers do. */
export function matchesLabelPattern(labels: Readonly<Record<string, string>>, pattern: LabelPattern): boolean {
  const value = labels[pattern.key] ?? ''
  return pattern.kind === 'equals' ? value === pattern.value : pattern.regex.test(value)
}
