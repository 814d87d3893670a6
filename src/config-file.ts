import { parse as yamlParse } from 'yaml'
import { readFileOrNull } from './utils/fs.js'

/** Raw, unvalidated config tree as read from a file or built from CLI flags. */
export type RawConfig = Record<string, unknown>

export class ConfigFileError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ConfigFileError'
  }
}

function isPlainObject(value: unknown): value is RawConfig {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Reads a YAML config file.
 *
 * An empty file yields `{}`. Validation is left to `parseConfig`.
 *
 * @throws {ConfigFileError} when the file is missing, is not valid YAML or
 *   its root is not a mapping.
 */
export async function loadConfigFile(path: string): Promise<RawConfig> {
  const text = await readFileOrNull(path)
  if (text === null) {
    throw new ConfigFileError(`config file not found: ${path}`)
  }

  let parsed: unknown
  try {
    parsed = yamlParse(text)
  } catch (err) {
    throw new ConfigFileError(
      `config file ${path} is not valid YAML: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    )
  }

  if (parsed == null) return {}
  if (!isPlainObject(parsed)) {
    throw new ConfigFileError(
      `config file ${path} must contain a mapping, got ${Array.isArray(parsed) ? 'array' : typeof parsed}`,
    )
  }
  return parsed
}

/**
 * Deep-merges config layers, later layers winning. Mappings merge key by key;
 * arrays and scalars replace. `undefined` values never override.
 */
export function mergeConfigLayers(...layers: readonly RawConfig[]): RawConfig {
  const merged: RawConfig = {}
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value === undefined) continue
      const existing = merged[key]
      merged[key] = isPlainObject(value)
        ? mergeConfigLayers(isPlainObject(existing) ? existing : {}, value)
        : value
    }
  }
  return merged
}
