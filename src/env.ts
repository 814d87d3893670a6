/**
 * Backend location and credentials, read from the environment (and a `.env`
 * file in the working directory when present).
 */

import { config as loadDotenv } from 'dotenv'
import { z } from 'zod'
import { formatZodErrors } from './error-utils.js'
import type { BackendCredentials } from './backend/client.js'

const envSchema = z
  .object({
    PROMETHEUS_ENDPOINT: z
      .string({ required_error: 'PROMETHEUS_ENDPOINT is required' })
      .url('PROMETHEUS_ENDPOINT must be an absolute URL'),
    PROMETHEUS_USERNAME: z.string().min(1).optional(),
    PROMETHEUS_API_KEY: z.string().min(1).optional(),
  })
  .refine(
    (env) => (env.PROMETHEUS_USERNAME === undefined) === (env.PROMETHEUS_API_KEY === undefined),
    { message: 'PROMETHEUS_USERNAME and PROMETHEUS_API_KEY must be set together', path: ['PROMETHEUS_API_KEY'] },
  )

export interface BackendEnv {
  readonly endpoint: string
  readonly credentials?: BackendCredentials
}

export class EnvValidationError extends Error {
  constructor(zodError: z.ZodError) {
    super(`Environment is invalid:\n${formatZodErrors(zodError.errors)}`, { cause: zodError })
    this.name = 'EnvValidationError'
  }
}

/** Treats empty strings as unset, the way most shells and `.env` files mean them. */
function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value
}

/**
 * Validates backend settings from `source`.
 *
 * @throws {EnvValidationError} when the endpoint is missing or malformed, or
 *   only one of username/API key is set.
 */
export function parseBackendEnv(source: Readonly<Record<string, string | undefined>>): BackendEnv {
  const result = envSchema.safeParse({
    PROMETHEUS_ENDPOINT: blankToUndefined(source['PROMETHEUS_ENDPOINT']),
    PROMETHEUS_USERNAME: blankToUndefined(source['PROMETHEUS_USERNAME']),
    PROMETHEUS_API_KEY: blankToUndefined(source['PROMETHEUS_API_KEY']),
  })
  if (!result.success) throw new EnvValidationError(result.error)

  const { PROMETHEUS_ENDPOINT, PROMETHEUS_USERNAME, PROMETHEUS_API_KEY } = result.data
  return {
    endpoint: PROMETHEUS_ENDPOINT,
    ...(PROMETHEUS_USERNAME !== undefined && PROMETHEUS_API_KEY !== undefined
      ? { credentials: { username: PROMETHEUS_USERNAME, apiKey: PROMETHEUS_API_KEY } }
      : {}),
  }
}

/** Loads `.env` into `process.env` (existing variables win) and validates it. */
export function loadBackendEnv(): BackendEnv {
  loadDotenv()
  return parseBackendEnv(process.env)
}
