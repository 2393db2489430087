/* eslint-disable prettier/prettier */
import 'dotenv/config'
import { z } from 'zod'

/**
 * @file index.ts
 * @description
 * Loads, validates and types the environment variables of the application.
 *
 * - `dotenv` copies the `.env` file into `process.env`
 * - `zod` validates each variable, applies defaults and infers the types
 *
 * The application fails fast when the environment is invalid; the rest of
 * the code only reads the typed `env` object, never `process.env`.
 *
 * Infrastructure layer: import it from bootstrap/configuration code only,
 * never from the domain.
 */

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  /**
   * HTTP port of the API.
   */
  PORT: z.coerce.number().int().positive().default(3333),

  /**
   * Key expected in the `x-api-key` header of guarded routes.
   * Optional outside production (checked by the middleware).
   */
  API_KEY: z.string().optional(),

  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  /**
   * Base URL of the remote storage API the uplink export is fetched from.
   */
  TTN_API_URL: z.string().url().default('https://eu1.cloud.thethings.network'),

  /**
   * Timeout of one remote fetch, in milliseconds.
   */
  TTN_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  /**
   * Upper bound of one uploaded file, in bytes.
   */
  UPLOAD_MAX_BYTES: z.coerce.number().int().positive().default(50 * 1024 * 1024),
})

export type Env = z.infer<typeof envSchema>

const __env = envSchema.safeParse(process.env)

if (__env.success === false) {
  const issues = __env.error.issues
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    .join('; ')
  throw new Error(`Invalid environment variables: ${issues}`)
}

/**
 * Validated, typed environment with defaults applied.
 *
 * @example
 * import { env } from '../env/index.js'
 *
 * app.listen(env.PORT)
 */
export const env: Env = __env.data
