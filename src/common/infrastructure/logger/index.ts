/* eslint-disable prettier/prettier */
import pino, { type Logger } from 'pino'
import { env } from '../env/index.js'

/**
 * Named pino logger honoring `LOG_LEVEL`.
 *
 * One per module: the `name` shows up on every line it writes.
 */
export function createLogger(name: string): Logger {
  return pino({ name, level: env.LOG_LEVEL })
}
