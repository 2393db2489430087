/* eslint-disable prettier/prettier */
import { z } from 'zod'

/**
 * `?format=` of the routes that can answer either with a JSON summary or
 * with a ZIP of the generated files.
 */
export const outputFormatSchema = z.enum(['json', 'zip']).default('json')

export type OutputFormat = z.infer<typeof outputFormatSchema>
