/* eslint-disable prettier/prettier */
import { z } from 'zod'
import { BadRequestError } from '../../../domain/errors/bad-request-error.js'

/**
 * @file index.ts
 * @description
 * Zod validation helper shared by the HTTP controllers.
 *
 * - returns typed data when valid
 * - throws {@link BadRequestError} (not retryable) listing every issue otherwise
 */

export function dataValidation<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  data: unknown,
  opts?: { message?: string },
): z.infer<TSchema> {
  const parsed = schema.safeParse(data)

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }))
    const issuesText = issues.map(({ path, message }) => `${path} -> ${message}`).join(' | ')

    throw new BadRequestError(opts?.message ?? `Invalid data: ${issuesText}`, { issues })
  }

  return parsed.data
}
