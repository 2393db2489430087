/* eslint-disable prettier/prettier */
import type { NextFunction, Request, Response } from 'express'
import { AppError } from '../../../domain/errors/app-error.js'
import { InvalidCredentialsError } from '../../../domain/errors/invalid-credentials-error.js'
import { env } from '../../env/index.js'

/**
 * @file isAuthenticated.ts
 * @description
 * API-key guard for routes that spend remote resources.
 *
 * - expected header: `x-api-key: <key>`
 * - missing or wrong -> InvalidCredentialsError (401)
 * - `API_KEY` not configured: open in development/test, INFRASTRUCTURE error in production
 */

export function isAuthenticated(req: Request, _res: Response, next: NextFunction): void {
  const apiKey = req.header('x-api-key')?.trim()
  const expected = env.API_KEY

  if (!expected) {
    if (env.NODE_ENV === 'production') {
      throw new AppError('API_KEY is not configured on server', {
        category: 'INFRASTRUCTURE',
        isOperational: false,
        retryable: false,
      })
    }
    return next()
  }

  if (!apiKey) {
    throw new InvalidCredentialsError('API key is missing')
  }

  if (apiKey !== expected) {
    throw new InvalidCredentialsError('Invalid API key')
  }

  return next()
}
