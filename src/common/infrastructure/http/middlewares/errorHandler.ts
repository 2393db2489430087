/* eslint-disable prettier/prettier */
import type { NextFunction, Request, Response } from 'express'
import multer from 'multer'

import { AppError } from '../../../domain/errors/app-error.js'
import { BadRequestError } from '../../../domain/errors/bad-request-error.js'
import { InvalidCredentialsError } from '../../../domain/errors/invalid-credentials-error.js'
import { UpstreamError } from '../../../domain/errors/upstream-error.js'
import { ArchiveError } from '../../../domain/errors/archive-error.js'
import { createLogger } from '../../logger/index.js'

/**
 * @file errorHandler.ts
 * @description
 * Global Express error middleware.
 *
 * Translates application errors (AppError and subclasses) to HTTP:
 * - known errors -> matching status + structured payload
 * - upload limit / malformed body errors -> 4xx
 * - anything else -> 500 + error log with the stack
 *
 * HTTP edge only: the domain and the use cases never see a status code.
 */

const log = createLogger('http-error-handler')

export function resolveHttpStatus(err: AppError): number {
  if (err instanceof BadRequestError) return 400
  if (err instanceof InvalidCredentialsError) return 401
  if (err instanceof UpstreamError) return err.retryable ? 503 : 502
  if (err instanceof ArchiveError) return 500

  if (err.category === 'VALIDATION') return 400
  if (err.category === 'UPSTREAM') return err.retryable ? 503 : 502
  if (err.category === 'INFRASTRUCTURE') return err.retryable ? 503 : 500

  return 500
}

function pickDetails(err: AppError): Record<string, unknown> | undefined {
  if ('details' in err) {
    const details: unknown = err.details
    if (details && typeof details === 'object' && !Array.isArray(details)) {
      return Object.fromEntries(Object.entries(details))
    }
  }
  return undefined
}

/**
 * Client errors raised by Express' own body parsers carry `status` and
 * `expose`, e.g. a malformed JSON body or an oversized text body.
 */
function clientErrorStatus(err: Error): number | undefined {
  if (!('status' in err) || !('expose' in err)) return undefined
  const { status, expose } = err
  if (typeof status === 'number' && status >= 400 && status < 500 && expose === true) {
    return status
  }
  return undefined
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  next: NextFunction,
): void {
  if (err instanceof AppError) {
    const status = resolveHttpStatus(err)
    const details = pickDetails(err)

    if (status >= 500) {
      log.error({ err, method: req.method, path: req.path }, err.message)
    }

    res.status(status).json({
      error: {
        name: err.name,
        message: err.message,
        category: err.category,
        retryable: err.retryable,
        isOperational: err.isOperational,
        timestamp: err.timestamp.toISOString(),
        ...(details ? { details } : {}),
      },
    })
    return
  }

  if (err instanceof multer.MulterError) {
    res.status(err.code === 'LIMIT_FILE_SIZE' ? 413 : 400).json({
      error: {
        name: 'UploadError',
        message: err.message,
        category: 'VALIDATION',
        retryable: false,
        isOperational: true,
        timestamp: new Date().toISOString(),
        details: { code: err.code, ...(err.field ? { field: err.field } : {}) },
      },
    })
    return
  }

  const clientStatus = clientErrorStatus(err)
  if (clientStatus !== undefined) {
    res.status(clientStatus).json({
      error: {
        name: 'BadRequestError',
        message: err.message,
        category: 'VALIDATION',
        retryable: false,
        isOperational: true,
        timestamp: new Date().toISOString(),
      },
    })
    return
  }

  log.error({ err, method: req.method, path: req.path }, 'Unhandled error')

  res.status(500).json({
    error: {
      name: 'InternalServerError',
      message: 'Internal Server Error',
      timestamp: new Date().toISOString(),
    },
  })
}
