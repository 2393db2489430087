/* eslint-disable prettier/prettier */
import type { Request, Response } from 'express'
import { container } from 'tsyringe'
import { z } from 'zod'
import { dataValidation } from '../../../../common/infrastructure/validation/zod/index.js'
import { outputFormatSchema } from '../../../../common/infrastructure/http/output-format.js'
import { BadRequestError } from '../../../../common/domain/errors/bad-request-error.js'
import { ProcessUplinksUseCase } from '../../../app/usecases/process-uplinks.usecase.js'
import { respondWithSummary } from './respond-with-summary.js'

/**
 * @fileoverview Process Uplinks Controller (HTTP)
 *
 * Exposes `ProcessUplinksUseCase`: a JSON-lines export comes in, either as
 * the multipart field `file` or as a `text/plain` body, and one CSV per
 * device goes out (JSON summary, or `processed_data.zip` with `?format=zip`).
 */

function readUploadedText(request: Request): { content: string; source: string } {
  if (request.file) {
    return { content: request.file.buffer.toString('utf8'), source: request.file.originalname }
  }

  if (typeof request.body === 'string' && request.body.length > 0) {
    return { content: request.body, source: 'request body' }
  }

  throw new BadRequestError(
    'A JSON-lines export is required (multipart field "file" or a text/plain body)',
  )
}

export async function processUplinksController(
  request: Request,
  response: Response,
): Promise<void> {
  const querySchema = z.object({ format: outputFormatSchema })
  const { format } = dataValidation(querySchema, request.query)

  const { content, source } = readUploadedText(request)

  const processUplinksUseCase: ProcessUplinksUseCase.UseCase =
    container.resolve('ProcessUplinksUseCase')

  const summary = await processUplinksUseCase.execute({ content, source })

  await respondWithSummary(response, summary, format)
}
