/* eslint-disable prettier/prettier */
import type { Request, Response } from 'express'
import { container } from 'tsyringe'
import { z } from 'zod'
import { dataValidation } from '../../../../common/infrastructure/validation/zod/index.js'
import { outputFormatSchema } from '../../../../common/infrastructure/http/output-format.js'
import { FetchUplinksUseCase } from '../../../app/usecases/fetch-uplinks.usecase.js'
import { respondWithSummary } from './respond-with-summary.js'

/**
 * @fileoverview Fetch Uplinks Controller (HTTP)
 *
 * Pulls the export of an application from the remote storage API and runs
 * it through the same pipeline as an upload. The allowed lookback windows
 * are checked by the use case.
 *
 * ## Body
 * - `apiKey`: key of the remote storage API
 * - `applicationId`: application whose uplinks are fetched
 * - `lookbackHours`: 1, 3, 6, 12, 24 or 48
 * - `format`: `json` (default) or `zip`
 */
export async function fetchUplinksController(
  request: Request,
  response: Response,
): Promise<void> {
  const bodySchema = z.object({
    apiKey: z.string(),
    applicationId: z.string(),
    lookbackHours: z.coerce.number().int(),
    format: outputFormatSchema,
  })

  const { apiKey, applicationId, lookbackHours, format } = dataValidation(bodySchema, request.body)

  const fetchUplinksUseCase: FetchUplinksUseCase.UseCase =
    container.resolve('FetchUplinksUseCase')

  const summary = await fetchUplinksUseCase.execute({ apiKey, applicationId, lookbackHours })

  await respondWithSummary(response, summary, format)
}
