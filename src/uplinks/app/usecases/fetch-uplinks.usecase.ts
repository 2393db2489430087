/* eslint-disable prettier/prettier */

/**
 * @file fetch-uplinks.usecase.ts
 * @description
 * Pulls the uplink export of an application from the remote storage API and
 * runs it through {@link ProcessUplinksUseCase}.
 *
 * The lookback window is restricted to {@link ALLOWED_LOOKBACK_HOURS}. When
 * the remote fetch fails, its `UpstreamError` propagates untouched and the
 * pipeline is not invoked.
 *
 * @module uplinks/app/usecases/fetch-uplinks
 */

import type { Logger } from 'pino'
import { BadRequestError } from '../../../common/domain/errors/bad-request-error.js'
import type { UplinkSourceProvider } from '../../domain/providers/uplink-source.provider.js'
import type { ProcessUplinksUseCase } from './process-uplinks.usecase.js'

export const ALLOWED_LOOKBACK_HOURS: readonly number[] = [1, 3, 6, 12, 24, 48]

export namespace FetchUplinksUseCase {
  export type Input = {
    apiKey: string
    applicationId: string
    lookbackHours: number
  }

  export type Output = ProcessUplinksUseCase.Output

  export class UseCase {
    constructor(
      private readonly uplinkSource: UplinkSourceProvider,
      private readonly processUplinks: ProcessUplinksUseCase.UseCase,
      private readonly logger: Logger,
    ) {}

    async execute(input: Input): Promise<Output> {
      const apiKey = input.apiKey.trim()
      const applicationId = input.applicationId.trim()

      if (!apiKey) {
        throw new BadRequestError('apiKey is required')
      }
      if (!applicationId) {
        throw new BadRequestError('applicationId is required')
      }
      if (!ALLOWED_LOOKBACK_HOURS.includes(input.lookbackHours)) {
        throw new BadRequestError(
          `lookbackHours must be one of ${ALLOWED_LOOKBACK_HOURS.join(', ')}`,
          { lookbackHours: input.lookbackHours },
        )
      }

      this.logger.info(
        { applicationId, lookbackHours: input.lookbackHours },
        'Fetching stored uplinks',
      )

      const content = await this.uplinkSource.fetchUplinks({
        apiKey,
        applicationId,
        lookbackHours: input.lookbackHours,
      })

      return this.processUplinks.execute({
        content,
        source: `${applicationId} (last ${input.lookbackHours}h)`,
      })
    }
  }
}
