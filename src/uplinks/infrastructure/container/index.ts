/* eslint-disable prettier/prettier */

/**
 * @file index.ts
 * @description
 * DI container of the **Uplinks** module: remote source and use cases.
 */

import { container } from 'tsyringe'
import { env } from '../../../common/infrastructure/env/index.js'
import { createLogger } from '../../../common/infrastructure/logger/index.js'
import type { CsvProvider } from '../../../common/domain/providers/csv-provider.js'
import type { UplinkSourceProvider } from '../../domain/providers/uplink-source.provider.js'
import { TtnStorageProvider } from '../providers/ttn-storage.provider.js'
import { ProcessUplinksUseCase } from '../../app/usecases/process-uplinks.usecase.js'
import { FetchUplinksUseCase } from '../../app/usecases/fetch-uplinks.usecase.js'

/**
 * Providers
 */
container.register('UplinkSourceProvider', {
  useFactory: () => TtnStorageProvider.create(env.TTN_API_URL, env.TTN_FETCH_TIMEOUT_MS),
})

/**
 * Use cases
 */
container.register('ProcessUplinksUseCase', {
  useFactory: (c) =>
    new ProcessUplinksUseCase.UseCase(
      c.resolve<CsvProvider>('CsvProvider'),
      createLogger('process-uplinks'),
    ),
})

container.register('FetchUplinksUseCase', {
  useFactory: (c) =>
    new FetchUplinksUseCase.UseCase(
      c.resolve<UplinkSourceProvider>('UplinkSourceProvider'),
      c.resolve<ProcessUplinksUseCase.UseCase>('ProcessUplinksUseCase'),
      createLogger('fetch-uplinks'),
    ),
})
